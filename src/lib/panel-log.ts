import { createReadStream, existsSync } from "node:fs";
import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import z from "zod";
import type { Panel, PanelSink } from "../story-engine/types";
import { silentLogger, type Logger } from "./log";
import { tryParse } from "./parse";

const panelRecordSchema = z
  .object({
    sequenceNumber: z.number().int().positive(),
    timestamp: z.number(),
    conversationId: z.number(),
    authorId: z.number(),
    speaker: z.string().nullable(),
    text: z.string(),
    photoUrl: z.string().nullable(),
  })
  .transform(({ speaker, photoUrl, ...rest }): Panel => ({
    ...rest,
    ...(speaker !== null ? { speaker } : {}),
    ...(photoUrl !== null ? { photoUrl } : {}),
  }));

/** One JSON line per panel with a fixed key order and `null` for absent fields. */
export function serializePanel(panel: Panel): string {
  return JSON.stringify({
    sequenceNumber: panel.sequenceNumber,
    timestamp: panel.timestamp,
    conversationId: panel.conversationId,
    authorId: panel.authorId,
    speaker: panel.speaker ?? null,
    text: panel.text,
    photoUrl: panel.photoUrl ?? null,
  });
}

export class JsonlPanelSink implements PanelSink {
  constructor(readonly path: string) {}

  async append(panel: Panel) {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, serializePanel(panel) + "\n", "utf8");
  }
}

/**
 * Restores panels in log order. A torn final record is dropped and sequence numbers are
 * renumbered by position; either repair rewrites the log so it matches what was restored.
 */
export async function readPanelLog(path: string, logger: Logger = silentLogger): Promise<Panel[]> {
  if (!existsSync(path)) return [];

  const lines = createInterface({ input: createReadStream(path, "utf8"), crlfDelay: Infinity });
  const records: { line: string; lineNumber: number }[] = [];
  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    if (line.trim()) records.push({ line, lineNumber });
  }

  const panels: Panel[] = [];
  let repaired = false;

  for (const [i, record] of records.entries()) {
    const panel = tryParse(record.line, panelRecordSchema, null);
    if (panel) {
      panels.push(panel);
    } else if (i === records.length - 1) {
      logger.warn(`Dropping torn panel record at ${path}:${record.lineNumber}`);
      repaired = true;
    } else {
      throw new Error(`Invalid panel record at ${path}:${record.lineNumber}`);
    }
  }

  const restored = panels.map((panel, i) => (panel.sequenceNumber === i + 1 ? panel : { ...panel, sequenceNumber: i + 1 }));
  const renumbered = restored.filter((panel, i) => panel !== panels[i]).length;
  if (renumbered) {
    logger.warn(`Renumbered ${renumbered} panels in ${path}; the log was missing records`);
    repaired = true;
  }

  if (repaired) await writeFile(path, restored.map((panel) => serializePanel(panel) + "\n").join(""), "utf8");
  return restored;
}
