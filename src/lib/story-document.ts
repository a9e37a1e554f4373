import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { DocumentSink, StoryGraph } from "../story-engine/types";

export interface StoryDocument {
  meta: { title: string; intro: string };
  nodes: Record<string, StoryDocumentNode>;
  callbacks: Record<string, string>;
}

export interface StoryDocumentNode {
  text: string;
  type: "choice";
  choices: { label: string; key: string }[];
  photo?: string;
}

export function toStoryDocument(graph: StoryGraph): StoryDocument {
  const nodes: Record<string, StoryDocumentNode> = {};
  for (const [nodeId, node] of Object.entries(graph.nodes)) {
    nodes[nodeId] = {
      text: node.text,
      type: node.kind,
      choices: node.choices.map((choice) => ({ label: choice.label, key: choice.transitionKey })),
      ...(node.photo ? { photo: node.photo } : {}),
    };
  }

  return {
    meta: { title: graph.meta.title, intro: graph.meta.introNodeId },
    nodes,
    callbacks: { ...graph.transitions },
  };
}

export function serializeStoryDocument(graph: StoryGraph) {
  return JSON.stringify(toStoryDocument(graph), null, 2);
}

/** Overwrites `<outputDir>/<storyId>.json` by writing a sibling temp file and renaming it into place. */
export class FileDocumentSink implements DocumentSink {
  readonly path: string;
  #writes = 0;

  constructor(private options: { outputDir: string; storyId: string }) {
    this.path = join(options.outputDir, `${options.storyId}.json`);
  }

  async write(graph: StoryGraph) {
    await mkdir(this.options.outputDir, { recursive: true });
    const tempPath = `${this.path}.${process.pid}.${++this.#writes}.tmp`;
    await writeFile(tempPath, serializeStoryDocument(graph), "utf8");
    await rename(tempPath, this.path);
  }
}
