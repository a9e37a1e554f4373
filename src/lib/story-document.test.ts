import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { assembleStory } from "../story-engine/graph-assembler";
import type { Panel } from "../story-engine/types";
import { FileDocumentSink, serializeStoryDocument, toStoryDocument } from "./story-document";

const panels: Panel[] = [
  {
    sequenceNumber: 1,
    timestamp: 1,
    conversationId: 1,
    authorId: 5,
    speaker: "Slayer",
    text: "Hello",
    photoUrl: "https://cdn.test/a.jpg",
  },
  { sequenceNumber: 2, timestamp: 2, conversationId: 1, authorId: 5, text: "Bye" },
];
const graph = assembleStory(panels, { storyId: "demo", title: "Demo" });

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "story-document-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("toStoryDocument", () => {
  it("renames graph fields to the document shape", () => {
    expect(toStoryDocument(graph)).toEqual({
      meta: { title: "Demo", intro: "node_0001" },
      nodes: {
        node_0001: {
          text: "Slayer\n\nHello",
          type: "choice",
          choices: [{ label: "Continue", key: "demo:goto:0002" }],
          photo: "https://cdn.test/a.jpg",
        },
        node_0002: { text: "Bye", type: "choice", choices: [] },
      },
      callbacks: { "demo:goto:0002": "node_0002" },
    });
  });
});

describe("serializeStoryDocument", () => {
  it("pretty-prints with two-space indentation", () => {
    expect(serializeStoryDocument(graph)).toBe(
      [
        "{",
        '  "meta": {',
        '    "title": "Demo",',
        '    "intro": "node_0001"',
        "  },",
        '  "nodes": {',
        '    "node_0001": {',
        '      "text": "Slayer\\n\\nHello",',
        '      "type": "choice",',
        '      "choices": [',
        "        {",
        '          "label": "Continue",',
        '          "key": "demo:goto:0002"',
        "        }",
        "      ],",
        '      "photo": "https://cdn.test/a.jpg"',
        "    },",
        '    "node_0002": {',
        '      "text": "Bye",',
        '      "type": "choice",',
        '      "choices": []',
        "    }",
        "  },",
        '  "callbacks": {',
        '    "demo:goto:0002": "node_0002"',
        "  }",
        "}",
      ].join("\n"),
    );
  });
});

describe("FileDocumentSink", () => {
  it("overwrites the story file without leaving temp files behind", async () => {
    const sink = new FileDocumentSink({ outputDir: join(dir, "out"), storyId: "demo" });

    await sink.write(assembleStory([], { storyId: "demo", title: "Demo" }));
    await sink.write(graph);

    expect(sink.path).toBe(join(dir, "out", "demo.json"));
    expect(await readFile(sink.path, "utf8")).toBe(serializeStoryDocument(graph));
    expect(await readdir(join(dir, "out"))).toEqual(["demo.json"]);
  });
});
