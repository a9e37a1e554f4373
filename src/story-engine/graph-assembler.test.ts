import { describe, expect, it } from "vitest";
import { assembleStory, nodeIdFor, transitionKeyFor } from "./graph-assembler";
import type { Panel } from "./types";

const options = { storyId: "demo", title: "Demo" };

function panel(sequenceNumber: number, text: string, extra: Partial<Panel> = {}): Panel {
  return { sequenceNumber, timestamp: sequenceNumber, conversationId: 1, authorId: 5, text, ...extra };
}

describe("assembleStory", () => {
  it("produces an empty document for no panels", () => {
    expect(assembleStory([], options)).toEqual({
      meta: { title: "Demo", introNodeId: "" },
      nodes: {},
      transitions: {},
    });
  });

  it("chains panels with continue choices", () => {
    const graph = assembleStory(
      [
        panel(1, "Hello", { speaker: "Slayer", photoUrl: "https://cdn.test/a.jpg" }),
        panel(2, "The sun sets."),
        panel(3, "", { speaker: "Narration" }),
      ],
      options,
    );

    expect(graph).toEqual({
      meta: { title: "Demo", introNodeId: "node_0001" },
      nodes: {
        node_0001: {
          text: "Slayer\n\nHello",
          kind: "choice",
          choices: [{ label: "Continue", transitionKey: "demo:goto:0002" }],
          photo: "https://cdn.test/a.jpg",
        },
        node_0002: {
          text: "The sun sets.",
          kind: "choice",
          choices: [{ label: "Continue", transitionKey: "demo:goto:0003" }],
        },
        node_0003: { text: "Narration", kind: "choice", choices: [] },
      },
      transitions: {
        "demo:goto:0002": "node_0002",
        "demo:goto:0003": "node_0003",
      },
    });
    expect("photo" in graph.nodes.node_0002).toBe(false);
  });

  it("links every node to its successor and ends with a terminal node", () => {
    const panels = Array.from({ length: 12 }, (_, i) => panel(i + 1, `panel ${i + 1}`));
    const graph = assembleStory(panels, options);

    for (let i = 1; i < panels.length; i++) {
      const key = transitionKeyFor("demo", i + 1);
      expect(graph.transitions[key]).toBe(nodeIdFor(i + 1));
      expect(graph.nodes[nodeIdFor(i)].choices).toEqual([{ label: "Continue", transitionKey: key }]);
    }
    expect(graph.nodes[nodeIdFor(12)].choices).toEqual([]);
    expect(Object.keys(graph.transitions)).toHaveLength(11);
  });

  it("is idempotent over the same panel sequence", () => {
    const panels = [panel(1, "a", { photoUrl: "https://cdn.test/a.jpg" }), panel(2, "b", { speaker: "Bob" })];

    expect(JSON.stringify(assembleStory(panels, options))).toBe(JSON.stringify(assembleStory(panels, options)));
  });
});

describe("ids", () => {
  it("pads positions to four digits", () => {
    expect(nodeIdFor(7)).toBe("node_0007");
    expect(nodeIdFor(12345)).toBe("node_12345");
    expect(transitionKeyFor("captured_story", 42)).toBe("captured_story:goto:0042");
  });
});
