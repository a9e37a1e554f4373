import type { Panel, StoryGraph, StoryNode } from "./types";

export interface AssembleOptions {
  storyId: string;
  title: string;
}

export function nodeIdFor(position: number) {
  return `node_${pad(position)}`;
}

export function transitionKeyFor(storyId: string, position: number) {
  return `${storyId}:goto:${pad(position)}`;
}

/**
 * Rebuild the whole story graph from the panel sequence. Node `i` continues to node `i + 1`
 * through the transition key of `i + 1`; the last node has no choices.
 */
export function assembleStory(panels: readonly Panel[], options: AssembleOptions): StoryGraph {
  const nodes: Record<string, StoryNode> = {};
  const transitions: Record<string, string> = {};

  panels.forEach((panel, index) => {
    const position = index + 1;
    const nodeId = nodeIdFor(position);

    const node: StoryNode = {
      text: panel.speaker !== undefined ? `${panel.speaker}\n\n${panel.text}`.trim() : panel.text,
      kind: "choice",
      choices:
        position < panels.length ? [{ label: "Continue", transitionKey: transitionKeyFor(options.storyId, position + 1) }] : [],
    };
    if (panel.photoUrl) node.photo = panel.photoUrl;

    nodes[nodeId] = node;
    if (position > 1) transitions[transitionKeyFor(options.storyId, position)] = nodeId;
  });

  return {
    meta: {
      title: options.title,
      introNodeId: panels.length ? nodeIdFor(1) : "",
    },
    nodes,
    transitions,
  };
}

function pad(position: number) {
  return String(position).padStart(4, "0");
}
