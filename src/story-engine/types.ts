export type ChatId = number;

export interface PhotoEvent {
  kind: "photo";
  conversationId: ChatId;
  authorId: ChatId;
  timestamp: number; // seconds
  mediaRef: string;
}

export interface TextEvent {
  kind: "text";
  conversationId: ChatId;
  authorId: ChatId;
  timestamp: number; // seconds
  rawText: string;
}

export type StoryEvent = PhotoEvent | TextEvent;

export interface Panel {
  sequenceNumber: number;
  timestamp: number;
  conversationId: ChatId;
  authorId: ChatId;
  speaker?: string;
  text: string;
  photoUrl?: string;
}

export type PanelDraft = Omit<Panel, "sequenceNumber">;

export interface StoryChoice {
  label: string;
  transitionKey: string;
}

export interface StoryNode {
  text: string;
  kind: "choice";
  choices: StoryChoice[];
  photo?: string;
}

export interface StoryGraph {
  meta: {
    title: string;
    introNodeId: string;
  };
  nodes: Record<string, StoryNode>;
  transitions: Record<string, string>;
}

/* Outward collaborators */
export interface MediaFetcher {
  fetch(mediaRef: string): Promise<Uint8Array>;
}

export interface AssetResolver {
  upload(bytes: Uint8Array): Promise<string>;
}

export interface PanelSink {
  append(panel: Panel): Promise<void>;
}

export interface DocumentSink {
  write(graph: StoryGraph): Promise<void>;
}
