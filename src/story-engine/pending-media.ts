import type { ChatId } from "./types";

export interface PendingMedia {
  timestamp: number;
  mediaRef: string;
}

/** One slot per (conversation, author). A newer image overwrites the older one. */
export class PendingMediaRegistry {
  #slots = new Map<string, PendingMedia>();

  record(conversationId: ChatId, authorId: ChatId, timestamp: number, mediaRef: string) {
    this.#slots.set(slotKey(conversationId, authorId), { timestamp, mediaRef });
  }

  /** Always clears the slot; returns the media only when it is still inside the window. */
  take(conversationId: ChatId, authorId: ChatId, now: number, windowSeconds: number): string | undefined {
    const key = slotKey(conversationId, authorId);
    const entry = this.#slots.get(key);
    if (!entry) return undefined;

    this.#slots.delete(key);
    return now - entry.timestamp <= windowSeconds ? entry.mediaRef : undefined;
  }

  has(conversationId: ChatId, authorId: ChatId) {
    return this.#slots.has(slotKey(conversationId, authorId));
  }

  get size() {
    return this.#slots.size;
  }
}

function slotKey(conversationId: ChatId, authorId: ChatId) {
  return `${conversationId}:${authorId}`;
}
