import { describe, expect, it } from "vitest";
import { PanelStore } from "./panel-store";

const draft = (conversationId: number, text: string) => ({ timestamp: 1, conversationId, authorId: 5, text });

describe("PanelStore", () => {
  it("numbers panels densely from 1 across conversations", () => {
    const store = new PanelStore();

    expect(store.append(draft(1, "a")).sequenceNumber).toBe(1);
    expect(store.append(draft(2, "b")).sequenceNumber).toBe(2);
    expect(store.append(draft(1, "c")).sequenceNumber).toBe(3);
    expect(store.snapshot().map((panel) => panel.text)).toEqual(["a", "b", "c"]);
  });

  it("hands out immutable panels and detached snapshots", () => {
    const store = new PanelStore();
    const panel = store.append(draft(1, "a"));
    const snapshot = store.snapshot();
    store.append(draft(1, "b"));

    expect(Object.isFrozen(panel)).toBe(true);
    expect(snapshot).toHaveLength(1);
    expect(store.size).toBe(2);
  });

  it("continues numbering after restored panels", () => {
    const store = new PanelStore([{ sequenceNumber: 1, ...draft(1, "a") }]);

    expect(store.append(draft(1, "b")).sequenceNumber).toBe(2);
  });

  it("rejects restored panels with gaps", () => {
    expect(() => new PanelStore([{ sequenceNumber: 2, ...draft(1, "a") }])).toThrow(
      "Panel 2 found at position 1; the log must be dense and 1-based",
    );
  });
});
