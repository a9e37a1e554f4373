import type { Panel, PanelDraft } from "./types";

export class PanelStore {
  #panels: Panel[] = [];

  constructor(initialPanels: readonly Panel[] = []) {
    initialPanels.forEach((panel, i) => {
      if (panel.sequenceNumber !== i + 1) {
        throw new Error(`Panel ${panel.sequenceNumber} found at position ${i + 1}; the log must be dense and 1-based`);
      }
      this.#panels.push(Object.freeze({ ...panel }));
    });
  }

  append(draft: PanelDraft): Panel {
    const panel: Panel = Object.freeze({ sequenceNumber: this.#panels.length + 1, ...draft });
    this.#panels.push(panel);
    return panel;
  }

  snapshot(): readonly Panel[] {
    return [...this.#panels];
  }

  get size() {
    return this.#panels.length;
  }
}
