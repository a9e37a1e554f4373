import { concatMap, interval, lastValueFrom, merge, Observable, Subject, takeUntil, tap } from "rxjs";
import { describeError, silentLogger, type Logger } from "../lib/log";
import { assembleStory } from "./graph-assembler";
import { PanelCorrelator } from "./panel-correlator";
import { PanelStore } from "./panel-store";
import { PendingMediaRegistry } from "./pending-media";
import type { SpeakerRules } from "./speaker-parser";
import type { AssetResolver, DocumentSink, MediaFetcher, Panel, PanelSink, StoryEvent, StoryGraph } from "./types";

export interface StoryEngineOptions {
  storyId: string;
  title: string;
  panelGapSec: number;
  assembleIntervalMs: number;
  speakerRules?: SpeakerRules;
  mediaFetcher: MediaFetcher;
  assetResolver: AssetResolver;
  panelSink: PanelSink;
  documentSink: DocumentSink;
  initialPanels?: readonly Panel[];
  logger?: Logger;
}

export class StoryEngine {
  readonly store: PanelStore;
  readonly registry = new PendingMediaRegistry();
  readonly correlator: PanelCorrelator;

  private logger: Logger;
  private events$ = new Subject<StoryEvent>();
  private stopped$ = new Subject<void>();
  private panelInternal$ = new Subject<Panel>();
  private running: Promise<unknown> = Promise.resolve();

  /** Panels after they reach the panel log, in store order. */
  readonly panel$: Observable<Panel> = this.panelInternal$.asObservable();

  constructor(private options: StoryEngineOptions) {
    this.logger = options.logger ?? silentLogger;
    this.store = new PanelStore(options.initialPanels);
    this.correlator = new PanelCorrelator({
      registry: this.registry,
      store: this.store,
      mediaFetcher: options.mediaFetcher,
      assetResolver: options.assetResolver,
      panelGapSec: options.panelGapSec,
      speakerRules: options.speakerRules,
      logger: options.logger,
    });
  }

  start() {
    const loggedPanel$ = this.correlator.correlate(this.events$).pipe(
      concatMap(async (panel) => {
        await this.appendToLog(panel);
        return panel;
      }),
      tap((panel) => this.panelInternal$.next(panel)),
    );
    const tick$ = interval(this.options.assembleIntervalMs).pipe(takeUntil(this.stopped$));

    this.running = lastValueFrom(merge(loggedPanel$, tick$).pipe(concatMap(() => this.writeStory())), {
      defaultValue: undefined,
    });
  }

  submit(event: StoryEvent) {
    this.events$.next(event);
  }

  /** Drains in-flight events, stops the timer, then writes the document once more. */
  async stop() {
    this.events$.complete();
    this.stopped$.next();
    this.stopped$.complete();
    await this.running;
    this.panelInternal$.complete();
    await this.writeStory();
  }

  assemble(): StoryGraph {
    return assembleStory(this.store.snapshot(), { storyId: this.options.storyId, title: this.options.title });
  }

  async writeStory(): Promise<StoryGraph> {
    const graph = this.assemble();
    try {
      await this.options.documentSink.write(graph);
      this.logger.debug(`Story written with ${Object.keys(graph.nodes).length} nodes`);
    } catch (error) {
      this.logger.error("Failed to write story document:", describeError(error));
    }
    return graph;
  }

  private async appendToLog(panel: Panel) {
    try {
      await this.options.panelSink.append(panel);
    } catch (error) {
      this.logger.error(`Failed to append panel ${panel.sequenceNumber} to the log:`, describeError(error));
    }
  }
}
