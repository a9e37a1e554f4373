import { catchError, concatMap, EMPTY, filter, groupBy, mergeMap, Observable } from "rxjs";
import { describeError, silentLogger, type Logger } from "../lib/log";
import type { PanelStore } from "./panel-store";
import type { PendingMediaRegistry } from "./pending-media";
import { defaultSpeakerRules, parseSpeaker, type SpeakerRules } from "./speaker-parser";
import type { AssetResolver, MediaFetcher, Panel, StoryEvent } from "./types";

export interface PanelCorrelatorOptions {
  registry: PendingMediaRegistry;
  store: PanelStore;
  mediaFetcher: MediaFetcher;
  assetResolver: AssetResolver;
  panelGapSec: number;
  speakerRules?: SpeakerRules;
  logger?: Logger;
}

export class PanelCorrelator {
  private logger: Logger;

  constructor(private options: PanelCorrelatorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Events of one conversation are handled strictly in order; conversations run side by side,
   * so a slow upload only delays its own conversation.
   */
  correlate(event$: Observable<StoryEvent>): Observable<Panel> {
    return event$.pipe(
      groupBy((event) => event.conversationId),
      mergeMap((conversation$) =>
        conversation$.pipe(
          concatMap((event) =>
            this.handle(event).catch((error: unknown) => {
              this.logger.error(`Dropped ${event.kind} event chat=${event.conversationId}:`, describeError(error));
              return undefined;
            }),
          ),
        ),
      ),
      filter((panel): panel is Panel => panel !== undefined),
      catchError((error: unknown) => {
        this.logger.error("Event stream failed:", describeError(error));
        return EMPTY;
      }),
    );
  }

  async handle(event: StoryEvent): Promise<Panel | undefined> {
    const { registry, store } = this.options;

    switch (event.kind) {
      case "photo": {
        registry.record(event.conversationId, event.authorId, event.timestamp, event.mediaRef);
        this.logger.info(`Photo captured for pairing chat=${event.conversationId} uid=${event.authorId}`);
        return undefined;
      }
      case "text": {
        if (!event.rawText) return undefined;

        const { speaker, body } = parseSpeaker(event.rawText, this.options.speakerRules ?? defaultSpeakerRules);
        const mediaRef = registry.take(event.conversationId, event.authorId, event.timestamp, this.options.panelGapSec);
        const photoUrl = mediaRef ? await this.resolvePhoto(mediaRef) : undefined;

        return store.append({
          timestamp: event.timestamp,
          conversationId: event.conversationId,
          authorId: event.authorId,
          speaker,
          text: speaker !== undefined ? body : event.rawText,
          photoUrl,
        });
      }
    }
  }

  private async resolvePhoto(mediaRef: string): Promise<string | undefined> {
    try {
      const bytes = await this.options.mediaFetcher.fetch(mediaRef);
      const url = await this.options.assetResolver.upload(bytes);
      this.logger.info(`Uploaded photo: ${url}`);
      return url;
    } catch (error) {
      this.logger.warn(`Photo upload failed, keeping panel without photo: ${describeError(error)}`);
      return undefined;
    }
  }
}
