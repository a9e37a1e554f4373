import { Bot } from "grammy";
import { Subject } from "rxjs";
import type { MessageEntity } from "grammy/types";
import type { MediaFetcher, Panel, StoryEvent } from "../story-engine/types";
import { MediaFetchError } from "./errors";
import { describeError, silentLogger, type Logger } from "./log";

export interface TelegramTransportOptions {
  token: string;
  logger?: Logger;
}

export const pingReply = "Bot alive. Send photos + text; I'll build a story JSON.";

/** Turns Telegram updates into story events and fetches photo bytes by `file_id`. */
export class TelegramTransport implements MediaFetcher {
  readonly bot: Bot;
  private logger: Logger;
  private eventInternal$ = new Subject<StoryEvent>();
  readonly event$ = this.eventInternal$.asObservable();

  constructor(private options: TelegramTransportOptions) {
    this.logger = options.logger ?? silentLogger;
    this.bot = new Bot(options.token);

    this.bot.command("ping", (ctx) => ctx.reply(pingReply));

    this.bot.on("message:photo", (ctx) => {
      const { message } = ctx;
      const largest = message.photo.at(-1);
      if (!largest) return;

      const origin = { conversationId: ctx.chat.id, authorId: ctx.from?.id ?? 0, timestamp: message.date };
      this.eventInternal$.next({ kind: "photo", ...origin, mediaRef: largest.file_id });
      if (message.caption) this.eventInternal$.next({ kind: "text", ...origin, rawText: message.caption });
    });

    this.bot.on("message:text", (ctx) => {
      const { message } = ctx;
      if (startsWithCommand(message.entities)) return;

      this.eventInternal$.next({
        kind: "text",
        conversationId: ctx.chat.id,
        authorId: ctx.from?.id ?? 0,
        timestamp: message.date,
        rawText: message.text,
      });
    });

    this.bot.catch((err) => {
      this.logger.error(`Update ${err.ctx.update.update_id} failed:`, describeError(err.error));
    });
  }

  async fetch(mediaRef: string): Promise<Uint8Array> {
    let filePath: string | undefined;
    try {
      filePath = (await this.bot.api.getFile(mediaRef)).file_path;
    } catch (error) {
      throw new MediaFetchError(`getFile failed for ${mediaRef}: ${describeError(error)}`, { cause: error });
    }
    if (!filePath) throw new MediaFetchError(`No file path for ${mediaRef}`);

    const response = await fetch(`https://api.telegram.org/file/bot${this.options.token}/${filePath}`).catch(
      (error: unknown) => {
        throw new MediaFetchError(`Download failed for ${mediaRef}: ${describeError(error)}`, { cause: error });
      },
    );
    if (!response.ok) throw new MediaFetchError(`Download failed for ${mediaRef}: HTTP ${response.status}`);

    return new Uint8Array(await response.arrayBuffer());
  }

  /** The rebuild triggered by a panel holds exactly as many nodes as its sequence number. */
  async confirm(panel: Panel) {
    try {
      await this.bot.api.sendMessage(
        panel.conversationId,
        `Captured panel ${panel.sequenceNumber}. Nodes: ${panel.sequenceNumber}`,
      );
    } catch (error) {
      this.logger.warn(`Confirmation to chat=${panel.conversationId} failed:`, describeError(error));
    }
  }

  /** Resolves once polling stops. */
  start() {
    return this.bot.start({
      onStart: (me) => this.logger.info(`Polling as @${me.username}`),
    });
  }

  async stop() {
    await this.bot.stop();
    this.eventInternal$.complete();
  }
}

function startsWithCommand(entities: MessageEntity[] | undefined) {
  return entities?.some((entity) => entity.type === "bot_command" && entity.offset === 0) ?? false;
}
