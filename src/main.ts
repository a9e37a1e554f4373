import { loadConfig } from "./config";
import { CloudinaryAssetResolver, unavailableAssetResolver } from "./lib/cloudinary-resolver";
import { createLogger, describeError } from "./lib/log";
import { JsonlPanelSink, readPanelLog } from "./lib/panel-log";
import { FileDocumentSink } from "./lib/story-document";
import { TelegramTransport } from "./lib/telegram-transport";
import { StoryEngine } from "./story-engine/story-engine";

async function main() {
  const config = loadConfig();
  const log = createLogger("story-capture", config.logLevel);

  if (!config.uploadCredentials) log.warn("Cloudinary credentials missing; uploads will fail.");
  const assetResolver = config.uploadCredentials
    ? new CloudinaryAssetResolver({ credentials: config.uploadCredentials, folder: `story/${config.storyId}` })
    : unavailableAssetResolver;

  const initialPanels = await readPanelLog(config.panelLogPath, log);
  if (initialPanels.length) log.info(`Restored ${initialPanels.length} panels from ${config.panelLogPath}`);

  const transport = new TelegramTransport({ token: config.botToken, logger: createLogger("telegram", config.logLevel) });
  const engine = new StoryEngine({
    storyId: config.storyId,
    title: config.storyTitle,
    panelGapSec: config.panelGapSec,
    assembleIntervalMs: config.assembleIntervalMs,
    speakerRules: config.speakerRules,
    mediaFetcher: transport,
    assetResolver,
    panelSink: new JsonlPanelSink(config.panelLogPath),
    documentSink: new FileDocumentSink({ outputDir: config.outputDir, storyId: config.storyId }),
    initialPanels,
    logger: createLogger("story-engine", config.logLevel),
  });

  transport.event$.subscribe((event) => engine.submit(event));
  engine.panel$.subscribe((panel) => {
    transport.confirm(panel).catch((error: unknown) => log.warn(describeError(error)));
  });
  engine.start();
  await engine.writeStory();

  const shutdown = async (signal: string) => {
    log.info(`${signal} received, stopping`);
    await transport.stop();
    await engine.stop();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error("Shutdown failed:", describeError(error));
        process.exitCode = 1;
      });
    });
  }

  log.info("Starting bot polling…");
  await transport.start();
}

main().catch((error: unknown) => {
  console.error("[story-capture]", describeError(error));
  process.exit(1);
});
