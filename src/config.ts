import { join } from "node:path";
import z from "zod";
import type { UploadCredentials } from "./lib/cloudinary-resolver";
import { ConfigError } from "./lib/errors";
import type { LogLevel } from "./lib/log";
import { tryParse } from "./lib/parse";
import { defaultSpeakerRules, speakerRulesSchema, type SpeakerRules } from "./story-engine/speaker-parser";

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().default(""),
  CLOUDINARY_CLOUD_NAME: z.string().trim().default(""),
  CLOUDINARY_API_KEY: z.string().trim().default(""),
  CLOUDINARY_API_SECRET: z.string().trim().default(""),
  PANEL_GAP_SEC: z.coerce.number().positive().default(25),
  OUTPUT_DIR: z.string().min(1).default("out"),
  STORY_ID: z.string().min(1).default("captured_story"),
  STORY_TITLE: z.string().default("Captured Story"),
  ASSEMBLE_INTERVAL_SEC: z.coerce.number().positive().default(60),
  SPEAKER_RULES: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface AppConfig {
  botToken: string;
  uploadCredentials?: UploadCredentials;
  panelGapSec: number;
  outputDir: string;
  panelLogPath: string;
  storyId: string;
  storyTitle: string;
  assembleIntervalMs: number;
  speakerRules: SpeakerRules;
  logLevel: LogLevel;
}

/** Throws `ConfigError` when the process must not start. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  if (!vars.BOT_TOKEN) throw new ConfigError("Set BOT_TOKEN env var.");

  return {
    botToken: vars.BOT_TOKEN,
    uploadCredentials:
      vars.CLOUDINARY_CLOUD_NAME && vars.CLOUDINARY_API_KEY && vars.CLOUDINARY_API_SECRET
        ? {
            cloudName: vars.CLOUDINARY_CLOUD_NAME,
            apiKey: vars.CLOUDINARY_API_KEY,
            apiSecret: vars.CLOUDINARY_API_SECRET,
          }
        : undefined,
    panelGapSec: vars.PANEL_GAP_SEC,
    outputDir: vars.OUTPUT_DIR,
    panelLogPath: join(vars.OUTPUT_DIR, "panels.jsonl"),
    storyId: vars.STORY_ID,
    storyTitle: vars.STORY_TITLE,
    assembleIntervalMs: vars.ASSEMBLE_INTERVAL_SEC * 1000,
    speakerRules: vars.SPEAKER_RULES === undefined ? defaultSpeakerRules : parseSpeakerRules(vars.SPEAKER_RULES),
    logLevel: vars.LOG_LEVEL,
  };
}

export function parseSpeakerRules(json: string): SpeakerRules {
  const rules = tryParse(json, speakerRulesSchema, null);
  if (!rules) throw new ConfigError("SPEAKER_RULES must be JSON like {\"maxLength\":32,\"rules\":[{\"match\":\"suffix\",\"value\":\":\"}]}");
  return rules;
}
