import z from "zod";

export const speakerRuleSchema = z.object({
  match: z.enum(["exact", "substring", "suffix"]),
  value: z.string().min(1),
});

export const speakerRulesSchema = z.object({
  maxLength: z.number().int().positive(),
  rules: z.array(speakerRuleSchema),
});

export type SpeakerRule = z.infer<typeof speakerRuleSchema>;
export type SpeakerRules = z.infer<typeof speakerRulesSchema>;

export const defaultSpeakerRules: SpeakerRules = {
  maxLength: 32,
  rules: [
    { match: "exact", value: "narration" },
    { match: "substring", value: "slayer" },
    { match: "suffix", value: ":" },
  ],
};

export interface ParsedSpeaker {
  speaker?: string;
  body: string;
}

/**
 * Split an optional speaker label off the first non-blank line.
 * When no label is recognized the body is the original text, untouched.
 */
export function parseSpeaker(rawText: string, config: SpeakerRules = defaultSpeakerRules): ParsedSpeaker {
  const lines = rawText.split(/\r\n|\r|\n/);
  while (lines.length && !lines[0].trim()) lines.shift();
  if (!lines.length) return { body: "" };

  const first = lines[0].trim();
  if (!isSpeakerLine(first, config)) return { body: rawText };

  const speaker = first.replace(/[:\s]+$/, "");
  if (!speaker) return { body: rawText };

  return { speaker, body: lines.slice(1).join("\n").trimStart() };
}

export function isSpeakerLine(line: string, config: SpeakerRules): boolean {
  if ([...line].length > config.maxLength) return false;

  const candidate = line.toLowerCase();
  return config.rules.some((rule) => matchesRule(candidate, rule));
}

function matchesRule(candidate: string, rule: SpeakerRule): boolean {
  const value = rule.value.toLowerCase();
  switch (rule.match) {
    case "exact":
      return candidate === value;
    case "substring":
      return candidate.includes(value);
    case "suffix":
      return candidate.endsWith(value);
  }
}
