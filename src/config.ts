import { z } from "zod";

import { optionalEnv, requireEnv } from "./env.js";

export const DEFAULT_CHAPTER_PATTERN = String.raw`(第\d+章\s+.*?（.*?）)\s*\n`;

export const ReformatConfigSchema = z.object({
  apiKey: z.string().min(1),
  apiBase: z.string().url(),
  model: z.string().min(1),
  inputPath: z.string().min(1),
  outputDir: z.string().min(1),
  checkpointPath: z.string().min(1),
  consolidatedPath: z.string().min(1),
  /** null = every pending chapter */
  maxChapters: z.number().int().positive().nullable(),
  requestsPerMinute: z.number().int().positive(),
  chapterPattern: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxRetries: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
  notify: z.boolean(),
});

export type ReformatConfig = Readonly<z.infer<typeof ReformatConfigSchema>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function getArg(argv: readonly string[], flag: string): string | null {
  const idx = argv.indexOf(flag);
  if (idx < 0) return null;
  return argv[idx + 1] ?? null;
}

export function hasFlag(argv: readonly string[], flag: string): boolean {
  return argv.includes(flag);
}

function toNumber(name: string, raw: string | null): number | undefined {
  if (raw == null || !raw.trim()) return undefined;
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) throw new ConfigError(`BLOCKED: ${name} must be a number, got: ${raw}`);
  return n;
}

/**
 * Build the run configuration from env vars (already loaded via loadEnv) and
 * CLI flags. Flags override env vars.
 */
export function loadConfig(argv: readonly string[] = [], env: NodeJS.ProcessEnv = process.env): ReformatConfig {
  let apiKey: string;
  try {
    apiKey = requireEnv("OPENAI_API_KEY", env);
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }

  const maxChapters =
    toNumber("--max-chapters", getArg(argv, "--max-chapters")) ??
    toNumber("REFLOW_MAX_CHAPTERS", env.REFLOW_MAX_CHAPTERS ?? null) ??
    null;

  const raw = {
    apiKey,
    apiBase: optionalEnv("OPENAI_API_BASE", "https://api.openai.com/v1", env).replace(/\/+$/, ""),
    model: getArg(argv, "--model") ?? optionalEnv("REFLOW_MODEL", "gpt-4.1-nano", env),
    inputPath: getArg(argv, "--input") ?? optionalEnv("REFLOW_INPUT", "data/novel.txt", env),
    outputDir: getArg(argv, "--output-dir") ?? optionalEnv("REFLOW_OUTPUT_DIR", "data/output", env),
    checkpointPath: getArg(argv, "--checkpoint") ?? optionalEnv("REFLOW_CHECKPOINT", "data/checkpoint.json", env),
    consolidatedPath: getArg(argv, "--consolidated") ?? optionalEnv("REFLOW_CONSOLIDATED", "data/result.txt", env),
    maxChapters,
    requestsPerMinute:
      toNumber("--rpm", getArg(argv, "--rpm")) ?? toNumber("REFLOW_RPM", env.REFLOW_RPM ?? null) ?? 10,
    chapterPattern: optionalEnv("REFLOW_CHAPTER_PATTERN", DEFAULT_CHAPTER_PATTERN, env),
    temperature: toNumber("REFLOW_TEMPERATURE", env.REFLOW_TEMPERATURE ?? null) ?? 0.2,
    maxRetries: toNumber("REFLOW_MAX_RETRIES", env.REFLOW_MAX_RETRIES ?? null) ?? 5,
    timeoutMs: toNumber("REFLOW_TIMEOUT_MS", env.REFLOW_TIMEOUT_MS ?? null) ?? 60_000,
    notify: !hasFlag(argv, "--no-notify") && optionalEnv("REFLOW_NOTIFY", "1", env) !== "0",
  };

  const parsed = ReformatConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`BLOCKED: invalid configuration (${detail})`);
  }
  return Object.freeze(parsed.data);
}
