import * as fs from "node:fs";
import * as path from "node:path";

import { isRateLimited, type CompletionClient, type LlmChatMessage } from "./llm.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { Chapter, ChapterOutcome, Clock } from "./types.js";

export const SYSTEM_PROMPT = "你是一个专业的中文网络小说编辑助手。";

export const RESEGMENT_INSTRUCTION =
  "请将以下文本重新自然分段，每段不超过40个汉字，并保持语义完整。" + "每段换行输出，不添加任何前缀或注释：\n\n";

const RATE_LIMIT_BACKOFF_MS = 30_000;
const ERROR_BACKOFF_MS = 5_000;

export interface WorkerContext {
  client: CompletionClient;
  limiter: RateLimiter;
  clock: Clock;
  outputDir: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
}

export function buildMessages(body: string): LlmChatMessage[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: RESEGMENT_INSTRUCTION + body },
  ];
}

export function numberedTitle(chapter: Pick<Chapter, "title" | "ordinal">): string {
  return `${String(chapter.ordinal).padStart(4, "0")} ${chapter.title}`;
}

export function chapterOutputPath(outputDir: string, chapter: Pick<Chapter, "title" | "ordinal">): string {
  return path.join(outputDir, `${numberedTitle(chapter).replace(/[\\/]/g, "_")}.txt`);
}

export function escapeNewlines(s: string): string {
  return s.replace(/\r?\n/g, "\\n");
}

/**
 * Reformat one chapter. Never throws for API trouble: after `maxRetries`
 * failed attempts it returns a failure outcome and writes nothing. Errors
 * writing the output file do propagate.
 */
export async function reformatChapter(chapter: Chapter, ctx: WorkerContext): Promise<ChapterOutcome> {
  const label = numberedTitle(chapter);
  const messages = buildMessages(chapter.body);
  let lastError = "";

  for (let attempt = 1; attempt <= ctx.maxRetries; attempt++) {
    let result: string;
    try {
      await ctx.limiter.acquire();
      result = await ctx.client.complete({
        model: ctx.model,
        temperature: ctx.temperature,
        messages,
        timeoutMs: ctx.timeoutMs,
      });
    } catch (e) {
      lastError = e instanceof Error ? e.message : String(e);
      if (attempt === ctx.maxRetries) break;

      if (isRateLimited(e)) {
        const wait = RATE_LIMIT_BACKOFF_MS * attempt;
        console.warn(`[worker] ${label}: 429 rate limited, waiting ${wait / 1000}s (attempt ${attempt}/${ctx.maxRetries})`);
        await ctx.clock.sleep(wait);
      } else {
        console.warn(`[worker] ${label}: attempt ${attempt}/${ctx.maxRetries} failed: ${lastError}`);
        await ctx.clock.sleep(ERROR_BACKOFF_MS * attempt);
      }
      continue;
    }

    const outputPath = chapterOutputPath(ctx.outputDir, chapter);
    fs.writeFileSync(outputPath, `${chapter.title}\n\n${result}`, "utf8");
    console.log(`[worker] Done: ${label}`);
    return {
      ok: true,
      title: chapter.title,
      ordinal: chapter.ordinal,
      outputPath,
      row: `${chapter.title}\t${escapeNewlines(result)}`,
    };
  }

  console.error(`[worker] ${label}: giving up after ${ctx.maxRetries} attempts: ${lastError}`);
  return {
    ok: false,
    title: chapter.title,
    ordinal: chapter.ordinal,
    attempts: ctx.maxRetries,
    error: lastError,
  };
}
