/**
 * Batch orchestrator.
 *
 * One run: split the input, drop checkpointed chapters, dispatch the rest
 * concurrently behind a shared rate limiter, then (only after every worker has
 * settled) checkpoint, rebuild the consolidated file and fire the completion hook.
 */

import * as fs from "node:fs";

import { rebuildConsolidated } from "./aggregator.js";
import { CheckpointStore } from "./checkpoint.js";
import type { ReformatConfig } from "./config.js";
import type { CompletionClient } from "./llm.js";
import { RateLimiter, systemClock } from "./rate-limiter.js";
import { compileHeadingPattern, splitChapters } from "./splitter.js";
import type { Chapter, Clock, RunCompletionHook, RunSummary } from "./types.js";
import { isChapterSuccess } from "./types.js";
import { reformatChapter } from "./worker.js";

export interface RunOptions {
  client: CompletionClient;
  clock?: Clock;
  onComplete?: RunCompletionHook | null;
  dryRun?: boolean;
}

export function selectPending(
  chapters: Iterable<Chapter>,
  done: Readonly<Record<string, unknown>>,
  maxChapters: number | null
): { pending: Chapter[]; found: number; skipped: number } {
  const pending: Chapter[] = [];
  let found = 0;
  let skipped = 0;
  for (const ch of chapters) {
    found++;
    if (Object.prototype.hasOwnProperty.call(done, ch.title)) {
      skipped++;
      console.log(`[reformat] Skip (checkpointed): ${ch.title}`);
      continue;
    }
    if (maxChapters != null && pending.length >= maxChapters) continue;
    pending.push(ch);
  }
  return { pending, found, skipped };
}

async function fireCompletion(hook: RunCompletionHook | null | undefined, summary: RunSummary): Promise<void> {
  if (!hook) return;
  try {
    await hook(summary);
  } catch (e) {
    console.warn(`[reformat] Completion hook failed: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export async function runBatch(config: ReformatConfig, opts: RunOptions): Promise<RunSummary> {
  const clock = opts.clock ?? systemClock;
  const text = fs.readFileSync(config.inputPath, "utf8");
  fs.mkdirSync(config.outputDir, { recursive: true });

  const store = new CheckpointStore(config.checkpointPath);
  const checkpoint = store.load();
  const pattern = compileHeadingPattern(config.chapterPattern);
  const { pending, found, skipped } = selectPending(splitChapters(text, pattern), checkpoint, config.maxChapters);

  console.log(
    `[reformat] ${found} chapters found, ${skipped} already done, ${pending.length} scheduled (rpm=${config.requestsPerMinute}, model=${config.model})`
  );

  if (opts.dryRun) {
    for (const ch of pending) console.log(`[reformat] Would process: ${ch.ordinal} ${ch.title}`);
    return { found, skipped, scheduled: pending.length, completed: 0, failed: [], rows: [], aggregated: 0, dryRun: true };
  }

  const limiter = new RateLimiter(config.requestsPerMinute, 60_000, clock);
  const outcomes = await Promise.all(
    pending.map((chapter) =>
      reformatChapter(chapter, {
        client: opts.client,
        limiter,
        clock,
        outputDir: config.outputDir,
        model: config.model,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
      })
    )
  );

  const succeeded = outcomes.filter(isChapterSuccess);
  for (const o of succeeded) checkpoint[o.title] = "done";
  store.save(checkpoint);

  const failed = outcomes.filter((o) => !o.ok).map((o) => o.title);
  if (failed.length) {
    console.warn(`[reformat] ${failed.length} chapters failed this run and will be retried next run: ${failed.join(", ")}`);
  }

  const aggregated = rebuildConsolidated(config.outputDir, config.consolidatedPath);
  const summary: RunSummary = {
    found,
    skipped,
    scheduled: pending.length,
    completed: succeeded.length,
    failed,
    rows: succeeded.map((o) => o.row),
    aggregated,
    dryRun: false,
  };
  await fireCompletion(opts.onComplete, summary);
  return summary;
}

/** Rebuild the consolidated file from existing chapter files only. */
export async function rebuildOnly(
  config: Pick<ReformatConfig, "outputDir" | "consolidatedPath">,
  onComplete?: RunCompletionHook | null
): Promise<RunSummary> {
  const aggregated = rebuildConsolidated(config.outputDir, config.consolidatedPath);
  const summary: RunSummary = {
    found: 0,
    skipped: 0,
    scheduled: 0,
    completed: 0,
    failed: [],
    rows: [],
    aggregated,
    dryRun: false,
  };
  await fireCompletion(onComplete, summary);
  return summary;
}
