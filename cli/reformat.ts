/**
 * CLI: reformat every pending chapter of a novel file.
 *
 * Usage:
 *   npx tsx cli/reformat.ts [--input data/novel.txt] [--output-dir data/output]
 *     [--checkpoint data/checkpoint.json] [--consolidated data/result.txt]
 *     [--model gpt-4.1-nano] [--rpm 10] [--max-chapters 20]
 *     [--dry-run] [--rebuild-only] [--no-notify]
 *
 * Exit codes: 0 ok, 1 fatal error, 2 finished with failed chapters.
 */

import { hasFlag, loadConfig } from "../src/config.js";
import { loadEnv } from "../src/env.js";
import { OpenAiCompletionClient } from "../src/llm.js";
import { desktopNotifier } from "../src/notify.js";
import { rebuildOnly, runBatch } from "../src/orchestrator.js";

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const envFile = loadEnv();
  if (envFile) console.log(`[reformat] Loaded env from ${envFile}`);

  const config = loadConfig(argv);
  const onComplete = config.notify ? desktopNotifier() : null;

  if (hasFlag(argv, "--rebuild-only")) {
    await rebuildOnly(config, onComplete);
    return 0;
  }

  const summary = await runBatch(config, {
    client: new OpenAiCompletionClient({ apiKey: config.apiKey, apiBase: config.apiBase }),
    onComplete,
    dryRun: hasFlag(argv, "--dry-run"),
  });

  console.log(
    `[reformat] Finished: ${summary.completed}/${summary.scheduled} done, ${summary.failed.length} failed, ${summary.skipped} skipped`
  );
  return summary.failed.length ? 2 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("[reformat] Fatal:", e);
    process.exit(1);
  }
);
