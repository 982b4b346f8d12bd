import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { describe, it } from "node:test";

import { CheckpointStore } from "../src/checkpoint.js";
import { CompletionHttpError } from "../src/llm.js";
import { rebuildOnly, runBatch } from "../src/orchestrator.js";
import type { RunSummary } from "../src/types.js";
import { FakeClient, FakeClock, makeTmpDir, requestBody, testConfig } from "./helpers.js";

const EXAMPLE = "第1章 起（序）\n正文一\n第2章 终（尾）\n正文二\n";
const T1 = "第1章 起（序）";
const T2 = "第2章 终（尾）";
const T3 = "第3章 续（后）";

function echoClient() {
  return new FakeClient((req) => {
    const body = requestBody(req);
    return `${body}-甲\n${body}-乙`;
  });
}

function setup(doc: string) {
  const dir = makeTmpDir();
  const config = testConfig(dir);
  fs.writeFileSync(config.inputPath, doc, "utf8");
  return { dir, config };
}

describe("runBatch", () => {
  it("processes the two-chapter example end to end", async () => {
    const { config } = setup(EXAMPLE);
    const client = echoClient();
    const summary = await runBatch(config, { client, clock: new FakeClock() });

    assert.deepEqual(summary, {
      found: 2,
      skipped: 0,
      scheduled: 2,
      completed: 2,
      failed: [],
      rows: [`${T1}\t正文一-甲\\n正文一-乙`, `${T2}\t正文二-甲\\n正文二-乙`],
      aggregated: 2,
      dryRun: false,
    });
    assert.deepEqual(new CheckpointStore(config.checkpointPath).load(), { [T1]: "done", [T2]: "done" });
    assert.deepEqual(fs.readdirSync(config.outputDir), [`0001 ${T1}.txt`, `0002 ${T2}.txt`]);
    assert.equal(
      fs.readFileSync(path.join(config.outputDir, `0001 ${T1}.txt`), "utf8"),
      `${T1}\n\n正文一-甲\n正文一-乙`
    );
    assert.equal(
      fs.readFileSync(config.consolidatedPath, "utf8"),
      `${T1}\n正文一-甲\n正文一-乙\n\n${T2}\n正文二-甲\n正文二-乙\n\n`
    );
  });

  it("never dispatches a checkpointed chapter", async () => {
    const { config } = setup(EXAMPLE);
    await runBatch(config, { client: echoClient(), clock: new FakeClock() });

    const again = echoClient();
    const summary = await runBatch(config, { client: again, clock: new FakeClock() });

    assert.equal(again.requests.length, 0);
    assert.equal(summary.skipped, 2);
    assert.equal(summary.scheduled, 0);
    assert.equal(summary.aggregated, 2);
  });

  it("resumes only the missing chapter and keeps its document ordinal", async () => {
    const { config } = setup(EXAMPLE);
    new CheckpointStore(config.checkpointPath).save({ [T1]: "done" });
    fs.mkdirSync(config.outputDir, { recursive: true });
    fs.writeFileSync(path.join(config.outputDir, `0001 ${T1}.txt`), `${T1}\n\n旧结果`, "utf8");

    const client = echoClient();
    await runBatch(config, { client, clock: new FakeClock() });

    assert.deepEqual(client.requests.map(requestBody), ["正文二"]);
    assert.deepEqual(fs.readdirSync(config.outputDir), [`0001 ${T1}.txt`, `0002 ${T2}.txt`]);
    assert.equal(
      fs.readFileSync(config.consolidatedPath, "utf8"),
      `${T1}\n旧结果\n\n${T2}\n正文二-甲\n正文二-乙\n\n`
    );
  });

  it("leaves a chapter that exhausts its retries out of the checkpoint", async () => {
    const { config } = setup(EXAMPLE);
    const client = new FakeClient((req) =>
      requestBody(req) === "正文二" ? new CompletionHttpError(429, "slow down") : "好"
    );
    const summary = await runBatch({ ...config, maxRetries: 2 }, { client, clock: new FakeClock() });

    assert.deepEqual(summary.failed, [T2]);
    assert.equal(summary.completed, 1);
    assert.deepEqual(new CheckpointStore(config.checkpointPath).load(), { [T1]: "done" });
    assert.deepEqual(fs.readdirSync(config.outputDir), [`0001 ${T1}.txt`]);
  });

  it("caps the number of new chapters, in document order", async () => {
    const { config } = setup(`${EXAMPLE}${T3}\n正文三\n`);
    new CheckpointStore(config.checkpointPath).save({ [T1]: "done" });

    const client = echoClient();
    const summary = await runBatch({ ...config, maxChapters: 1 }, { client, clock: new FakeClock() });

    assert.deepEqual(client.requests.map(requestBody), ["正文二"]);
    assert.equal(summary.found, 3);
    assert.equal(summary.scheduled, 1);
  });

  it("keeps dispatches under the per-minute quota", async () => {
    const titles = Array.from({ length: 7 }, (_, i) => `第${i + 1}章 章${i + 1}（题）`);
    const { config } = setup(titles.map((t, i) => `${t}\n内容${i + 1}\n`).join(""));
    const clock = new FakeClock();
    const stamps: number[] = [];
    const client = new FakeClient(() => {
      stamps.push(clock.now());
      return "好";
    });

    const summary = await runBatch({ ...config, requestsPerMinute: 3 }, { client, clock });

    assert.equal(summary.completed, 7);
    assert.deepEqual(stamps, [0, 0, 0, 60_000, 60_000, 60_000, 120_000]);
  });

  it("treats a document without headings as an empty batch", async () => {
    const { config } = setup("没有章节标题的文字\n");
    const client = echoClient();
    const summary = await runBatch(config, { client, clock: new FakeClock() });

    assert.equal(summary.found, 0);
    assert.equal(client.requests.length, 0);
    assert.deepEqual(new CheckpointStore(config.checkpointPath).load(), {});
    assert.equal(fs.readFileSync(config.consolidatedPath, "utf8"), "");
  });

  it("does not let a failing completion hook affect the run", async () => {
    const { config } = setup(EXAMPLE);
    const seen: RunSummary[] = [];
    const summary = await runBatch(config, {
      client: echoClient(),
      clock: new FakeClock(),
      onComplete: (s) => {
        seen.push(s);
        throw new Error("no notifier");
      },
    });

    assert.equal(summary.completed, 2);
    assert.deepEqual(seen, [summary]);
  });

  it("touches nothing on a dry run", async () => {
    const { config } = setup(EXAMPLE);
    const client = echoClient();
    const summary = await runBatch(config, { client, clock: new FakeClock(), dryRun: true });

    assert.equal(summary.scheduled, 2);
    assert.equal(summary.dryRun, true);
    assert.equal(client.requests.length, 0);
    assert.equal(fs.existsSync(config.checkpointPath), false);
    assert.equal(fs.existsSync(config.consolidatedPath), false);
  });

  it("fails the run when the input file is missing", async () => {
    const dir = makeTmpDir();
    await assert.rejects(() => runBatch(testConfig(dir), { client: echoClient() }), { code: "ENOENT" });
  });
});

describe("rebuildOnly", () => {
  it("rebuilds the consolidated file without calling the API", async () => {
    const { config } = setup(EXAMPLE);
    fs.mkdirSync(config.outputDir, { recursive: true });
    fs.writeFileSync(path.join(config.outputDir, `0002 ${T2}.txt`), `${T2}\n\n尾`, "utf8");

    const summary = await rebuildOnly(config);
    assert.equal(summary.aggregated, 1);
    assert.equal(fs.readFileSync(config.consolidatedPath, "utf8"), `${T2}\n尾\n\n`);
  });
});
