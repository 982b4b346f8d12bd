import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { ReformatConfig } from "../src/config.js";
import { DEFAULT_CHAPTER_PATTERN } from "../src/config.js";
import type { CompletionClient, CompletionRequest } from "../src/llm.js";
import type { Clock } from "../src/types.js";

/** Virtual clock: sleep advances time instead of waiting. */
export class FakeClock implements Clock {
  t = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
    return Promise.resolve();
  }
}

export type Reply = string | Error;

/** Completion client that answers from a handler and records every request. */
export class FakeClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly handler: (req: CompletionRequest, call: number) => Reply) {}

  static scripted(replies: Reply[]): FakeClient {
    return new FakeClient((_req, call) => replies[Math.min(call, replies.length - 1)] ?? new Error("no reply scripted"));
  }

  async complete(req: CompletionRequest): Promise<string> {
    const call = this.requests.length;
    this.requests.push(req);
    const reply = this.handler(req, call);
    if (reply instanceof Error) throw reply;
    return reply.trim();
  }
}

export function makeTmpDir(prefix = "novel-reflow-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(dir: string, overrides: Partial<ReformatConfig> = {}): ReformatConfig {
  return {
    apiKey: "test-key",
    apiBase: "http://localhost:0/v1",
    model: "test-model",
    inputPath: path.join(dir, "novel.txt"),
    outputDir: path.join(dir, "output"),
    checkpointPath: path.join(dir, "checkpoint.json"),
    consolidatedPath: path.join(dir, "result.txt"),
    maxChapters: null,
    requestsPerMinute: 10,
    chapterPattern: DEFAULT_CHAPTER_PATTERN,
    temperature: 0.2,
    maxRetries: 5,
    timeoutMs: 60_000,
    notify: false,
    ...overrides,
  };
}

/** The prose a request carries, i.e. the user message minus the instruction. */
export function requestBody(req: CompletionRequest): string {
  const user = req.messages.find((m) => m.role === "user");
  const content = user?.content ?? "";
  const idx = content.indexOf("\n\n");
  return idx >= 0 ? content.slice(idx + 2) : content;
}
