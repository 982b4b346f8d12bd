/**
 * Chat-completion client used by the reformat workers.
 *
 * Talks to any OpenAI-compatible endpoint through the openai SDK. SDK-level
 * retries are off: the worker owns retry and back-off policy, and needs to
 * see 429s as they happen.
 */

import { APIError, OpenAI } from "openai";

export type LlmChatMessage = { role: "system" | "user"; content: string };

export interface CompletionRequest {
  model: string;
  temperature: number;
  messages: LlmChatMessage[];
  timeoutMs: number;
}

export interface CompletionClient {
  /** Resolves with the first choice's content, trimmed. */
  complete(req: CompletionRequest): Promise<string>;
}

export class CompletionHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`HTTP ${status}: ${body.slice(0, 500)}`);
    this.name = "CompletionHttpError";
  }
}

export function isRateLimited(e: unknown): boolean {
  return e instanceof CompletionHttpError && e.status === 429;
}

export class OpenAiCompletionClient implements CompletionClient {
  private readonly openai: OpenAI;

  constructor(opts: { apiKey: string; apiBase: string }) {
    this.openai = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.apiBase, maxRetries: 0 });
  }

  async complete(req: CompletionRequest): Promise<string> {
    let resp: OpenAI.ChatCompletion;
    try {
      resp = await this.openai.chat.completions.create(
        {
          model: req.model,
          temperature: req.temperature,
          messages: req.messages.map((m) =>
            m.role === "system"
              ? { role: "system" as const, content: m.content }
              : { role: "user" as const, content: m.content }
          ),
        },
        { timeout: req.timeoutMs }
      );
    } catch (e) {
      if (e instanceof APIError && typeof e.status === "number") {
        throw new CompletionHttpError(e.status, e.error !== undefined ? JSON.stringify(e.error) : e.message);
      }
      throw e;
    }
    return extractCompletionText(resp);
  }
}

export function extractCompletionText(resp: { choices?: Array<{ message?: { content?: string | null } }> }): string {
  const content = resp.choices?.[0]?.message?.content;
  if (typeof content !== "string" || !content.trim()) {
    throw new Error("Completion response has no message content");
  }
  return content.trim();
}
