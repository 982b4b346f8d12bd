/**
 * Shared types for the reformat batch.
 */

export interface Chapter {
  readonly title: string;
  /** 1-based position of the heading in the source document */
  readonly ordinal: number;
  readonly body: string;
}

export type ChapterStatus = "done";

export type Checkpoint = Record<string, ChapterStatus>;

export interface ChapterSuccess {
  ok: true;
  title: string;
  ordinal: number;
  outputPath: string;
  /** title + "\t" + result with newlines escaped, one line per chapter */
  row: string;
}

export interface ChapterFailure {
  ok: false;
  title: string;
  ordinal: number;
  attempts: number;
  error: string;
}

export type ChapterOutcome = ChapterSuccess | ChapterFailure;

export interface RunSummary {
  found: number;
  skipped: number;
  scheduled: number;
  completed: number;
  failed: string[];
  rows: string[];
  aggregated: number;
  dryRun: boolean;
}

export type RunCompletionHook = (summary: RunSummary) => void | Promise<void>;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function isChapterSuccess(v: ChapterOutcome): v is ChapterSuccess {
  return v.ok;
}
