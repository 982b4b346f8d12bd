import { ConfigError } from "./config.js";
import type { Chapter } from "./types.js";

function countCaptureGroups(re: RegExp): number {
  // An alternation with the empty string always matches, exposing every group slot.
  const m = new RegExp(`${re.source}|`, re.flags.replace("g", "")).exec("");
  return m ? m.length - 1 : 0;
}

/**
 * Compile a heading pattern for use as a split delimiter. The heading must be
 * the pattern's one capture group; a pattern without groups is wrapped whole.
 */
export function compileHeadingPattern(source: string): RegExp {
  let re: RegExp;
  try {
    re = new RegExp(source);
  } catch (e) {
    throw new ConfigError(`BLOCKED: chapter pattern is not a valid regex: ${e instanceof Error ? e.message : String(e)}`);
  }
  const groups = countCaptureGroups(re);
  if (groups === 0) return new RegExp(`(${source})`);
  if (groups > 1) {
    throw new ConfigError(`BLOCKED: chapter pattern must have exactly one capture group, found ${groups}`);
  }
  return re;
}

export function normalizeBody(raw: string): string {
  return raw.trim().replace(/(?:\r?\n)+/g, " ");
}

/**
 * Lazily split a document into chapters. The scan stays one heading ahead of
 * the chapter being yielded. Text before the first heading is dropped.
 */
export function* splitChapters(text: string, pattern: RegExp): Generator<Chapter> {
  const re = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
  const matches = text.matchAll(re);
  let current = matches.next();
  let ordinal = 0;
  while (!current.done) {
    const m = current.value;
    const next = matches.next();
    const bodyStart = (m.index ?? 0) + m[0].length;
    const bodyEnd = next.done ? text.length : next.value.index ?? text.length;
    ordinal++;
    yield Object.freeze({
      title: (m[1] ?? "").trim(),
      ordinal,
      body: normalizeBody(text.slice(bodyStart, bodyEnd)),
    });
    current = next;
  }
}
