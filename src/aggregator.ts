import * as fs from "node:fs";
import * as path from "node:path";

const ORDINAL_PREFIX = /^\d{4,} /;

function ordinalOf(fileName: string): number {
  const m = /^(\d+) /.exec(fileName);
  return m ? Number(m[1]) : Number.POSITIVE_INFINITY;
}

/** Ordinal order; ordinals past 9999 outgrow the padding, so compare numbers, not text. */
export function compareChapterFiles(a: string, b: string): number {
  const oa = ordinalOf(a);
  const ob = ordinalOf(b);
  if (oa !== ob) return oa < ob ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface ConsolidatedBlock {
  title: string;
  content: string;
}

export function readChapterFile(filePath: string): ConsolidatedBlock {
  const lines = fs.readFileSync(filePath, "utf8").split(/\r?\n/);
  return {
    title: (lines[0] ?? "").trim().replace(ORDINAL_PREFIX, ""),
    content: lines.slice(2).join("\n").trim(),
  };
}

export function listChapterFiles(outputDir: string): string[] {
  if (!fs.existsSync(outputDir)) return [];
  return fs
    .readdirSync(outputDir)
    .filter((f) => f.endsWith(".txt"))
    .sort(compareChapterFiles)
    .map((f) => path.join(outputDir, f));
}

/**
 * Rebuild the consolidated file from every chapter file in `outputDir`.
 * Always a full rewrite, never an append. Returns the number of blocks.
 */
export function rebuildConsolidated(outputDir: string, consolidatedPath: string): number {
  const target = path.resolve(consolidatedPath);
  const blocks = listChapterFiles(outputDir)
    .filter((f) => path.resolve(f) !== target)
    .map(readChapterFile);
  const text = blocks.map((b) => `${b.title}\n${b.content}\n\n`).join("");

  fs.mkdirSync(path.dirname(path.resolve(consolidatedPath)), { recursive: true });
  fs.writeFileSync(consolidatedPath, text, "utf8");
  console.log(`[aggregate] Rebuilt ${consolidatedPath} with ${blocks.length} chapters`);
  return blocks.length;
}
