import * as dotenv from "dotenv";
import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Load the first env file found (explicit path, $ENV_FILE, then .env.local / .env
 * in the working directory). Variables already present in the process win.
 * Returns the path that was loaded, or null.
 */
export function loadEnv(opts?: { envFile?: string; cwd?: string }): string | null {
  const cwd = opts?.cwd ?? process.cwd();
  const candidates = [
    String(opts?.envFile || "").trim() || null,
    String(process.env.ENV_FILE || "").trim() || null,
    path.resolve(cwd, ".env.local"),
    path.resolve(cwd, ".env"),
  ].filter((x): x is string => !!x);

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p, override: false });
      return p;
    }
  }
  return null;
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) {
    throw new Error(`BLOCKED: env var ${name} is REQUIRED`);
  }
  return v.trim();
}

export function optionalEnv(name: string, fallback: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) return fallback;
  return v.trim();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
