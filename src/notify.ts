import { spawn } from "node:child_process";

import type { RunCompletionHook, RunSummary } from "./types.js";

export function summaryMessage(summary: RunSummary): string {
  const failed = summary.failed.length ? `, ${summary.failed.length} failed` : "";
  return `${summary.completed}/${summary.scheduled} chapters reformatted${failed}; ${summary.aggregated} in result file`;
}

function notifierCommand(title: string, message: string): [string, string[]] | null {
  if (process.platform === "darwin") {
    const esc = (s: string) => s.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
    return ["osascript", ["-e", `display notification "${esc(message)}" with title "${esc(title)}"`]];
  }
  if (process.platform === "linux") return ["notify-send", [title, message]];
  return null;
}

/**
 * Fire-and-forget desktop notification. Missing notifier binaries are logged,
 * never thrown.
 */
export function desktopNotifier(title = "novel-reflow"): RunCompletionHook {
  return (summary) => {
    const message = summaryMessage(summary);
    const cmd = notifierCommand(title, message);
    if (!cmd) {
      console.log(`[notify] ${title}: ${message}`);
      return;
    }
    const child = spawn(cmd[0], cmd[1], { stdio: "ignore", detached: true });
    child.on("error", (e) => console.warn(`[notify] ${cmd[0]} failed: ${e.message}`));
    child.unref();
  };
}
