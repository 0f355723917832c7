/**
 * CLI Controller
 * Interprets one line of interactive input: a URL to download, or a command.
 */

import type { Pipeline } from "../jobs/pipeline.js";
import type { JobStatus } from "../repositories/jobRepository.js";
import { formatStatusLine, formatSummary, shortId } from "../utils/statusFormat.js";

export type LineOutcome = "continue" | "quit";

export const HELP_TEXT = "Enter a video URL per line. Commands: jobs, cancel <id-prefix>, quit";

export function handleInputLine(pipeline: Pipeline, line: string, print: (text: string) => void): LineOutcome {
  const input = line.trim();
  if (!input) {
    return "continue";
  }

  const [command, ...args] = input.split(/\s+/);
  switch (command.toLowerCase()) {
    case "quit":
    case "exit":
      return "quit";
    case "help":
      print(HELP_TEXT);
      return "continue";
    case "jobs":
      for (const status of pipeline.jobs()) {
        print(formatStatusLine(status));
      }
      print(formatSummary(pipeline.summary()));
      return "continue";
    case "cancel":
      cancelByPrefix(pipeline, args[0] ?? "", print);
      return "continue";
    default:
      pipeline.submit(input);
      return "continue";
  }
}

function cancelByPrefix(pipeline: Pipeline, prefix: string, print: (text: string) => void): void {
  if (!prefix) {
    print("Usage: cancel <id-prefix>");
    return;
  }

  const matches = [...pipeline.activeIds()].filter((id) => id.startsWith(prefix));
  if (matches.length === 0) {
    print(`No active job matches '${prefix}'`);
    return;
  }
  if (matches.length > 1) {
    print(`Ambiguous id prefix '${prefix}' (${matches.length} jobs)`);
    return;
  }

  pipeline.cancel(matches[0]);
  print(`Cancelling ${shortId(matches[0])}`);
}

/**
 * Keeps terminal output to state changes and 10% progress steps.
 */
export function createStatusPrinter(print: (text: string) => void): (status: JobStatus) => void {
  const lastKey = new Map<string, string>();

  return (status) => {
    const step = status.state === "fetching" && status.progress?.percent != null ? Math.floor(status.progress.percent / 10) : "";
    const key = `${status.state}:${step}`;
    if (lastKey.get(status.id) === key) {
      return;
    }

    if (status.state === "done" || status.state === "failed") {
      lastKey.delete(status.id);
    } else {
      lastKey.set(status.id, key);
    }
    print(formatStatusLine(status));
  };
}
