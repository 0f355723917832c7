#!/usr/bin/env node
/**
 * Interactive Entry Point
 * Reads one URL per line from stdin and downloads each in the background.
 * End of input (or `quit`) waits for running jobs before exiting.
 */
import "dotenv/config";
import readline from "readline";
import { initializeApp } from "./config/init.js";
import { startTempSweepJob } from "./jobs/crons/tempSweep.js";
import { HELP_TEXT, createStatusPrinter, handleInputLine } from "./controllers/cliController.js";
import { formatSummary } from "./utils/statusFormat.js";
import { TEMP_MAX_AGE_HOURS, TEMP_ROOT, TEMP_SWEEP_CRON } from "./config/env.js";

async function main(): Promise<void> {
  const { pipeline } = await initializeApp();
  const sweep = startTempSweepJob(pipeline, {
    schedule: TEMP_SWEEP_CRON,
    tempRoot: TEMP_ROOT,
    maxAgeHours: TEMP_MAX_AGE_HOURS,
  });

  const print = (text: string) => console.log(text);
  const unsubscribe = pipeline.onUpdate(createStatusPrinter(print));
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  let interrupted = false;
  const interrupt = () => {
    if (interrupted) {
      return;
    }
    interrupted = true;
    console.log("\n[cli] Interrupted, cancelling jobs...");
    rl.close();
    pipeline.shutdown().catch((error) => console.error("[cli] ✗ Shutdown failed:", error));
  };
  rl.on("SIGINT", interrupt);
  process.on("SIGINT", interrupt);

  print(HELP_TEXT);
  for await (const line of rl) {
    if (handleInputLine(pipeline, line, print) === "quit") {
      break;
    }
  }
  rl.close();

  const remaining = pipeline.summary().active;
  if (remaining > 0) {
    console.log(`[cli] Waiting for ${remaining} job(s) to finish...`);
  }
  await pipeline.drain();

  sweep.stop();
  unsubscribe();
  console.log(`[cli] ${formatSummary(pipeline.summary())}`);
}

main().catch((error) => {
  console.error("✗ Fatal error:", error);
  process.exit(1);
});
