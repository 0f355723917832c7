/**
 * Temp Sweep Cron Job
 * Scheduled removal of stale job temp directories.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { Pipeline } from "../pipeline.js";
import { cleanupTempFiles } from "../../utils/cleanupTemp.js";

export interface TempSweepOptions {
  schedule: string;
  tempRoot: string;
  maxAgeHours: number;
}

/**
 * Starts the temp sweep. Directories of jobs that are still live are kept
 * whatever their age.
 */
export function startTempSweepJob(pipeline: Pipeline, options: TempSweepOptions): ScheduledTask {
  const { schedule, tempRoot, maxAgeHours } = options;

  if (!cron.validate(schedule)) {
    throw new Error(`Invalid TEMP_SWEEP_CRON schedule '${schedule}'`);
  }

  const task = cron.schedule(schedule, async () => {
    console.log("[Temp Sweep Job] Starting...");
    try {
      const result = await cleanupTempFiles(tempRoot, maxAgeHours, pipeline.activeIds());
      console.log(`[Temp Sweep Job] ✓ Removed ${result.removedDirs} dirs (${result.freedMB.toFixed(1)}MB)`);
    } catch (error) {
      console.error("[Temp Sweep Job] ✗ Failed:", error);
    }
  });

  console.log(`[Temp Sweep Job] Scheduled (${schedule}, max age ${maxAgeHours}h)`);
  return task;
}
