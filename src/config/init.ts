/**
 * Application Initialization
 * Prepares directories, sweeps stale temp dirs, probes ffmpeg once and
 * wires the pipeline's services. Shared by the CLI and the HTTP server.
 */

import { mkdir } from "fs/promises";
import { Pipeline } from "../jobs/pipeline.js";
import { createYtDlpResolver, initializeCookies } from "../services/external/ytdlp.js";
import { probeFfmpeg } from "../services/external/ffmpeg.js";
import { createFetcher } from "../services/business/downloadService.js";
import { createMerger } from "../services/business/mergeService.js";
import { createOrganizer } from "../services/business/organizeService.js";
import { cleanupTempFiles, getTempDiskUsage } from "../utils/cleanupTemp.js";
import type { ToolStatus } from "../types/media.js";
import {
  FFMPEG_PATH,
  HISTORY_LIMIT,
  MAX_CONCURRENT_JOBS,
  OUTPUT_ROOT,
  STAGE_TIMEOUT_MS,
  TEMP_MAX_AGE_HOURS,
  TEMP_ROOT,
  YOUTUBE_COOKIES,
  YTDLP_PATH,
} from "./env.js";

export interface AppContext {
  pipeline: Pipeline;
  toolStatus: ToolStatus;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<AppContext> {
  console.log("Initializing application...");

  try {
    await mkdir(OUTPUT_ROOT, { recursive: true });
    await mkdir(TEMP_ROOT, { recursive: true });

    // Remove job dirs left behind by a crashed process
    const before = await getTempDiskUsage(TEMP_ROOT);
    console.log(`[cleanup] Temp disk usage: ${before.usedMB.toFixed(0)}MB (${before.files} files)`);
    await cleanupTempFiles(TEMP_ROOT, TEMP_MAX_AGE_HOURS);
    const after = await getTempDiskUsage(TEMP_ROOT);
    console.log(`[cleanup] After cleanup: ${after.usedMB.toFixed(0)}MB (${after.files} files)`);

    const cookiesPath = await initializeCookies(YOUTUBE_COOKIES, TEMP_ROOT);
    const toolStatus = await probeFfmpeg(FFMPEG_PATH);

    const pipeline = new Pipeline(
      {
        resolver: createYtDlpResolver({ binaryPath: YTDLP_PATH, cookiesPath }),
        fetcher: createFetcher(),
        merger: createMerger({ toolStatus, ffmpegPath: FFMPEG_PATH }),
        organizer: createOrganizer({ outputRoot: OUTPUT_ROOT }),
      },
      {
        concurrency: MAX_CONCURRENT_JOBS,
        tempRoot: TEMP_ROOT,
        stageTimeoutMs: STAGE_TIMEOUT_MS,
        historyLimit: HISTORY_LIMIT,
      }
    );

    console.log(`✓ Application initialized (output: ${OUTPUT_ROOT}, workers: ${MAX_CONCURRENT_JOBS})\n`);
    return { pipeline, toolStatus };
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
