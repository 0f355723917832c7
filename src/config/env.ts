/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a numeric variable is malformed.
 */

import os from "os";
import path from "path";

/** Server configuration */
export const PORT = getIntEnv("PORT", 3000, 1);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Output tree: <OUTPUT_ROOT>/<publisher>/<title>.<ext> */
export const OUTPUT_ROOT = path.resolve(process.env.OUTPUT_ROOT || ".");

/** Private per-job temp directories are created under this root */
export const TEMP_ROOT = path.resolve(process.env.TEMP_ROOT || path.join(os.tmpdir(), "media-shelf"));

/** Pipeline configuration */
export const MAX_CONCURRENT_JOBS = getIntEnv("MAX_CONCURRENT_JOBS", 3, 1);
/** Unset means no timeout: unattended downloads can run for hours */
export const STAGE_TIMEOUT_MS = getOptionalIntEnv("STAGE_TIMEOUT_MS", 1);
export const HISTORY_LIMIT = getIntEnv("HISTORY_LIMIT", 100, 0);

/** External tools */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
export const FFMPEG_PATH = process.env.FFMPEG_PATH || "ffmpeg";
export const YOUTUBE_COOKIES = process.env.YOUTUBE_COOKIES;

/** Temp sweep */
export const TEMP_MAX_AGE_HOURS = getIntEnv("TEMP_MAX_AGE_HOURS", 24, 0);
export const TEMP_SWEEP_CRON = process.env.TEMP_SWEEP_CRON || "0 * * * *";

/**
 * Reads an integer variable, falling back when unset.
 * Throws immediately if the value is not an integer >= min.
 */
function getIntEnv(key: string, fallback: number, min: number): number {
  return getOptionalIntEnv(key, min) ?? fallback;
}

function getOptionalIntEnv(key: string, min: number): number | null {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return null;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid environment variable ${key}: expected an integer >= ${min}, got '${raw}'`);
  }
  return value;
}
