/**
 * Cleanup utility for temporary files
 * Runs on startup and on a schedule to clear job dirs left by a crashed process.
 */

import { readdir, rm, stat } from "fs/promises";
import path from "path";

export interface CleanupResult {
  removedDirs: number;
  removedFiles: number;
  freedMB: number;
}

export interface DiskUsage {
  usedMB: number;
  files: number;
}

/**
 * Removes job temp directories under tempRoot older than maxAgeHours.
 * Directories named in `keep` (jobs still running) are never touched.
 */
export async function cleanupTempFiles(
  tempRoot: string,
  maxAgeHours: number = 24,
  keep: ReadonlySet<string> = new Set()
): Promise<CleanupResult> {
  const result: CleanupResult = { removedDirs: 0, removedFiles: 0, freedMB: 0 };

  let entries: string[];
  try {
    entries = await readdir(tempRoot);
  } catch {
    console.log("[cleanup] No temp directory found, nothing to clean");
    return result;
  }

  console.log(`[cleanup] Scanning ${tempRoot} for old job dirs...`);

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  for (const entry of entries) {
    if (keep.has(entry)) {
      continue;
    }
    const jobDir = path.join(tempRoot, entry);

    try {
      const stats = await stat(jobDir);
      if (!stats.isDirectory()) {
        continue;
      }

      const ageMs = now - stats.mtimeMs;
      if (ageMs < maxAgeMs) {
        continue;
      }

      const usage = await measureDir(jobDir);
      await rm(jobDir, { recursive: true, force: true });
      result.removedDirs++;
      result.removedFiles += usage.files;
      result.freedMB += usage.usedMB;
      console.log(`[cleanup] Removed old temp directory: ${entry} (${(ageMs / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry}:`, err);
    }
  }

  console.log(
    `[cleanup] ✓ Removed ${result.removedDirs} directories, ${result.removedFiles} files, freed ${result.freedMB.toFixed(0)}MB`
  );
  return result;
}

/**
 * Get disk usage of the temp root
 */
export async function getTempDiskUsage(tempRoot: string): Promise<DiskUsage> {
  try {
    return await measureDir(tempRoot);
  } catch {
    return { usedMB: 0, files: 0 };
  }
}

async function measureDir(dir: string): Promise<DiskUsage> {
  let totalBytes = 0;
  let totalFiles = 0;

  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = await measureDir(entryPath);
      totalBytes += nested.usedMB * 1024 * 1024;
      totalFiles += nested.files;
    } else {
      totalBytes += (await stat(entryPath)).size;
      totalFiles++;
    }
  }

  return {
    usedMB: totalBytes / (1024 * 1024),
    files: totalFiles,
  };
}
