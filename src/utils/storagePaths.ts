/**
 * Path utilities for consistent output and temp file organization.
 * Output: <outputRoot>/<publisher>/<title>[ (n)].<ext>
 * Temp:   <tempRoot>/<jobId>/<role>.<container>
 */

import path from "path";

export const StoragePaths = {
  /** Publisher directory under the output root */
  publisherDir: (outputRoot: string, publisher: string) =>
    path.join(outputRoot, publisher),

  /** Final file name; the first candidate has no disambiguator, later ones get " (n)" */
  fileName: (title: string, ext: string, attempt: number) =>
    attempt <= 1 ? `${title}.${ext}` : `${title} (${attempt}).${ext}`,

  /** Private temp directory of one job */
  jobTempDir: (tempRoot: string, jobId: string) =>
    path.join(tempRoot, jobId),

  /** Downloaded stream inside a job temp dir: video.mp4, audio.m4a, combined.mp4 */
  tempStream: (jobTempDir: string, role: string, container: string) =>
    path.join(jobTempDir, `${role}.${container}`),

  /** Multiplexer output inside a job temp dir */
  mergedOutput: (jobTempDir: string, ext: string) =>
    path.join(jobTempDir, `merged.${ext}`),
} as const;
