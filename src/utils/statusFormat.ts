/**
 * One-line renderings of job statuses for the terminal.
 */

import type { JobProgress, JobStatus, JobSummary } from "../repositories/jobRepository.js";

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function formatProgress(progress: JobProgress | null): string {
  if (!progress) {
    return "";
  }
  if (progress.percent !== null) {
    return `${progress.percent}%`;
  }
  return `${(progress.downloadedBytes / 1024 / 1024).toFixed(1)}MB`;
}

export function formatStatusLine(status: JobStatus): string {
  const id = shortId(status.id);
  const label = status.title ?? status.sourceUrl;

  switch (status.state) {
    case "done":
      return `[${id}] ✓ ${label} → ${status.finalPath}`;
    case "failed": {
      const kind = status.error?.kind ?? "Internal";
      const message = status.error?.message ?? "unknown error";
      return `[${id}] ✗ ${label} (${kind}): ${message}`;
    }
    case "fetching": {
      const progress = formatProgress(status.progress);
      return progress ? `[${id}] fetching ${label} ${progress}` : `[${id}] fetching ${label}`;
    }
    default:
      return `[${id}] ${status.state} ${label}`;
  }
}

export function formatSummary(summary: JobSummary): string {
  return `submitted: ${summary.submitted}, active: ${summary.active}, done: ${summary.done}, failed: ${summary.failed}`;
}
