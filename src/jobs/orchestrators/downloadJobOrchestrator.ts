/**
 * Download Job Orchestrator
 * Coordinates one job's workflow:
 * Resolve → Fetch (video + audio concurrently) → Merge → Organize
 *
 * Stages run strictly in order. Cancellation is checked at every stage
 * boundary, and the job's temp directory is removed on every exit path.
 */

import { mkdir, rm } from "fs/promises";
import type { Job, JobState } from "../../repositories/jobRepository.js";
import type { StreamResolver } from "../../services/external/ytdlp.js";
import type { Fetcher } from "../../services/business/downloadService.js";
import type { Merger } from "../../services/business/mergeService.js";
import type { Organizer } from "../../services/business/organizeService.js";
import {
  outputContainer,
  selectStreams,
  selectedStreams,
} from "../../services/business/streamSelectionService.js";
import { PipelineError } from "../../utils/errors.js";
import { sanitizePublisher, sanitizeTitle } from "../../utils/pathNames.js";
import { StoragePaths } from "../../utils/storagePaths.js";
import type { StreamDescriptor, StreamKind, TempArtifact } from "../../types/media.js";

export interface JobServices {
  resolver: StreamResolver;
  fetcher: Fetcher;
  merger: Merger;
  organizer: Organizer;
}

export type StageState = Exclude<JobState, "queued" | "done" | "failed">;

export interface JobRunContext {
  /** Private temp directory; removed when the run ends */
  tempDir: string;
  /** null = no timeout */
  stageTimeoutMs: number | null;
  advance: (state: StageState) => void;
  /** Publishes changes to the job's fields (metadata, progress) */
  update: () => void;
}

/** Unknown totals are reported every this many bytes */
const PROGRESS_STEP_BYTES = 1024 * 1024;

/**
 * Runs every stage of one job and returns the final file path.
 */
export async function runDownloadJob(job: Job, services: JobServices, ctx: JobRunContext): Promise<string> {
  const { resolver, fetcher, merger, organizer } = services;
  const cancel = job.abort.signal;

  try {
    // 1. Resolve streams and pick the ones to download
    enterStage(job, "resolving", ctx);
    const media = await resolver.resolve(job.sourceUrl, stageSignal(cancel, ctx.stageTimeoutMs));
    const selection = selectStreams(media.streams);
    const parts = selectedStreams(selection);
    const destination = {
      publisher: sanitizePublisher(media.publisher),
      fileName: sanitizeTitle(media.title),
      ext: outputContainer(selection),
    };
    job.title = media.title;
    job.publisher = media.publisher;
    job.streams = parts.map((part) => part.descriptor);
    job.destination = destination;
    ctx.update();

    // 2. Download; no bandwidth is spent when the merge could never run
    if (selection.mode === "separate") {
      merger.assertAvailable();
    }
    enterStage(job, "fetching", ctx);
    await mkdir(ctx.tempDir, { recursive: true });
    const artifacts = await fetchAll(job, parts, fetcher, ctx);

    // 3. Merge (pass-through for a combined stream)
    enterStage(job, "merging", ctx);
    const mergedPath = await merger.merge({
      selection,
      artifacts,
      outputPath: StoragePaths.mergedOutput(ctx.tempDir, destination.ext),
      signal: stageSignal(cancel, ctx.stageTimeoutMs),
    });

    // 4. File under <publisher>/<title>.<ext>
    enterStage(job, "organizing", ctx);
    return await organizer.place({ ...destination, sourcePath: mergedPath });
  } finally {
    await releaseArtifacts(job, ctx.tempDir);
  }
}

/**
 * Downloads all parts concurrently. The first failure aborts the sibling
 * download; both are awaited before the error is rethrown.
 */
async function fetchAll(
  job: Job,
  parts: Array<{ role: StreamKind; descriptor: StreamDescriptor }>,
  fetcher: Fetcher,
  ctx: JobRunContext
): Promise<TempArtifact[]> {
  const siblings = new AbortController();
  const signal = AbortSignal.any([stageSignal(job.abort.signal, ctx.stageTimeoutMs), siblings.signal]);
  const report = createProgressReporter(job, parts, ctx);

  let failed = false;
  let firstError: unknown = null;

  const results = await Promise.all(
    parts.map(async ({ role, descriptor }) => {
      try {
        const artifact = await fetcher.fetch(descriptor, {
          dir: ctx.tempDir,
          role,
          signal,
          onProgress: (downloadedBytes, totalBytes) => report(role, downloadedBytes, totalBytes),
        });
        job.tempArtifacts.push(artifact);
        return artifact;
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
          siblings.abort();
        }
        return null;
      }
    })
  );

  if (failed) {
    throw firstError;
  }
  return results.filter((artifact): artifact is TempArtifact => artifact !== null);
}

/**
 * Sums byte counts across the parts and publishes whole-percent changes.
 */
function createProgressReporter(
  job: Job,
  parts: Array<{ role: StreamKind; descriptor: StreamDescriptor }>,
  ctx: JobRunContext
): (role: StreamKind, downloadedBytes: number, totalBytes: number | null) => void {
  const perPart = new Map<StreamKind, { downloaded: number; total: number | null }>();
  for (const { role, descriptor } of parts) {
    perPart.set(role, { downloaded: 0, total: descriptor.sizeBytes });
  }

  let lastPercent: number | null = null;
  let lastBytes = 0;

  const compute = () => {
    let downloadedBytes = 0;
    let totalBytes: number | null = 0;
    for (const part of perPart.values()) {
      downloadedBytes += part.downloaded;
      totalBytes = totalBytes === null || part.total === null ? null : totalBytes + part.total;
    }
    const percent = totalBytes ? Math.min(100, Math.floor((downloadedBytes / totalBytes) * 100)) : null;
    return { downloadedBytes, totalBytes, percent };
  };

  job.progress = compute();
  ctx.update();

  return (role, downloadedBytes, totalBytes) => {
    perPart.set(role, { downloaded: downloadedBytes, total: totalBytes });
    const progress = compute();
    job.progress = progress;

    const changed =
      progress.percent !== null
        ? progress.percent !== lastPercent
        : progress.downloadedBytes - lastBytes >= PROGRESS_STEP_BYTES;
    if (changed) {
      lastPercent = progress.percent;
      lastBytes = progress.downloadedBytes;
      ctx.update();
    }
  };
}

function enterStage(job: Job, state: StageState, ctx: JobRunContext): void {
  if (job.abort.signal.aborted) {
    throw new PipelineError("Cancelled", "Cancelled by request");
  }
  ctx.advance(state);
}

function stageSignal(cancel: AbortSignal, timeoutMs: number | null): AbortSignal {
  return timeoutMs === null ? cancel : AbortSignal.any([cancel, AbortSignal.timeout(timeoutMs)]);
}

async function releaseArtifacts(job: Job, tempDir: string): Promise<void> {
  job.tempArtifacts = [];
  await rm(tempDir, { recursive: true, force: true }).catch((err) =>
    console.warn(`[orchestrator] Failed to remove temp dir ${tempDir}: ${err}`)
  );
}
