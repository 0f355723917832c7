/**
 * Download Service
 * Fetches one stream to a file in its job's private temp directory.
 * A failed or interrupted download never leaves its file behind.
 */

import { createWriteStream } from "fs";
import { rm } from "fs/promises";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import { FetchError, errnoCode } from "../../utils/errors.js";
import { StoragePaths } from "../../utils/storagePaths.js";
import type { StreamDescriptor, StreamKind, TempArtifact } from "../../types/media.js";

export interface FetchOptions {
  /** Job temp directory; must already exist */
  dir: string;
  role: StreamKind;
  signal?: AbortSignal;
  onProgress?: (downloadedBytes: number, totalBytes: number | null) => void;
}

export interface Fetcher {
  fetch(descriptor: StreamDescriptor, options: FetchOptions): Promise<TempArtifact>;
}

export function createFetcher(): Fetcher {
  return { fetch: downloadStream };
}

/**
 * Streams a descriptor's bytes to <dir>/<role>.<container>.
 */
export async function downloadStream(descriptor: StreamDescriptor, options: FetchOptions): Promise<TempArtifact> {
  const { dir, role, signal, onProgress } = options;
  const outputPath = StoragePaths.tempStream(dir, role, descriptor.container);

  console.log(`[fetch] ${role} stream ${descriptor.formatId} → ${outputPath}`);

  try {
    const response = await fetch(descriptor.url, { headers: descriptor.headers, signal });
    if (!response.ok) {
      throw new FetchError("NetworkError", `Failed to download ${role} stream: ${response.status} ${response.statusText}`);
    }
    if (!response.body) {
      throw new FetchError("NetworkError", `Failed to download ${role} stream: empty response body`);
    }

    const totalBytes = parseContentLength(response.headers.get("content-length")) ?? descriptor.sizeBytes;
    let downloadedBytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        downloadedBytes += chunk.length;
        onProgress?.(downloadedBytes, totalBytes);
        callback(null, chunk);
      },
    });

    await pipeline(Readable.fromWeb(response.body), counter, createWriteStream(outputPath, { flags: "wx" }), {
      signal,
    });

    console.log(`[fetch] ✓ ${role} stream done (${(downloadedBytes / 1024 / 1024).toFixed(2)}MB)`);
    return { role, path: outputPath, bytes: downloadedBytes, descriptor };
  } catch (error) {
    await rm(outputPath, { force: true });
    const failure = toFetchError(error, signal);
    console.error(`[fetch] ✗ ${role} stream failed (${failure.reason}): ${failure.message}`);
    throw failure;
  }
}

function toFetchError(error: unknown, signal?: AbortSignal): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (signal?.aborted || (error instanceof Error && error.name === "AbortError")) {
    return new FetchError("Interrupted", "Download interrupted");
  }
  const code = errnoCode(error);
  if (code === "ENOSPC" || code === "EDQUOT") {
    return new FetchError("DiskFull", "No space left on device");
  }
  return new FetchError("NetworkError", error instanceof Error ? error.message : String(error));
}

function parseContentLength(header: string | null): number | null {
  if (!header) {
    return null;
  }
  const value = Number(header);
  return Number.isFinite(value) && value >= 0 ? value : null;
}
