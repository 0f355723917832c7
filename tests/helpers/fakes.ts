/**
 * In-process stand-ins for yt-dlp, the network and ffmpeg.
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { StreamResolver } from "../../src/services/external/ytdlp.js";
import type { FetchOptions, Fetcher } from "../../src/services/business/downloadService.js";
import type { MuxFunction } from "../../src/services/business/mergeService.js";
import type { MuxInput } from "../../src/services/external/ffmpeg.js";
import { FetchError } from "../../src/utils/errors.js";
import { StoragePaths } from "../../src/utils/storagePaths.js";
import type { ResolvedMedia, StreamDescriptor, StreamKind, TempArtifact } from "../../src/types/media.js";

export function stream(overrides: Partial<StreamDescriptor> & Pick<StreamDescriptor, "formatId" | "kind">): StreamDescriptor {
  return {
    height: null,
    bitrateKbps: null,
    container: "mp4",
    videoCodec: null,
    audioCodec: null,
    sizeBytes: null,
    url: `https://cdn.example/${overrides.formatId}`,
    headers: {},
    ...overrides,
  };
}

export const combined = (formatId: string, height: number, container = "mp4") =>
  stream({ formatId, kind: "combined", height, container, videoCodec: "avc1", audioCodec: "mp4a" });

export const videoOnly = (formatId: string, height: number, container = "mp4") =>
  stream({ formatId, kind: "video", height, container, videoCodec: "avc1" });

export const audioOnly = (formatId: string, bitrateKbps: number, container = "m4a") =>
  stream({ formatId, kind: "audio", bitrateKbps, container, audioCodec: "mp4a" });

export function media(title: string, publisher: string, streams: StreamDescriptor[]): ResolvedMedia {
  return { mediaId: title.toLowerCase(), sourceUrl: "", title, publisher, streams };
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, resolve: () => release() };
}

export class FakeResolver implements StreamResolver {
  readonly calls: string[] = [];

  constructor(readonly results: Record<string, ResolvedMedia | Error>) {}

  async resolve(sourceUrl: string): Promise<ResolvedMedia> {
    this.calls.push(sourceUrl);
    const result = this.results[sourceUrl];
    if (result === undefined) {
      throw new Error(`No fake result for ${sourceUrl}`);
    }
    if (result instanceof Error) {
      throw result;
    }
    return { ...result, sourceUrl };
  }
}

/**
 * Writes "<role>:<formatId>" as the downloaded bytes. Fetches can be held
 * at a gate, and roles can be made to fail.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: Array<{ role: StreamKind; formatId: string }> = [];
  inFlight = 0;
  maxInFlight = 0;
  gate: Promise<void> | null = null;
  failRoles = new Map<StreamKind, Error>();

  async fetch(descriptor: StreamDescriptor, options: FetchOptions): Promise<TempArtifact> {
    const { dir, role, signal, onProgress } = options;
    this.calls.push({ role, formatId: descriptor.formatId });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const failure = this.failRoles.get(role);
      if (failure) {
        throw failure;
      }
      if (this.gate) {
        await Promise.race([this.gate, aborted(signal)]);
      }

      const content = `${role}:${descriptor.formatId}`;
      const filePath = StoragePaths.tempStream(dir, role, descriptor.container);
      await writeFile(filePath, content, { flag: "wx" });
      onProgress?.(content.length, content.length);
      return { role, path: filePath, bytes: content.length, descriptor };
    } finally {
      this.inFlight--;
    }
  }
}

function aborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    const fail = () => reject(new FetchError("Interrupted", "Download interrupted"));
    if (signal?.aborted) {
      fail();
      return;
    }
    signal?.addEventListener("abort", fail, { once: true });
  });
}

/** Writes "<video bytes>+<audio bytes>" to the output path */
export function fakeMux(calls: MuxInput[] = []): MuxFunction {
  return async (input) => {
    calls.push(input);
    const video = await readFile(input.videoPath, "utf-8");
    const audio = await readFile(input.audioPath, "utf-8");
    await writeFile(input.outputPath, `${video}+${audio}`);
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}
