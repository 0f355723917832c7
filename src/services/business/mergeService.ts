/**
 * Merge Service
 * Combines a job's video-only and audio-only files into one output file.
 * A combined stream passes through untouched.
 */

import { rm } from "fs/promises";
import { MergeError } from "../../utils/errors.js";
import { muxStreams, type MuxInput } from "../external/ffmpeg.js";
import type { StreamKind, StreamSelection, TempArtifact, ToolStatus } from "../../types/media.js";

export interface MergeRequest {
  selection: StreamSelection;
  artifacts: readonly TempArtifact[];
  /** Where the multiplexer writes; unused on pass-through */
  outputPath: string;
  signal?: AbortSignal;
}

export interface Merger {
  /** Throws ToolMissing when the start-up probe found no multiplexing tool */
  assertAvailable(): void;
  merge(request: MergeRequest): Promise<string>;
}

export type MuxFunction = (input: MuxInput) => Promise<void>;

export interface MergerOptions {
  /** Probe result cached at start-up */
  toolStatus: ToolStatus;
  ffmpegPath?: string;
  mux?: MuxFunction;
}

export function createMerger(options: MergerOptions): Merger {
  const { toolStatus, ffmpegPath } = options;
  const mux = options.mux ?? muxStreams;

  function assertAvailable(): void {
    if (!toolStatus.available) {
      throw new MergeError("ToolMissing", toolStatus.reason);
    }
  }

  async function merge(request: MergeRequest): Promise<string> {
    const { selection, artifacts, outputPath, signal } = request;

    if (selection.mode === "combined") {
      return findArtifact(artifacts, "combined").path;
    }

    assertAvailable();
    const video = findArtifact(artifacts, "video");
    const audio = findArtifact(artifacts, "audio");

    console.log(`[merge] Merging ${video.descriptor.formatId}+${audio.descriptor.formatId} → ${outputPath}`);
    try {
      await mux({ videoPath: video.path, audioPath: audio.path, outputPath, ffmpegPath, signal });
    } catch (error) {
      await rm(outputPath, { force: true });
      if (error instanceof MergeError) {
        throw error;
      }
      throw new MergeError("EncodeError", error instanceof Error ? error.message : String(error));
    }

    console.log(`[merge] ✓ Merged ${outputPath}`);
    return outputPath;
  }

  return { assertAvailable, merge };
}

function findArtifact(artifacts: readonly TempArtifact[], role: StreamKind): TempArtifact {
  const artifact = artifacts.find((candidate) => candidate.role === role);
  if (!artifact) {
    throw new MergeError("EncodeError", `Missing ${role} file for merge`);
  }
  return artifact;
}
