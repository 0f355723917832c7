/**
 * FFmpeg Service
 * Probes for the ffmpeg binary and multiplexes a video-only and an audio-only
 * file into one container without re-encoding.
 */

import ffmpeg from "fluent-ffmpeg";
import { execa } from "execa";
import { MergeError, errnoCode } from "../../utils/errors.js";
import type { ToolStatus } from "../../types/media.js";

export interface MuxInput {
  videoPath: string;
  audioPath: string;
  outputPath: string;
  ffmpegPath?: string;
  /** Aborting kills the running ffmpeg process */
  signal?: AbortSignal;
}

/**
 * Checks once whether ffmpeg can be started.
 * The result is cached by the caller; jobs never re-probe.
 */
export async function probeFfmpeg(ffmpegPath: string): Promise<ToolStatus> {
  try {
    const { stdout } = await execa(ffmpegPath, ["-version"]);
    const version = /ffmpeg version (\S+)/.exec(stdout)?.[1] ?? "unknown";
    console.log(`[ffmpeg] ✓ Found ffmpeg ${version}`);
    return { available: true, version };
  } catch (error) {
    const reason =
      errnoCode(error) === "ENOENT"
        ? `ffmpeg not found at '${ffmpegPath}'`
        : `ffmpeg probe failed: ${error instanceof Error ? error.message : String(error)}`;
    console.error(`[ffmpeg] ✗ ${reason} - jobs that need merging will fail`);
    return { available: false, reason };
  }
}

/**
 * Copies the first video track of one file and the first audio track of the
 * other into outputPath. Not retried on failure.
 */
export function muxStreams(input: MuxInput): Promise<void> {
  const { videoPath, audioPath, outputPath, ffmpegPath, signal } = input;

  if (signal?.aborted) {
    return Promise.reject(new MergeError("EncodeError", "Merge interrupted"));
  }

  return new Promise<void>((resolve, reject) => {
    const cmd = ffmpeg()
      .input(videoPath)
      .input(audioPath)
      .outputOptions(["-map", "0:v:0", "-map", "1:a:0", "-c", "copy", "-y"]);

    if (ffmpegPath) {
      cmd.setFfmpegPath(ffmpegPath);
    }

    const onAbort = () => {
      cmd.kill("SIGKILL");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    cmd
      .on("start", (line: string) => console.log(`[ffmpeg] ${line}`))
      .on("end", () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      })
      .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
        signal?.removeEventListener("abort", onAbort);
        if (signal?.aborted) {
          reject(new MergeError("EncodeError", "Merge interrupted"));
          return;
        }
        if (errnoCode(err) === "ENOENT" || /Cannot find ffmpeg/i.test(err.message)) {
          reject(new MergeError("ToolMissing", err.message));
          return;
        }
        const tail = (stderr ?? "").trim().split(/\r?\n/).slice(-3).join(" | ");
        reject(new MergeError("EncodeError", tail ? `${err.message}: ${tail}` : err.message));
      })
      .save(outputPath);
  });
}
