import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "fs/promises";
import path from "path";
import { createMerger } from "../../../src/services/business/mergeService.js";
import type { MuxInput } from "../../../src/services/external/ffmpeg.js";
import { MergeError } from "../../../src/utils/errors.js";
import type { StreamSelection, TempArtifact } from "../../../src/types/media.js";
import { audioOnly, combined, fakeMux, listDir, makeTempDir, removeDir, videoOnly } from "../../helpers/fakes.js";

const AVAILABLE = { available: true, version: "6.1" } as const;
const MISSING = { available: false, reason: "ffmpeg not found at 'ffmpeg'" } as const;

describe("mergeService", () => {
  let dir: string;
  let separate: StreamSelection;
  let artifacts: TempArtifact[];

  beforeEach(async () => {
    dir = await makeTempDir("merge-test");
    const video = videoOnly("v1440", 1440);
    const audio = audioOnly("a160", 160);
    separate = { mode: "separate", video, audio };
    artifacts = [
      { role: "video", path: path.join(dir, "video.mp4"), bytes: 5, descriptor: video },
      { role: "audio", path: path.join(dir, "audio.m4a"), bytes: 5, descriptor: audio },
    ];
    await writeFile(artifacts[0].path, "VIDEO");
    await writeFile(artifacts[1].path, "AUDIO");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should pass a combined stream through without muxing", async () => {
    const calls: MuxInput[] = [];
    const merger = createMerger({ toolStatus: AVAILABLE, mux: fakeMux(calls) });
    const stream = combined("c1080", 1080);

    const result = await merger.merge({
      selection: { mode: "combined", combined: stream },
      artifacts: [{ role: "combined", path: "/tmp/job/combined.mp4", bytes: 1, descriptor: stream }],
      outputPath: "/tmp/job/merged.mp4",
    });

    expect(result).toBe("/tmp/job/combined.mp4");
    expect(calls).toEqual([]);
  });

  it("should mux a video/audio pair exactly once", async () => {
    const calls: MuxInput[] = [];
    const merger = createMerger({ toolStatus: AVAILABLE, ffmpegPath: "/opt/ffmpeg", mux: fakeMux(calls) });
    const outputPath = path.join(dir, "merged.mp4");

    const result = await merger.merge({ selection: separate, artifacts, outputPath });

    expect(result).toBe(outputPath);
    expect(calls).toEqual([
      {
        videoPath: artifacts[0].path,
        audioPath: artifacts[1].path,
        outputPath,
        ffmpegPath: "/opt/ffmpeg",
        signal: undefined,
      },
    ]);
    expect(await readFile(outputPath, "utf-8")).toBe("VIDEO+AUDIO");
  });

  it("should fail with ToolMissing when the probe found no ffmpeg", async () => {
    const merger = createMerger({ toolStatus: MISSING, mux: fakeMux() });

    expect(() => merger.assertAvailable()).toThrow(MergeError);
    await expect(
      merger.merge({ selection: separate, artifacts, outputPath: path.join(dir, "merged.mp4") })
    ).rejects.toMatchObject({ reason: "ToolMissing", message: "ffmpeg not found at 'ffmpeg'" });
  });

  it("should remove partial output when muxing fails", async () => {
    const merger = createMerger({
      toolStatus: AVAILABLE,
      mux: async (input) => {
        await writeFile(input.outputPath, "partial");
        throw new Error("Invalid data found when processing input");
      },
    });

    await expect(
      merger.merge({ selection: separate, artifacts, outputPath: path.join(dir, "merged.mp4") })
    ).rejects.toMatchObject({ reason: "EncodeError", message: "Invalid data found when processing input" });
    expect(await listDir(dir)).toEqual(["audio.m4a", "video.mp4"]);
  });
});
