import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, utimes, writeFile } from "fs/promises";
import path from "path";
import { cleanupTempFiles, getTempDiskUsage } from "../../../src/utils/cleanupTemp.js";
import { listDir, makeTempDir, removeDir } from "../../helpers/fakes.js";

async function makeJobDir(root: string, name: string, ageHours: number): Promise<void> {
  const dir = path.join(root, name);
  await mkdir(dir);
  await writeFile(path.join(dir, "video.mp4"), "0123456789");
  const time = new Date(Date.now() - ageHours * 60 * 60 * 1000);
  await utimes(dir, time, time);
}

describe("cleanupTemp", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("cleanup-test");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("should remove only job dirs older than the max age", async () => {
    await makeJobDir(root, "old-job", 48);
    await makeJobDir(root, "fresh-job", 1);
    await makeJobDir(root, "running-job", 48);
    await writeFile(path.join(root, "cookies.txt"), "# cookies");

    const result = await cleanupTempFiles(root, 24, new Set(["running-job"]));

    expect(result).toEqual({ removedDirs: 1, removedFiles: 1, freedMB: 10 / (1024 * 1024) });
    expect(await listDir(root)).toEqual(["cookies.txt", "fresh-job", "running-job"]);
  });

  it("should remove every job dir with a max age of zero", async () => {
    await makeJobDir(root, "a", 0);
    await makeJobDir(root, "b", 0);

    const result = await cleanupTempFiles(root, 0);

    expect(result.removedDirs).toBe(2);
    expect(await listDir(root)).toEqual([]);
  });

  it("should report nothing for a missing root", async () => {
    const result = await cleanupTempFiles(path.join(root, "missing"), 0);
    expect(result).toEqual({ removedDirs: 0, removedFiles: 0, freedMB: 0 });
  });

  it("should measure disk usage recursively", async () => {
    await makeJobDir(root, "a", 0);
    await writeFile(path.join(root, "cookies.txt"), "12345");

    expect(await getTempDiskUsage(root)).toEqual({ usedMB: 15 / (1024 * 1024), files: 2 });
  });
});
