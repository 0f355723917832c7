import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import { Pipeline } from "../../../src/jobs/pipeline.js";
import { createStatusPrinter, handleInputLine } from "../../../src/controllers/cliController.js";
import { createMerger } from "../../../src/services/business/mergeService.js";
import { createOrganizer } from "../../../src/services/business/organizeService.js";
import type { JobStatus } from "../../../src/repositories/jobRepository.js";
import { FakeFetcher, FakeResolver, combined, deferred, fakeMux, makeTempDir, media, removeDir } from "../../helpers/fakes.js";

const VIDEO_URL = "https://video.example/watch?id=abc";

describe("cliController", () => {
  let root: string;
  let fetcher: FakeFetcher;
  let pipeline: Pipeline;
  let output: string[];
  const print = (text: string) => output.push(text);

  beforeEach(async () => {
    root = await makeTempDir("cli-test");
    fetcher = new FakeFetcher();
    output = [];
    pipeline = new Pipeline(
      {
        resolver: new FakeResolver({ [VIDEO_URL]: media("Title", "Publisher", [combined("c1080", 1080)]) }),
        fetcher,
        merger: createMerger({ toolStatus: { available: true, version: "6.1" }, mux: fakeMux() }),
        organizer: createOrganizer({ outputRoot: path.join(root, "out") }),
      },
      { concurrency: 1, tempRoot: path.join(root, "tmp") }
    );
  });

  afterEach(async () => {
    await pipeline.shutdown();
    await removeDir(root);
  });

  describe("handleInputLine", () => {
    it("should submit a URL line", async () => {
      expect(handleInputLine(pipeline, `  ${VIDEO_URL}  `, print)).toBe("continue");
      await pipeline.drain();

      expect(pipeline.summary()).toEqual({ submitted: 1, active: 0, done: 1, failed: 0 });
    });

    it("should ignore blank lines and stop on quit", () => {
      expect(handleInputLine(pipeline, "   ", print)).toBe("continue");
      expect(handleInputLine(pipeline, "QUIT", print)).toBe("quit");
      expect(pipeline.summary().submitted).toBe(0);
    });

    it("should list jobs and the summary", () => {
      handleInputLine(pipeline, "not a url", print);
      const [status] = [...pipeline.jobs()];

      handleInputLine(pipeline, "jobs", print);

      expect(output).toEqual([
        `[${status.id.slice(0, 8)}] ✗ not a url (InvalidInput): Not a URL: 'not a url'`,
        "submitted: 1, active: 0, done: 0, failed: 1",
      ]);
    });

    it("should cancel a job by id prefix", async () => {
      fetcher.gate = deferred().promise;
      const handle = pipeline.submit(VIDEO_URL);

      handleInputLine(pipeline, `cancel ${handle.id.slice(0, 6)}`, print);

      expect(output).toEqual([`Cancelling ${handle.id.slice(0, 8)}`]);
      expect((await handle.done).error?.kind).toBe("Cancelled");
    });

    it("should explain cancel misuse", () => {
      handleInputLine(pipeline, "cancel", print);
      handleInputLine(pipeline, "cancel zzz", print);

      expect(output).toEqual(["Usage: cancel <id-prefix>", "No active job matches 'zzz'"]);
    });
  });

  describe("createStatusPrinter", () => {
    const base: JobStatus = {
      id: "abcdef0123456789",
      sourceUrl: VIDEO_URL,
      state: "fetching",
      title: "Title",
      publisher: "Publisher",
      progress: { downloadedBytes: 10, totalBytes: 100, percent: 10 },
      error: null,
      finalPath: null,
      submittedAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: null,
    };

    it("should print state changes and 10% steps only", () => {
      const printStatus = createStatusPrinter(print);

      printStatus(base);
      printStatus({ ...base, progress: { downloadedBytes: 15, totalBytes: 100, percent: 15 } });
      printStatus({ ...base, progress: { downloadedBytes: 20, totalBytes: 100, percent: 20 } });
      printStatus({ ...base, state: "merging", progress: null });

      expect(output).toEqual([
        "[abcdef01] fetching Title 10%",
        "[abcdef01] fetching Title 20%",
        "[abcdef01] merging Title",
      ]);
    });
  });
});
