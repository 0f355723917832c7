/**
 * Download Pipeline
 * Bounded worker pool over an unbounded FIFO submission queue.
 *
 * Submit never blocks: a job is recorded as queued and picked up by the next
 * free worker. At most `concurrency` jobs run their stages at a time; a failure
 * in one job never touches another.
 */

import { EventEmitter, on } from "events";
import {
  JobRepository,
  isTerminal,
  toJobStatus,
  type Job,
  type JobStatus,
  type JobSummary,
} from "../repositories/jobRepository.js";
import { runDownloadJob, type JobServices } from "./orchestrators/downloadJobOrchestrator.js";
import { errnoCode } from "../utils/errors.js";
import { toJobError, type JobError } from "../utils/errorMessages.js";
import { validateSourceUrl } from "../utils/sourceUrl.js";
import { StoragePaths } from "../utils/storagePaths.js";

export interface PipelineOptions {
  /** Worker pool size (N) */
  concurrency: number;
  tempRoot: string;
  /** Per-stage timeout; null or absent = none */
  stageTimeoutMs?: number | null;
  historyLimit?: number;
}

export interface JobHandle {
  readonly id: string;
  /** Current status; the terminal snapshot once the job has settled */
  status(): JobStatus;
  /** Resolves with the terminal status. Never rejects. */
  readonly done: Promise<JobStatus>;
  cancel(): boolean;
}

export type UpdateListener = (status: JobStatus) => void;

const UPDATE_EVENT = "update";
const jobEvent = (id: string) => `job:${id}`;

export class Pipeline {
  private readonly repository: JobRepository;
  private readonly events = new EventEmitter();
  private readonly queue: Job[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly waiters = new Map<string, (status: JobStatus) => void>();
  private pumpScheduled = false;
  private accepting = true;

  constructor(
    private readonly services: JobServices,
    private readonly options: PipelineOptions
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Pipeline concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.repository = new JobRepository(options.historyLimit);
    this.events.setMaxListeners(0);
  }

  /**
   * Records a job and schedules it. Returns before any stage runs.
   * A URL rejected by the local pre-check yields a handle that is already
   * failed with InvalidInput.
   */
  submit(url: string): JobHandle {
    const check = validateSourceUrl(url);
    const job = this.repository.create(check.ok ? check.url : url);
    const handle = this.createHandle(job.id);

    if (!check.ok) {
      console.warn(`[pipeline] ✗ Rejected '${url}': ${check.message}`);
      this.fail(job, { kind: "InvalidInput", message: check.message });
      return handle;
    }
    if (!this.accepting) {
      this.fail(job, { kind: "Cancelled", message: "Pipeline is shutting down" });
      return handle;
    }

    console.log(`[pipeline] Job ${job.id} queued: ${job.sourceUrl}`);
    this.queue.push(job);
    this.publish(job);
    this.schedulePump();
    return handle;
  }

  status(id: string): JobStatus | undefined {
    return this.repository.findStatus(id);
  }

  /** Live jobs, then retained terminal snapshots */
  *jobs(): Generator<JobStatus> {
    yield* this.repository.list();
  }

  summary(): JobSummary {
    return this.repository.summary();
  }

  /** Ids of jobs that have not settled yet */
  activeIds(): Set<string> {
    return this.repository.activeIds();
  }

  /**
   * Cancels a job. A queued job fails at once; a running one is aborted and
   * fails when its current stage unwinds. Returns false for unknown or settled jobs.
   */
  cancel(id: string): boolean {
    const job = this.repository.findActive(id);
    if (!job) {
      return false;
    }
    if (job.abort.signal.aborted) {
      return true;
    }

    job.abort.abort();
    const index = this.queue.indexOf(job);
    if (index !== -1) {
      this.queue.splice(index, 1);
      this.fail(job, toJobError(null, true));
    } else {
      console.log(`[pipeline] Cancelling job ${id} (${job.state})`);
    }
    return true;
  }

  /**
   * Subscribes to every status change of every job.
   */
  onUpdate(listener: UpdateListener): () => void {
    const safe = (status: JobStatus) => {
      try {
        listener(status);
      } catch (error) {
        console.error("[pipeline] Update listener failed:", error);
      }
    };
    this.events.on(UPDATE_EVENT, safe);
    return () => {
      this.events.off(UPDATE_EVENT, safe);
    };
  }

  /**
   * Yields the job's current status, then each change until it settles
   * or the signal aborts. Yields nothing for an unknown id.
   */
  async *watch(id: string, signal?: AbortSignal): AsyncGenerator<JobStatus> {
    const stop = new AbortController();
    const linked = signal ? AbortSignal.any([signal, stop.signal]) : stop.signal;

    try {
      // Subscribe before reading the current status so no change is missed
      const updates = on(this.events, jobEvent(id), { signal: linked });
      const current = this.status(id);
      if (!current) {
        return;
      }
      yield current;
      if (isTerminal(current.state)) {
        return;
      }

      for await (const event of updates) {
        const [status]: JobStatus[] = event;
        yield status;
        if (isTerminal(status.state)) {
          return;
        }
      }
    } catch (error) {
      if (errnoCode(error) !== "ABORT_ERR") {
        throw error;
      }
    } finally {
      stop.abort();
    }
  }

  /**
   * Waits until every queued and running job has settled. Does not cancel.
   */
  async drain(): Promise<void> {
    while (this.running.size > 0 || this.queue.length > 0) {
      if (this.running.size === 0) {
        this.pump();
      }
      await Promise.all([...this.running]);
    }
  }

  /**
   * Stops accepting work, cancels every live job and waits for them to settle.
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const id of this.repository.activeIds()) {
      this.cancel(id);
    }
    await this.drain();
  }

  private createHandle(id: string): JobHandle {
    let final: JobStatus | null = null;
    const done = new Promise<JobStatus>((resolve) => {
      this.waiters.set(id, (status) => {
        final = status;
        resolve(status);
      });
    });

    return {
      id,
      done,
      status: () => {
        const status = this.repository.findStatus(id) ?? final;
        if (!status) {
          throw new Error(`Job ${id} has no recorded status`);
        }
        return status;
      },
      cancel: () => this.cancel(id),
    };
  }

  private schedulePump(): void {
    if (this.pumpScheduled) {
      return;
    }
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.running.size < this.options.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      const task: Promise<void> = this.execute(job).finally(() => {
        this.running.delete(task);
        this.pump();
      });
      this.running.add(task);
    }
  }

  private async execute(job: Job): Promise<void> {
    const tempDir = StoragePaths.jobTempDir(this.options.tempRoot, job.id);
    console.log(`[pipeline] Job ${job.id} started (${this.running.size + 1}/${this.options.concurrency} workers busy)`);

    try {
      const finalPath = await runDownloadJob(job, this.services, {
        tempDir,
        stageTimeoutMs: this.options.stageTimeoutMs ?? null,
        advance: (state) => {
          this.repository.transition(job, state);
          console.log(`[pipeline] Job ${job.id} → ${state}`);
          this.publish(job);
        },
        update: () => {
          this.repository.touch(job);
          this.publish(job);
        },
      });
      this.finish(this.repository.complete(job, finalPath));
    } catch (error) {
      this.fail(job, toJobError(error, job.abort.signal.aborted));
    }
  }

  private publish(job: Job): void {
    this.emit(toJobStatus(job));
  }

  private fail(job: Job, error: JobError): void {
    this.finish(this.repository.fail(job, error));
  }

  private finish(status: JobStatus): void {
    if (status.state === "done") {
      console.log(`[pipeline] ✓ Job ${status.id} done: ${status.finalPath}`);
    } else if (status.error) {
      console.error(`[pipeline] ✗ Job ${status.id} failed (${status.error.kind}): ${status.error.message}`);
    }

    this.emit(status);
    const resolve = this.waiters.get(status.id);
    this.waiters.delete(status.id);
    resolve?.(status);
  }

  private emit(status: JobStatus): void {
    this.events.emit(UPDATE_EVENT, status);
    this.events.emit(jobEvent(status.id), status);
  }
}
