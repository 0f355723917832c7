/**
 * Job Repository
 * In-memory store for live jobs plus a bounded history of terminal snapshots.
 */

import { randomUUID } from "crypto";
import type { StreamDescriptor, TempArtifact } from "../types/media.js";
import type { JobError } from "../utils/errorMessages.js";

export type JobState =
  | "queued"
  | "resolving"
  | "fetching"
  | "merging"
  | "organizing"
  | "done"
  | "failed";

/** Forward order of the non-failure states; `failed` may follow any non-terminal one */
const STATE_ORDER: readonly JobState[] = ["queued", "resolving", "fetching", "merging", "organizing", "done"];

export interface Destination {
  publisher: string;
  fileName: string;
  ext: string;
}

export interface JobProgress {
  downloadedBytes: number;
  totalBytes: number | null;
  percent: number | null;
}

/**
 * Live job record. Mutated only by the pipeline task running it and dropped
 * once the job reaches a terminal state.
 */
export interface Job {
  id: string;
  sourceUrl: string;
  state: JobState;
  title: string | null;
  publisher: string | null;
  streams: StreamDescriptor[];
  tempArtifacts: TempArtifact[];
  destination: Destination | null;
  progress: JobProgress | null;
  error: JobError | null;
  finalPath: string | null;
  submittedAt: Date;
  updatedAt: Date;
  finishedAt: Date | null;
  abort: AbortController;
}

/** Read-only snapshot handed to presentation layers */
export interface JobStatus {
  id: string;
  sourceUrl: string;
  state: JobState;
  title: string | null;
  publisher: string | null;
  progress: JobProgress | null;
  error: JobError | null;
  finalPath: string | null;
  submittedAt: string;
  updatedAt: string;
  finishedAt: string | null;
}

export interface JobSummary {
  submitted: number;
  active: number;
  done: number;
  failed: number;
}

export function isTerminal(state: JobState): boolean {
  return state === "done" || state === "failed";
}

export function toJobStatus(job: Job): JobStatus {
  return {
    id: job.id,
    sourceUrl: job.sourceUrl,
    state: job.state,
    title: job.title,
    publisher: job.publisher,
    progress: job.progress ? { ...job.progress } : null,
    error: job.error ? { ...job.error } : null,
    finalPath: job.finalPath,
    submittedAt: job.submittedAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    finishedAt: job.finishedAt ? job.finishedAt.toISOString() : null,
  };
}

export class JobRepository {
  private readonly active = new Map<string, Job>();
  private readonly history: JobStatus[] = [];
  private submitted = 0;
  private done = 0;
  private failed = 0;

  constructor(private readonly historyLimit: number = 100) {}

  /**
   * Creates a new job in the queued state.
   */
  create(sourceUrl: string): Job {
    const now = new Date();
    const job: Job = {
      id: randomUUID(),
      sourceUrl,
      state: "queued",
      title: null,
      publisher: null,
      streams: [],
      tempArtifacts: [],
      destination: null,
      progress: null,
      error: null,
      finalPath: null,
      submittedAt: now,
      updatedAt: now,
      finishedAt: null,
      abort: new AbortController(),
    };
    this.active.set(job.id, job);
    this.submitted++;
    return job;
  }

  /** Live job by id; undefined once it has settled */
  findActive(id: string): Job | undefined {
    return this.active.get(id);
  }

  /** Current snapshot of a live job, or its retained terminal snapshot */
  findStatus(id: string): JobStatus | undefined {
    const job = this.active.get(id);
    if (job) {
      return toJobStatus(job);
    }
    const settled = this.history.find((status) => status.id === id);
    return settled ? { ...settled } : undefined;
  }

  /**
   * Moves a job forward. Throws on a backwards or repeated transition.
   */
  transition(job: Job, next: Exclude<JobState, "done" | "failed">): void {
    if (isTerminal(job.state)) {
      throw new Error(`Job ${job.id} is already ${job.state}`);
    }
    if (STATE_ORDER.indexOf(next) <= STATE_ORDER.indexOf(job.state)) {
      throw new Error(`Job ${job.id} cannot move from ${job.state} to ${next}`);
    }
    job.state = next;
    job.updatedAt = new Date();
  }

  touch(job: Job): void {
    job.updatedAt = new Date();
  }

  complete(job: Job, finalPath: string): JobStatus {
    job.finalPath = finalPath;
    job.progress = null;
    this.done++;
    return this.settle(job, "done");
  }

  fail(job: Job, error: JobError): JobStatus {
    job.error = error;
    this.failed++;
    return this.settle(job, "failed");
  }

  /**
   * Live jobs in submission order, then retained terminal snapshots oldest first.
   */
  *list(): Generator<JobStatus> {
    for (const job of this.active.values()) {
      yield toJobStatus(job);
    }
    for (const status of this.history) {
      yield { ...status };
    }
  }

  /** Ids of live jobs */
  activeIds(): Set<string> {
    return new Set(this.active.keys());
  }

  summary(): JobSummary {
    return {
      submitted: this.submitted,
      active: this.active.size,
      done: this.done,
      failed: this.failed,
    };
  }

  private settle(job: Job, state: "done" | "failed"): JobStatus {
    if (isTerminal(job.state)) {
      throw new Error(`Job ${job.id} is already ${job.state}`);
    }
    const now = new Date();
    job.state = state;
    job.updatedAt = now;
    job.finishedAt = now;
    job.tempArtifacts = [];

    const status = toJobStatus(job);
    this.active.delete(job.id);
    if (this.historyLimit > 0) {
      this.history.push(status);
      if (this.history.length > this.historyLimit) {
        this.history.splice(0, this.history.length - this.historyLimit);
      }
    }
    return status;
  }
}
