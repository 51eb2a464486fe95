/**
 * jobs.ts - Background jobs with queryable status
 *
 * Long operations (bulk indexing, syncing every payload, id migration) run off
 * the request path: start() kicks the work off and returns a snapshot at once.
 * Callers poll get(id) for the outcome instead of reading logs.
 *
 * Exclusive jobs: while an exclusive job of some kind is running, starting
 * another of the same kind returns the running job's snapshot instead of a new
 * job. Two bulk index runs therefore never overlap in one process.
 *
 * Jobs are kept in memory only. The most recent `maxFinished` finished jobs
 * are retained; running jobs are never evicted.
 */

import { randomUUID } from "crypto";
import { toErrorResponse, type ErrorResponse } from "../errors";
import type { ProgressCallback } from "./types";

export type JobStatus = "running" | "succeeded" | "failed";

export interface JobSnapshot {
  id: string;
  kind: string;
  status: JobStatus;
  /** ISO timestamps */
  startedAt: string;
  finishedAt?: string;
  /** The operation's return value, once succeeded */
  result?: unknown;
  /** The structured error, once failed */
  error?: ErrorResponse;
}

export interface JobRunnerOptions {
  /** Finished jobs kept for status queries (default 100) */
  maxFinished?: number;
  onProgress?: ProgressCallback;
  /** Clock, injectable for tests */
  now?: () => Date;
}

interface JobRecord {
  snapshot: JobSnapshot;
  exclusive: boolean;
  /** Settles when the job finishes; never rejects */
  done: Promise<void>;
}

export class JobRunner {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly maxFinished: number;
  private readonly onProgress: ProgressCallback;
  private readonly now: () => Date;

  constructor(options: JobRunnerOptions = {}) {
    this.maxFinished = options.maxFinished ?? 100;
    this.onProgress = options.onProgress ?? console.log;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Starts `task` in the background.
   *
   * @param kind - Job kind, e.g. "index_all"; exclusivity is per kind
   * @returns A snapshot of the new job, or of the running job it was
   *          deduplicated against
   */
  start(kind: string, task: () => Promise<unknown>, options: { exclusive?: boolean } = {}): JobSnapshot {
    const exclusive = options.exclusive === true;
    if (exclusive) {
      const running = this.findRunning(kind);
      if (running) {
        this.onProgress(`Job ${kind} already running as ${running.snapshot.id}.`);
        return { ...running.snapshot };
      }
    }

    const snapshot: JobSnapshot = {
      id: randomUUID(),
      kind,
      status: "running",
      startedAt: this.now().toISOString(),
    };

    const done = Promise.resolve()
      .then(task)
      .then(
        (result) => {
          snapshot.status = "succeeded";
          snapshot.result = result;
        },
        (error: unknown) => {
          snapshot.status = "failed";
          snapshot.error = toErrorResponse(error);
          this.onProgress(`Job ${kind} (${snapshot.id}) failed: ${snapshot.error.message}`);
        }
      )
      .then(() => {
        snapshot.finishedAt = this.now().toISOString();
        this.evictFinished();
      });

    this.jobs.set(snapshot.id, { snapshot, exclusive, done });
    this.onProgress(`Started job ${kind} (${snapshot.id}).`);
    return { ...snapshot };
  }

  get(id: string): JobSnapshot | undefined {
    const record = this.jobs.get(id);
    return record ? { ...record.snapshot } : undefined;
  }

  /** All retained jobs, oldest first. */
  list(): JobSnapshot[] {
    return [...this.jobs.values()].map((record) => ({ ...record.snapshot }));
  }

  /**
   * Resolves with the final snapshot once the job has finished, or undefined
   * for an unknown id.
   */
  async wait(id: string): Promise<JobSnapshot | undefined> {
    const record = this.jobs.get(id);
    if (!record) return undefined;
    await record.done;
    return { ...record.snapshot };
  }

  private findRunning(kind: string): JobRecord | undefined {
    for (const record of this.jobs.values()) {
      if (record.exclusive && record.snapshot.kind === kind && record.snapshot.status === "running") {
        return record;
      }
    }
    return undefined;
  }

  private evictFinished(): void {
    const finished = [...this.jobs.values()].filter(
      (record) => record.snapshot.status !== "running"
    );
    const excess = finished.length - this.maxFinished;
    for (const record of finished.slice(0, Math.max(0, excess))) {
      this.jobs.delete(record.snapshot.id);
    }
  }
}
