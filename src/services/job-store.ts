/**
 * In-memory job store with bounded retention
 *
 * Jobs are kept in creation order. Inserting past capacity evicts the oldest
 * job whatever its status. Every method is synchronous, so on the single event
 * loop no caller ever observes a half-applied update. Reads return copies.
 */

import { randomUUID } from 'crypto';
import { createLogger } from '../logger';
import { ItemResult, Job, JobStatus, JobType } from '../types';

const log = createLogger('jobs');

const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  queued: ['running'],
  running: ['success', 'failed'],
  success: [],
  failed: [],
};

export interface NewJob {
  type: JobType;
  sourceSummary: string;
  targetSummary: string;
  totalItems: number;
}

function snapshot(job: Job): Job {
  return {
    ...job,
    logs: [...job.logs],
    itemResults: job.itemResults.map((result) => ({ ...result })),
  };
}

function clock(): string {
  return new Date().toISOString().slice(11, 19);
}

export class JobStore {
  private jobs: Map<string, Job> = new Map();
  private jobCounter: number = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  create(data: NewJob): Job {
    const id = `job-${++this.jobCounter}-${randomUUID().slice(0, 8)}`;
    const now = new Date().toISOString();

    const job: Job = {
      id,
      type: data.type,
      status: 'queued',
      createdAt: now,
      updatedAt: now,
      logs: [],
      sourceSummary: data.sourceSummary,
      targetSummary: data.targetSummary,
      totalItems: Math.max(1, data.totalItems),
      itemResults: [],
    };

    this.jobs.set(id, job);
    this.evict();
    return snapshot(job);
  }

  get(id: string): Job | undefined {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : undefined;
  }

  /**
   * Most recent first
   */
  list(limit?: number): Job[] {
    const jobs = Array.from(this.jobs.values()).reverse();
    return (limit === undefined ? jobs : jobs.slice(0, Math.max(0, limit))).map(snapshot);
  }

  size(): number {
    return this.jobs.size;
  }

  /**
   * Append a `HH:MM:SS message` line. Returns false when the job is gone.
   */
  appendLog(id: string, message: string): boolean {
    return this.mutate(id, (job) => {
      job.logs.push(`${clock()} ${message}`);
    });
  }

  addItemResult(id: string, result: ItemResult): boolean {
    return this.mutate(id, (job) => {
      job.itemResults.push({ ...result });
    });
  }

  setTotalItems(id: string, totalItems: number): boolean {
    return this.mutate(id, (job) => {
      job.totalItems = Math.max(1, totalItems);
    });
  }

  /**
   * Move a job forward. Backward or repeated transitions are refused.
   */
  transition(id: string, status: JobStatus, error?: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;

    if (!TRANSITIONS[job.status].includes(status)) {
      log.warn({ jobId: id, from: job.status, to: status }, 'Refused job status transition');
      return false;
    }

    return this.mutate(id, (target) => {
      target.status = status;
      if (error !== undefined) {
        target.error = error;
      }
    });
  }

  private mutate(id: string, update: (job: Job) => void): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;

    update(job);
    job.updatedAt = new Date().toISOString();
    return true;
  }

  private evict(): void {
    while (this.jobs.size > this.capacity) {
      const oldest = this.jobs.keys().next();
      if (oldest.done) return;

      const job = this.jobs.get(oldest.value);
      this.jobs.delete(oldest.value);
      if (job && (job.status === 'queued' || job.status === 'running')) {
        log.warn({ jobId: job.id, status: job.status }, 'Evicted unfinished job from retention window');
      } else {
        log.debug({ jobId: oldest.value }, 'Evicted job from retention window');
      }
    }
  }
}
