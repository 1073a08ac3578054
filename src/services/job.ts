/**
 * Job Service - accepts submissions and runs job bodies in the background
 */

import { NotFoundError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ContainerRuntime, Job, JobRequest, JobStatus } from '../types';
import { JobPlan, describePlan, planJob } from './job-plans';
import { JobContext, JobRegistry, runPlan } from './job-runner';
import { JobStore } from './job-store';

const log = createLogger('jobs');

const DEFAULT_LIST_LIMIT = 20;

export interface JobOrchestratorOptions {
  store: JobStore;
  runtime: ContainerRuntime;
  registry: JobRegistry;
  /** Registry host used in image references */
  pushHost: string;
}

export class JobOrchestrator {
  private readonly store: JobStore;
  private readonly runtime: ContainerRuntime;
  private readonly registry: JobRegistry;
  private readonly pushHost: string;
  private inFlight: Map<string, Promise<void>> = new Map();

  constructor(options: JobOrchestratorOptions) {
    this.store = options.store;
    this.runtime = options.runtime;
    this.registry = options.registry;
    this.pushHost = options.pushHost;
  }

  /**
   * Validate and enqueue a job. Returns the queued snapshot; the body starts on
   * the next microtask.
   */
  submit(request: JobRequest): Job {
    const plan = planJob(request, this.pushHost);
    const job = this.store.create({ type: plan.type, ...describePlan(plan) });
    log.info({ jobId: job.id, type: job.type, source: job.sourceSummary }, 'Job submitted');

    const body = Promise.resolve()
      .then(() => this.execute(job.id, plan))
      .catch((error) => {
        log.error({ jobId: job.id, err: error }, 'Job body crashed');
      })
      .finally(() => {
        this.inFlight.delete(job.id);
      });
    this.inFlight.set(job.id, body);

    return job;
  }

  get(id: string): Job {
    const job = this.store.get(id);
    if (!job) {
      throw new NotFoundError(`Job ${id} not found.`);
    }
    return job;
  }

  /**
   * Most recent first, at most min(limit, retention)
   */
  list(limit: number = DEFAULT_LIST_LIMIT): Job[] {
    return this.store.list(Math.min(limit, this.store.capacity));
  }

  /**
   * Resolve once every in-flight job body has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight.values()));
    }
  }

  private async execute(id: string, plan: JobPlan): Promise<void> {
    // An evicted job still runs; only its record is gone
    if (this.store.transition(id, 'running')) {
      log.info({ jobId: id, type: plan.type }, 'Job started');
    } else {
      log.warn({ jobId: id, type: plan.type }, 'Job evicted before it started, running without a record');
    }

    const ctx = this.contextFor(id);
    try {
      await runPlan(plan, ctx, { runtime: this.runtime, registry: this.registry });
    } catch (error) {
      ctx.log(`[error] ${errorMessage(error)}`);
      this.finish(id, 'failed', errorMessage(error));
      return;
    }

    const job = this.store.get(id);
    if (!job) {
      log.warn({ jobId: id }, 'Job left the retention window before it finished');
      return;
    }

    const failed = job.itemResults.filter((result) => !result.ok);
    if (plan.type !== 'mirror-sync') {
      const succeeded = job.itemResults.length - failed.length;
      ctx.log(`[summary] ${succeeded}/${job.totalItems} items succeeded`);
    }

    if (failed.length === 0) {
      this.finish(id, 'success');
    } else if (failed.length === 1 && job.itemResults.length === 1) {
      this.finish(id, 'failed', failed[0].error);
    } else {
      this.finish(id, 'failed', `${failed.length} of ${job.itemResults.length} items failed`);
    }
  }

  private finish(id: string, status: JobStatus, error?: string): void {
    if (this.store.transition(id, status, error)) {
      log.info({ jobId: id, status, error }, 'Job finished');
    }
  }

  /**
   * Writes bound to one job id. Writes to an evicted job are dropped.
   */
  private contextFor(id: string): JobContext {
    let warned = false;
    const dropped = (): void => {
      if (!warned) {
        warned = true;
        log.warn({ jobId: id }, 'Dropping updates for evicted job');
      }
    };

    return {
      log: (message) => {
        if (!this.store.appendLog(id, message)) dropped();
      },
      recordItem: (result) => {
        if (!this.store.addItemResult(id, result)) dropped();
      },
      setTotalItems: (total) => {
        if (!this.store.setTotalItems(id, total)) dropped();
      },
    };
  }
}
