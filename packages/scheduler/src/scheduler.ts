// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { componentLogger } from '@creditcore/ledger';
import type { Logger } from '@creditcore/ledger';
import * as cron from 'node-cron';
import { EVENT_JOB_COMPLETED, SchedulerEventEmitter } from './events.js';
import type { JobSummary, ScheduledJob } from './jobs/job.js';

export type JobRunResult =
  | { readonly status: 'completed'; readonly job: string; readonly summary: JobSummary; readonly durationMs: number }
  | { readonly status: 'skipped'; readonly job: string; readonly reason: 'already_running' }
  | { readonly status: 'failed'; readonly job: string; readonly error: unknown; readonly durationMs: number };

export interface TaskSchedulerOptions {
  jobs: readonly ScheduledJob[];
  /** Time zone the cron expressions are evaluated in.  Defaults to UTC. */
  timezone?: string;
  events?: SchedulerEventEmitter;
  logger?: Logger;
  /** Clock read on each cron tick.  Defaults to the system clock. */
  now?: () => Date;
}

/**
 * TaskScheduler drives the periodic jobs from node-cron.
 *
 * Each tick hands the job the current time; `runJob` and `runAll` take it
 * explicitly so jobs can be driven by hand or from tests.  A job whose
 * previous run is still in flight is skipped rather than run twice.
 */
export class TaskScheduler {
  readonly #jobs = new Map<string, ScheduledJob>();
  readonly #running = new Set<string>();
  readonly #tasks: cron.ScheduledTask[] = [];
  readonly #timezone: string;
  readonly #events: SchedulerEventEmitter;
  readonly #logger: Logger;
  readonly #now: () => Date;

  constructor(options: TaskSchedulerOptions) {
    for (const job of options.jobs) {
      if (this.#jobs.has(job.name)) throw new RangeError(`Duplicate job name "${job.name}".`);
      if (!cron.validate(job.cronExpression)) {
        throw new RangeError(`Invalid cron expression "${job.cronExpression}" for job "${job.name}".`);
      }
      this.#jobs.set(job.name, job);
    }
    this.#timezone = options.timezone ?? 'UTC';
    this.#events = options.events ?? new SchedulerEventEmitter();
    this.#logger = componentLogger('task-scheduler', options.logger);
    this.#now = options.now ?? (() => new Date());
  }

  get events(): SchedulerEventEmitter {
    return this.#events;
  }

  get isStarted(): boolean {
    return this.#tasks.length > 0;
  }

  jobNames(): string[] {
    return [...this.#jobs.keys()];
  }

  isRunning(name: string): boolean {
    return this.#running.has(name);
  }

  start(): void {
    if (this.isStarted) {
      this.#logger.warn({ event: 'scheduler.start.ignored' }, 'already started');
      return;
    }
    for (const job of this.#jobs.values()) {
      const task = cron.schedule(
        job.cronExpression,
        () => {
          void this.runJob(job.name, this.#now());
        },
        { scheduled: false, timezone: this.#timezone },
      );
      task.start();
      this.#tasks.push(task);
    }
    this.#logger.info(
      { event: 'scheduler.started', jobs: this.jobNames(), timezone: this.#timezone },
      'scheduler started',
    );
  }

  /** Stops future ticks.  Runs already in flight finish on their own. */
  stop(): void {
    if (!this.isStarted) return;
    for (const task of this.#tasks) task.stop();
    this.#tasks.length = 0;
    this.#logger.info({ event: 'scheduler.stopped' }, 'scheduler stopped');
  }

  /** Runs one job for `now`.  Never rejects; failures come back as `failed`. */
  async runJob(name: string, now: Date): Promise<JobRunResult> {
    const job = this.#jobs.get(name);
    if (job === undefined) throw new RangeError(`Unknown job "${name}".`);

    if (this.#running.has(name)) {
      this.#logger.warn({ event: 'scheduler.job.overlap', job: name }, 'previous run still in flight; skipping');
      return { status: 'skipped', job: name, reason: 'already_running' };
    }

    this.#running.add(name);
    const started = Date.now();
    try {
      const summary = await job.run(now);
      const durationMs = Date.now() - started;
      this.#logger.info({ event: 'scheduler.job.completed', job: name, durationMs, ...summary }, 'job completed');
      this.#events.emit(EVENT_JOB_COMPLETED, {
        job: name,
        startedAt: now.toISOString(),
        durationMs,
        summary,
      });
      return { status: 'completed', job: name, summary, durationMs };
    } catch (error: unknown) {
      const durationMs = Date.now() - started;
      this.#logger.error({ event: 'scheduler.job.failed', job: name, durationMs, err: error }, 'job failed');
      return { status: 'failed', job: name, error, durationMs };
    } finally {
      this.#running.delete(name);
    }
  }

  /** Runs every job for `now`, one after another, in registration order. */
  async runAll(now: Date): Promise<JobRunResult[]> {
    const results: JobRunResult[] = [];
    for (const name of this.#jobs.keys()) {
      results.push(await this.runJob(name, now));
    }
    return results;
  }
}
