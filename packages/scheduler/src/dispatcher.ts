// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ActionExecutionError, componentLogger } from '@creditcore/ledger';
import type { ActionGate, Logger } from '@creditcore/ledger';
import { parseSchedulerConfig } from './config.js';
import type { SchedulerConfig } from './config.js';
import { computeNextRunAt, isDue } from './due.js';
import { DispatchTimeoutError, ScheduleDispatchError } from './errors.js';
import {
  EVENT_CANCELLED,
  EVENT_DEFERRED,
  EVENT_DISPATCHED,
  EVENT_FAILED,
  SchedulerEventEmitter,
} from './events.js';
import type { TaskContext, TaskHandlers, TaskRunReport } from './handlers/handler.js';
import type { ScheduleStore } from './storage/adapter.js';
import { tenantOf } from './types.js';
import type { ScheduleEntry, TaskKind } from './types.js';

export type DispatchOutcome =
  | {
      readonly status: 'succeeded';
      readonly entry: ScheduleEntry;
      readonly creditsUsed: number;
      readonly report: TaskRunReport;
    }
  | {
      readonly status: 'deferred';
      readonly entry: ScheduleEntry;
      readonly creditsRequired: number;
      readonly availableCredits: number;
    }
  | { readonly status: 'failed'; readonly entry: ScheduleEntry; readonly error: ScheduleDispatchError }
  | { readonly status: 'cancelled'; readonly entry: ScheduleEntry; readonly error: ScheduleDispatchError }
  /** Another worker claimed or already ran the entry, or it stopped being selectable. */
  | { readonly status: 'skipped'; readonly entryId: string };

export type DispatchStatus = DispatchOutcome['status'];

export type DispatchSummary = Readonly<Record<DispatchStatus | 'considered' | 'released', number>>;

export interface ScheduleDispatcherOptions {
  store: ScheduleStore;
  gate: ActionGate;
  handlers: TaskHandlers;
  /** Raw SchedulerConfig; validated with SchedulerConfigSchema. */
  config?: unknown;
  events?: SchedulerEventEmitter;
  logger?: Logger;
}

type RunResult =
  | { readonly ok: true; readonly report: TaskRunReport; readonly creditsUsed: number }
  | { readonly ok: false; readonly creditsRequired: number; readonly availableCredits: number };

function describeError(error: unknown): string {
  if (error instanceof ActionExecutionError && error.cause !== undefined) return describeError(error.cause);
  return error instanceof Error ? error.message : String(error);
}

/**
 * ScheduleDispatcher runs one schedule entry through its lifecycle:
 *
 *   claim → (charge) → run handler under the dispatch timeout → record
 *
 * Success sets `lastRunAt` to the tick time and advances `nextRunAt`.
 * Insufficient credits release the claim without spending a retry.  Any
 * other failure spends one; the store cancels the entry once
 * `retryCount > maxRetries`.
 */
export class ScheduleDispatcher {
  readonly #store: ScheduleStore;
  readonly #gate: ActionGate;
  readonly #handlers: TaskHandlers;
  readonly #config: SchedulerConfig;
  readonly #events: SchedulerEventEmitter;
  readonly #logger: Logger;

  constructor(options: ScheduleDispatcherOptions) {
    this.#store = options.store;
    this.#gate = options.gate;
    this.#handlers = options.handlers;
    this.#config = parseSchedulerConfig(options.config ?? {});
    this.#events = options.events ?? new SchedulerEventEmitter();
    this.#logger = componentLogger('schedule-dispatcher', options.logger);
  }

  get events(): SchedulerEventEmitter {
    return this.#events;
  }

  get config(): SchedulerConfig {
    return this.#config;
  }

  /**
   * Releases stale claims, then dispatches every selectable entry of `kind`
   * that is due at `now`, one at a time.
   */
  async dispatchDue(kind: TaskKind, now: Date): Promise<DispatchSummary> {
    const at = now.toISOString();
    const claimedBefore = new Date(now.getTime() - this.#config.staleClaimMs).toISOString();
    const released = await this.#store.releaseStaleClaims(claimedBefore, at);
    if (released > 0) {
      this.#logger.warn({ event: 'scheduler.claims.released', kind, released }, 'released stale claims');
    }

    const summary = { considered: 0, released, succeeded: 0, deferred: 0, failed: 0, cancelled: 0, skipped: 0 };
    const candidates = await this.#store.listSelectable(kind);
    for (const entry of candidates) {
      if (!isDue(entry, now, this.#config)) continue;
      summary.considered++;
      const outcome = await this.dispatch(entry, now);
      summary[outcome.status]++;
    }
    return summary;
  }

  /** Dispatches one entry.  Never throws for a task failure; the outcome says what happened. */
  async dispatch(entry: ScheduleEntry, now: Date): Promise<DispatchOutcome> {
    const at = now.toISOString();
    const claimed = await this.#store.claim(entry.id, at);
    if (claimed === undefined) {
      this.#logger.debug({ event: 'scheduler.dispatch.skipped', entryId: entry.id }, 'entry not claimable');
      return { status: 'skipped', entryId: entry.id };
    }
    // The caller's snapshot may predate another worker's run; judge the claimed row.
    if (!isDue({ ...claimed, status: 'pending' }, now, this.#config)) {
      await this.#store.release(claimed.id, at);
      this.#logger.debug(
        { event: 'scheduler.dispatch.skipped', entryId: claimed.id, lastRunAt: claimed.lastRunAt },
        'claimed entry no longer due',
      );
      return { status: 'skipped', entryId: claimed.id };
    }

    const log = { entryId: claimed.id, kind: claimed.task.kind, userId: claimed.userId, orgId: claimed.orgId };
    let result: RunResult;
    try {
      result = await this.#run(claimed, now);
    } catch (error: unknown) {
      return this.#fail(claimed, error, at, log);
    }

    if (!result.ok) {
      const released = (await this.#store.release(claimed.id, at)) ?? claimed;
      this.#logger.info(
        {
          event: 'scheduler.dispatch.deferred',
          ...log,
          creditsRequired: result.creditsRequired,
          availableCredits: result.availableCredits,
        },
        'dispatch deferred: insufficient credits',
      );
      this.#events.emit(EVENT_DEFERRED, {
        ...log,
        creditsRequired: result.creditsRequired,
        availableCredits: result.availableCredits,
        timestamp: at,
      });
      return {
        status: 'deferred',
        entry: released,
        creditsRequired: result.creditsRequired,
        availableCredits: result.availableCredits,
      };
    }

    const once = claimed.trigger.kind === 'once';
    const recorded =
      (await this.#store.recordSuccess(claimed.id, {
        at,
        nextRunAt: once ? null : computeNextRunAt(claimed.trigger, now),
        complete: once,
      })) ?? claimed;
    this.#logger.info(
      {
        event: 'scheduler.dispatch.succeeded',
        ...log,
        creditsUsed: result.creditsUsed,
        delivered: result.report.delivered,
        nextRunAt: recorded.nextRunAt,
      },
      'scheduled task dispatched',
    );
    this.#events.emit(EVENT_DISPATCHED, {
      ...log,
      creditsUsed: result.creditsUsed,
      nextRunAt: recorded.nextRunAt,
      timestamp: at,
    });
    return { status: 'succeeded', entry: recorded, creditsUsed: result.creditsUsed, report: result.report };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  async #run(entry: ScheduleEntry, now: Date): Promise<RunResult> {
    const task = entry.task;
    const action = task.kind === 'digest' ? this.#handlers.digest.action : this.#handlers.follow_up.action;
    const work = (context: TaskContext): Promise<TaskRunReport> =>
      task.kind === 'digest'
        ? this.#handlers.digest.run(task, entry, context)
        : this.#handlers.follow_up.run(task, entry, context);

    if (action === undefined) {
      return { ok: true, report: await this.#withTimeout(entry, now, work), creditsUsed: 0 };
    }

    const outcome = await this.#gate.execute(
      {
        tenant: tenantOf(entry),
        action,
        description: `Scheduled ${task.kind} ${entry.id}`,
        metadata: { scheduleId: entry.id },
        at: now,
      },
      () => this.#withTimeout(entry, now, work),
    );
    if (outcome.status === 'rejected') {
      return { ok: false, creditsRequired: outcome.creditsRequired, availableCredits: outcome.availableCredits };
    }
    return { ok: true, report: outcome.value, creditsUsed: outcome.creditsUsed };
  }

  async #withTimeout(
    entry: ScheduleEntry,
    now: Date,
    work: (context: TaskContext) => Promise<TaskRunReport>,
  ): Promise<TaskRunReport> {
    const timeoutMs = this.#config.dispatchTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new DispatchTimeoutError(entry.id, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    try {
      return await Promise.race([work({ now, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async #fail(
    entry: ScheduleEntry,
    cause: unknown,
    at: string,
    log: { entryId: string; kind: TaskKind; userId: string; orgId: string },
  ): Promise<DispatchOutcome> {
    const message = describeError(cause);
    const recorded = (await this.#store.recordFailure(entry.id, { at, error: message })) ?? {
      ...entry,
      retryCount: entry.retryCount + 1,
    };
    const error = new ScheduleDispatchError(entry.id, recorded.retryCount, cause);

    if (recorded.status === 'cancelled') {
      const reason = recorded.cancellationReason ?? 'cancelled';
      this.#logger.error(
        { event: 'scheduler.dispatch.cancelled', ...log, retryCount: recorded.retryCount, reason, err: cause },
        'scheduled task cancelled after repeated failures',
      );
      this.#events.emit(EVENT_CANCELLED, { ...log, reason, retryCount: recorded.retryCount, timestamp: at });
      return { status: 'cancelled', entry: recorded, error };
    }

    this.#logger.warn(
      {
        event: 'scheduler.dispatch.failed',
        ...log,
        retryCount: recorded.retryCount,
        maxRetries: recorded.maxRetries,
        err: cause,
      },
      'scheduled task failed',
    );
    this.#events.emit(EVENT_FAILED, {
      ...log,
      retryCount: recorded.retryCount,
      maxRetries: recorded.maxRetries,
      error: message,
      timestamp: at,
    });
    return { status: 'failed', entry: recorded, error };
  }
}
