// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Timestamp } from '@creditcore/ledger';
import type { ScheduleEntry, TaskKind } from '../types.js';

export interface SuccessUpdate {
  readonly at: Timestamp;
  /** Next run; null for a one-shot entry that has now completed. */
  readonly nextRunAt: Timestamp | null;
  /** Move a dispatched entry to `completed` instead of back to `pending`. */
  readonly complete: boolean;
}

export interface FailureUpdate {
  readonly at: Timestamp;
  readonly error: string;
}

/**
 * ScheduleStore persists schedule entries and their dispatch state.
 *
 * Rules every adapter follows:
 *   1. `claim` is a compare-and-swap from active+pending to dispatched.  Of
 *      any number of concurrent claims on one entry, exactly one succeeds.
 *   2. `recordSuccess`, `recordFailure` and `release` only move the status
 *      of an entry that is still `dispatched`; an entry cancelled meanwhile
 *      stays cancelled.
 *   3. `recordFailure` increments `retryCount` and cancels the entry in the
 *      same step once `retryCount > maxRetries`.
 *   4. Mutators return the updated entry, or undefined for an unknown id.
 *      Reads return copies.
 */
export interface ScheduleStore {
  /** Inserts or replaces the entry. */
  save(entry: ScheduleEntry): Promise<ScheduleEntry>;

  get(id: string): Promise<ScheduleEntry | undefined>;

  /** Active, pending entries ordered by (nextRunAt, id); nulls last. */
  listSelectable(kind?: TaskKind): Promise<readonly ScheduleEntry[]>;

  /** Returns the claimed entry, or undefined when it was not selectable. */
  claim(id: string, at: Timestamp): Promise<ScheduleEntry | undefined>;

  recordSuccess(id: string, update: SuccessUpdate): Promise<ScheduleEntry | undefined>;

  recordFailure(id: string, update: FailureUpdate): Promise<ScheduleEntry | undefined>;

  /** Returns a dispatched entry to pending without touching its retry count. */
  release(id: string, at: Timestamp): Promise<ScheduleEntry | undefined>;

  /** Releases every claim taken before `claimedBefore`.  Returns how many. */
  releaseStaleClaims(claimedBefore: Timestamp, at: Timestamp): Promise<number>;

  /** Stops future selection.  A dispatch already in flight still completes. */
  deactivate(id: string, at: Timestamp): Promise<ScheduleEntry | undefined>;

  cancel(id: string, reason: string, at: Timestamp): Promise<ScheduleEntry | undefined>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  connect?(): Promise<void>;

  disconnect?(): Promise<void>;
}

/** Reason recorded when the retry budget runs out. */
export const RETRIES_EXHAUSTED = 'retries_exhausted';
