// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Timestamp } from '@creditcore/ledger';
import type { ScheduleEntry, TaskKind } from '../types.js';
import { RETRIES_EXHAUSTED } from './adapter.js';
import type { FailureUpdate, ScheduleStore, SuccessUpdate } from './adapter.js';

function copy(entry: ScheduleEntry): ScheduleEntry {
  return { ...entry, task: { ...entry.task }, trigger: { ...entry.trigger } };
}

function compareSelectable(a: ScheduleEntry, b: ScheduleEntry): number {
  if (a.nextRunAt !== b.nextRunAt) {
    if (a.nextRunAt === null) return 1;
    if (b.nextRunAt === null) return -1;
    return a.nextRunAt < b.nextRunAt ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * In-process ScheduleStore backed by a Map.  Every method runs to completion
 * without awaiting, so each call is atomic within the process.
 */
export class MemoryScheduleStore implements ScheduleStore {
  readonly #entries = new Map<string, ScheduleEntry>();

  async save(entry: ScheduleEntry): Promise<ScheduleEntry> {
    this.#entries.set(entry.id, copy(entry));
    return copy(entry);
  }

  async get(id: string): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    return entry === undefined ? undefined : copy(entry);
  }

  async listSelectable(kind?: TaskKind): Promise<readonly ScheduleEntry[]> {
    return [...this.#entries.values()]
      .filter((e) => e.isActive && e.status === 'pending' && (kind === undefined || e.task.kind === kind))
      .sort(compareSelectable)
      .map(copy);
  }

  async claim(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined || !entry.isActive || entry.status !== 'pending') return undefined;
    return this.#write({ ...entry, status: 'dispatched', claimedAt: at, updatedAt: at });
  }

  async recordSuccess(id: string, update: SuccessUpdate): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined) return undefined;
    const inFlight = entry.status === 'dispatched';
    return this.#write({
      ...entry,
      status: inFlight ? (update.complete ? 'completed' : 'pending') : entry.status,
      lastRunAt: update.at,
      nextRunAt: update.nextRunAt,
      retryCount: 0,
      lastError: null,
      claimedAt: null,
      completedAt: inFlight && update.complete ? update.at : entry.completedAt,
      updatedAt: update.at,
    });
  }

  async recordFailure(id: string, update: FailureUpdate): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined) return undefined;
    const retryCount = entry.retryCount + 1;
    const base = { ...entry, retryCount, lastError: update.error, claimedAt: null, updatedAt: update.at };
    if (entry.status !== 'dispatched') return this.#write(base);
    if (retryCount > entry.maxRetries) {
      return this.#write({
        ...base,
        status: 'cancelled',
        cancelledAt: update.at,
        cancellationReason: RETRIES_EXHAUSTED,
      });
    }
    return this.#write({ ...base, status: 'pending' });
  }

  async release(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined) return undefined;
    if (entry.status !== 'dispatched') return copy(entry);
    return this.#write({ ...entry, status: 'pending', claimedAt: null, updatedAt: at });
  }

  async releaseStaleClaims(claimedBefore: Timestamp, at: Timestamp): Promise<number> {
    const cutoff = new Date(claimedBefore).getTime();
    let released = 0;
    for (const entry of this.#entries.values()) {
      if (entry.status !== 'dispatched' || entry.claimedAt === null) continue;
      if (new Date(entry.claimedAt).getTime() >= cutoff) continue;
      this.#write({ ...entry, status: 'pending', claimedAt: null, updatedAt: at });
      released++;
    }
    return released;
  }

  async deactivate(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined) return undefined;
    return this.#write({ ...entry, isActive: false, updatedAt: at });
  }

  async cancel(id: string, reason: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const entry = this.#entries.get(id);
    if (entry === undefined) return undefined;
    if (entry.status === 'completed' || entry.status === 'cancelled') return copy(entry);
    return this.#write({
      ...entry,
      status: 'cancelled',
      claimedAt: null,
      cancelledAt: at,
      cancellationReason: reason,
      updatedAt: at,
    });
  }

  /** Removes every entry. */
  clear(): void {
    this.#entries.clear();
  }

  #write(entry: ScheduleEntry): ScheduleEntry {
    this.#entries.set(entry.id, entry);
    return copy(entry);
  }
}
