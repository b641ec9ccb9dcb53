// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type Database from 'better-sqlite3';
import type { Timestamp } from '@creditcore/ledger';
import type { ScheduleEntry, TaskKind } from '../types.js';
import { RETRIES_EXHAUSTED } from './adapter.js';
import type { FailureUpdate, ScheduleStore, SuccessUpdate } from './adapter.js';
import { decodeScheduleEntry, encodeScheduleEntry } from './rows.js';

export interface SQLiteScheduleStoreConfig {
  database: Database.Database;
  /** Table name prefix.  Defaults to "" (table `schedule_entries`). */
  tablePrefix?: string;
}

const COLUMNS = [
  'id',
  'user_id',
  'org_id',
  'owner_id',
  'task_kind',
  'task_spec',
  'trigger_spec',
  'recipient',
  'is_active',
  'status',
  'last_run_at',
  'next_run_at',
  'retry_count',
  'max_retries',
  'claimed_at',
  'completed_at',
  'cancelled_at',
  'cancellation_reason',
  'last_error',
  'created_at',
  'updated_at',
] as const;

function iso(timestamp: Timestamp): string {
  return new Date(timestamp).toISOString();
}

/**
 * SQLite-backed ScheduleStore on better-sqlite3.
 *
 * Each state transition is a single conditional UPDATE ... RETURNING, so a
 * claim raced by another process changes zero rows instead of double
 * dispatching.  Timestamps are stored as ISO strings and compare as text.
 */
export class SQLiteScheduleStore implements ScheduleStore {
  readonly #db: Database.Database;
  readonly #table: string;

  constructor(config: SQLiteScheduleStoreConfig) {
    this.#db = config.database;
    this.#table = `${config.tablePrefix ?? ''}schedule_entries`;
  }

  async save(entry: ScheduleEntry): Promise<ScheduleEntry> {
    this.#db
      .prepare(
        `INSERT OR REPLACE INTO ${this.#table} (${COLUMNS.join(', ')})
         VALUES (${COLUMNS.map((c) => `@${c}`).join(', ')})`,
      )
      .run(encodeScheduleEntry(entry));
    return (await this.get(entry.id)) ?? entry;
  }

  async get(id: string): Promise<ScheduleEntry | undefined> {
    const row: unknown = this.#db.prepare(`SELECT * FROM ${this.#table} WHERE id = ?`).get(id);
    return row === undefined ? undefined : decodeScheduleEntry(row);
  }

  async listSelectable(kind?: TaskKind): Promise<readonly ScheduleEntry[]> {
    const order = 'ORDER BY next_run_at IS NULL, next_run_at, id';
    const rows =
      kind === undefined
        ? this.#db
            .prepare(`SELECT * FROM ${this.#table} WHERE is_active = 1 AND status = 'pending' ${order}`)
            .all()
        : this.#db
            .prepare(
              `SELECT * FROM ${this.#table} WHERE is_active = 1 AND status = 'pending' AND task_kind = ? ${order}`,
            )
            .all(kind);
    return rows.map(decodeScheduleEntry);
  }

  async claim(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    return this.#update(
      `status = 'dispatched', claimed_at = @at, updated_at = @at`,
      `id = @id AND is_active = 1 AND status = 'pending'`,
      { id, at: iso(at) },
    );
  }

  async recordSuccess(id: string, update: SuccessUpdate): Promise<ScheduleEntry | undefined> {
    const target = update.complete ? 'completed' : 'pending';
    return this.#update(
      `status = CASE WHEN status = 'dispatched' THEN '${target}' ELSE status END,
       completed_at = CASE WHEN status = 'dispatched' AND @complete = 1 THEN @at ELSE completed_at END,
       last_run_at = @at, next_run_at = @nextRunAt, retry_count = 0, last_error = NULL,
       claimed_at = NULL, updated_at = @at`,
      'id = @id',
      {
        id,
        at: iso(update.at),
        nextRunAt: update.nextRunAt === null ? null : iso(update.nextRunAt),
        complete: update.complete ? 1 : 0,
      },
    );
  }

  async recordFailure(id: string, update: FailureUpdate): Promise<ScheduleEntry | undefined> {
    // SET expressions all read the pre-update row, hence retry_count + 1 in each test.
    return this.#update(
      `status = CASE
         WHEN status <> 'dispatched' THEN status
         WHEN retry_count + 1 > max_retries THEN 'cancelled'
         ELSE 'pending' END,
       cancelled_at = CASE
         WHEN status = 'dispatched' AND retry_count + 1 > max_retries THEN @at ELSE cancelled_at END,
       cancellation_reason = CASE
         WHEN status = 'dispatched' AND retry_count + 1 > max_retries THEN @reason ELSE cancellation_reason END,
       retry_count = retry_count + 1, last_error = @error, claimed_at = NULL, updated_at = @at`,
      'id = @id',
      { id, at: iso(update.at), error: update.error, reason: RETRIES_EXHAUSTED },
    );
  }

  async release(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const released = this.#update(
      `status = 'pending', claimed_at = NULL, updated_at = @at`,
      `id = @id AND status = 'dispatched'`,
      { id, at: iso(at) },
    );
    return released ?? this.get(id);
  }

  async releaseStaleClaims(claimedBefore: Timestamp, at: Timestamp): Promise<number> {
    const result = this.#db
      .prepare(
        `UPDATE ${this.#table} SET status = 'pending', claimed_at = NULL, updated_at = @at
         WHERE status = 'dispatched' AND claimed_at IS NOT NULL AND claimed_at < @cutoff`,
      )
      .run({ at: iso(at), cutoff: iso(claimedBefore) });
    return result.changes;
  }

  async deactivate(id: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    return this.#update('is_active = 0, updated_at = @at', 'id = @id', { id, at: iso(at) });
  }

  async cancel(id: string, reason: string, at: Timestamp): Promise<ScheduleEntry | undefined> {
    const cancelled = this.#update(
      `status = 'cancelled', claimed_at = NULL, cancelled_at = @at, cancellation_reason = @reason, updated_at = @at`,
      `id = @id AND status NOT IN ('completed', 'cancelled')`,
      { id, at: iso(at), reason },
    );
    return cancelled ?? this.get(id);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.#table} (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        org_id TEXT NOT NULL,
        owner_id TEXT NOT NULL,
        task_kind TEXT NOT NULL,
        task_spec TEXT NOT NULL,
        trigger_spec TEXT NOT NULL,
        recipient TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        status TEXT NOT NULL CHECK (status IN ('pending', 'dispatched', 'completed', 'cancelled')),
        last_run_at TEXT,
        next_run_at TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0,
        max_retries INTEGER NOT NULL,
        claimed_at TEXT,
        completed_at TEXT,
        cancelled_at TEXT,
        cancellation_reason TEXT,
        last_error TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ${this.#table}_selectable_idx
        ON ${this.#table} (task_kind, status, is_active, next_run_at);
    `);
  }

  async disconnect(): Promise<void> {
    this.#db.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  #update(
    set: string,
    where: string,
    params: Record<string, string | number | null>,
  ): ScheduleEntry | undefined {
    const row: unknown = this.#db
      .prepare(`UPDATE ${this.#table} SET ${set} WHERE ${where} RETURNING *`)
      .get(params);
    return row === undefined ? undefined : decodeScheduleEntry(row);
  }
}
