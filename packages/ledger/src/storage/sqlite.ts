// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import { BalanceNotFoundError, LedgerWriteConflictError } from '../errors.js';
import type {
  BalanceFilter,
  CreditBalance,
  CreditTransaction,
  LedgerDelta,
  LedgerMutation,
  TenantKey,
  TransactionFilter,
} from '../types.js';
import type { LedgerStore } from './adapter.js';
import { decodeBalance, decodeTransaction, transactionWhere } from './rows.js';

/** Configuration for the SQLite ledger store. */
export interface SQLiteLedgerStoreConfig {
  /** An open better-sqlite3 database. */
  database: Database.Database;
  /** Table name prefix.  Defaults to "" (tables `credit_balances`, `credit_transactions`). */
  tablePrefix?: string;
}

const BALANCE_COLUMNS =
  'id, user_id, org_id, total_credits, used_credits, available_credits, subscription_tier, ' +
  'credits_reset_at, created_at, updated_at';

const TRANSACTION_COLUMNS =
  'id, user_id, org_id, action_type, credits_used, description, metadata, created_at';

function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED')) {
    return true;
  }
  return error.message.includes('database is locked');
}

/**
 * SQLite-backed LedgerStore on better-sqlite3.
 *
 * Every delta runs in a `BEGIN IMMEDIATE` transaction, which takes the write
 * lock up front.  The debit itself is a conditional UPDATE
 * (`WHERE available_credits >= ?`); zero changed rows means the debit was
 * refused and nothing else is written.  Lock timeouts from other connections
 * surface as LedgerWriteConflictError.
 *
 * Table schema:
 *   {prefix}credit_balances      one row per (user_id, org_id)
 *   {prefix}credit_transactions  append-only audit log, ordered by rowid
 */
export class SQLiteLedgerStore implements LedgerStore {
  readonly #db: Database.Database;
  readonly #balances: string;
  readonly #transactions: string;
  readonly #apply: Database.Transaction<(delta: LedgerDelta) => LedgerMutation>;

  constructor(config: SQLiteLedgerStoreConfig) {
    const prefix = config.tablePrefix ?? '';
    this.#db = config.database;
    this.#balances = `${prefix}credit_balances`;
    this.#transactions = `${prefix}credit_transactions`;
    this.#apply = this.#db.transaction((delta: LedgerDelta) => this.#applyInTransaction(delta));
  }

  async getBalance(tenant: TenantKey): Promise<CreditBalance | undefined> {
    return this.#selectBalance(tenant);
  }

  async applyDelta(delta: LedgerDelta): Promise<LedgerMutation> {
    try {
      return this.#apply.immediate(delta);
    } catch (error: unknown) {
      if (isBusyError(error)) {
        throw new LedgerWriteConflictError(
          `Ledger write for user "${delta.tenant.userId}" in org "${delta.tenant.orgId}" lost a lock race.`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  async listBalances(filter: BalanceFilter = {}): Promise<readonly CreditBalance[]> {
    const rows =
      filter.resetDueBy === undefined
        ? this.#db
            .prepare(`SELECT ${BALANCE_COLUMNS} FROM ${this.#balances} ORDER BY user_id, org_id`)
            .all()
        : this.#db
            .prepare(
              `SELECT ${BALANCE_COLUMNS} FROM ${this.#balances}
               WHERE credits_reset_at IS NOT NULL AND credits_reset_at <= ?
               ORDER BY user_id, org_id`,
            )
            .all(new Date(filter.resetDueBy).toISOString());
    return rows.map(decodeBalance);
  }

  async listTransactions(filter: TransactionFilter = {}): Promise<readonly CreditTransaction[]> {
    const { clause, params } = transactionWhere(filter, () => '?');
    if (filter.limit !== undefined) {
      const rows = this.#db
        .prepare(
          `SELECT * FROM (
             SELECT rowid AS seq, ${TRANSACTION_COLUMNS} FROM ${this.#transactions} ${clause}
             ORDER BY rowid DESC LIMIT ?
           ) ORDER BY seq ASC`,
        )
        .all(...params, filter.limit);
      return rows.map(decodeTransaction);
    }
    const rows = this.#db
      .prepare(`SELECT ${TRANSACTION_COLUMNS} FROM ${this.#transactions} ${clause} ORDER BY rowid ASC`)
      .all(...params);
    return rows.map(decodeTransaction);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.#balances} (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        org_id TEXT NOT NULL,
        total_credits INTEGER NOT NULL,
        used_credits INTEGER NOT NULL,
        available_credits INTEGER NOT NULL CHECK (available_credits >= 0),
        subscription_tier TEXT NOT NULL,
        credits_reset_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (user_id, org_id)
      );
      CREATE TABLE IF NOT EXISTS ${this.#transactions} (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        org_id TEXT NOT NULL,
        action_type TEXT NOT NULL,
        credits_used INTEGER NOT NULL,
        description TEXT,
        metadata TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ${this.#transactions}_tenant_idx
        ON ${this.#transactions} (user_id, org_id, created_at);
      CREATE INDEX IF NOT EXISTS ${this.#balances}_reset_idx
        ON ${this.#balances} (credits_reset_at);
    `);
  }

  async disconnect(): Promise<void> {
    this.#db.close();
  }

  async isHealthy(): Promise<boolean> {
    try {
      this.#db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  #selectBalance(tenant: TenantKey): CreditBalance | undefined {
    const row = this.#db
      .prepare(`SELECT ${BALANCE_COLUMNS} FROM ${this.#balances} WHERE user_id = ? AND org_id = ?`)
      .get(tenant.userId, tenant.orgId);
    return row === undefined ? undefined : decodeBalance(row);
  }

  #requireBalance(tenant: TenantKey): CreditBalance {
    const balance = this.#selectBalance(tenant);
    if (balance === undefined) throw new BalanceNotFoundError(tenant);
    return balance;
  }

  #insertTransaction(
    delta: LedgerDelta,
    creditsUsed: number,
    metadata: Record<string, unknown> | null,
  ): CreditTransaction {
    const id = randomUUID();
    this.#db
      .prepare(
        `INSERT INTO ${this.#transactions} (${TRANSACTION_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        delta.tenant.userId,
        delta.tenant.orgId,
        delta.actionType,
        creditsUsed,
        delta.description,
        metadata === null ? null : JSON.stringify(metadata),
        delta.timestamp,
      );
    return {
      id,
      userId: delta.tenant.userId,
      orgId: delta.tenant.orgId,
      actionType: delta.actionType,
      creditsUsed,
      description: delta.description,
      metadata,
      createdAt: delta.timestamp,
    };
  }

  #insertBalance(
    tenant: TenantKey,
    credits: number,
    tier: string,
    resetAt: string | null,
    timestamp: string,
  ): void {
    this.#db
      .prepare(
        `INSERT INTO ${this.#balances} (${BALANCE_COLUMNS}) VALUES (?, ?, ?, ?, 0, ?, ?, ?, ?, ?)`,
      )
      .run(randomUUID(), tenant.userId, tenant.orgId, credits, credits, tier, resetAt, timestamp, timestamp);
  }

  #applyInTransaction(delta: LedgerDelta): LedgerMutation {
    const { tenant, timestamp } = delta;

    switch (delta.kind) {
      case 'debit': {
        const result = this.#db
          .prepare(
            `UPDATE ${this.#balances}
             SET used_credits = used_credits + ?, available_credits = available_credits - ?, updated_at = ?
             WHERE user_id = ? AND org_id = ? AND available_credits >= ?`,
          )
          .run(delta.amount, delta.amount, timestamp, tenant.userId, tenant.orgId, delta.amount);
        if (result.changes === 0) {
          return { applied: false, balance: this.#selectBalance(tenant) };
        }
        const transaction = this.#insertTransaction(delta, delta.amount, delta.metadata);
        return { applied: true, balance: this.#requireBalance(tenant), transaction };
      }

      case 'credit': {
        this.#db
          .prepare(
            `INSERT INTO ${this.#balances} (${BALANCE_COLUMNS}) VALUES (?, ?, ?, ?, 0, ?, ?, ?, ?, ?)
             ON CONFLICT (user_id, org_id) DO UPDATE SET
               total_credits = total_credits + excluded.total_credits,
               available_credits = available_credits + excluded.available_credits,
               updated_at = excluded.updated_at`,
          )
          .run(
            randomUUID(),
            tenant.userId,
            tenant.orgId,
            delta.amount,
            delta.amount,
            delta.defaultTier,
            delta.defaultResetAt,
            timestamp,
            timestamp,
          );
        const transaction = this.#insertTransaction(delta, -delta.amount, delta.metadata);
        return { applied: true, balance: this.#requireBalance(tenant), transaction };
      }

      case 'reset': {
        if (delta.mode === 'onboard') {
          if (this.#selectBalance(tenant) !== undefined) {
            return { applied: false, balance: this.#selectBalance(tenant) };
          }
          this.#insertBalance(tenant, delta.allotment, delta.tier, delta.nextResetAt, timestamp);
          const transaction = this.#insertTransaction(delta, -delta.allotment, delta.metadata);
          return { applied: true, balance: this.#requireBalance(tenant), transaction };
        }

        const before = this.#selectBalance(tenant);
        if (
          before === undefined ||
          (delta.expectedResetAt !== undefined && before.creditsResetAt !== delta.expectedResetAt)
        ) {
          return { applied: false, balance: before };
        }
        this.#db
          .prepare(
            `UPDATE ${this.#balances}
             SET total_credits = ?, used_credits = 0, available_credits = ?,
                 subscription_tier = ?, credits_reset_at = ?, updated_at = ?
             WHERE id = ?`,
          )
          .run(delta.allotment, delta.allotment, delta.tier, delta.nextResetAt, timestamp, before.id);
        const transaction = this.#insertTransaction(delta, -delta.allotment, {
          ...delta.metadata,
          previousTotal: before.totalCredits,
          previousUsed: before.usedCredits,
          forfeited: before.availableCredits,
        });
        return { applied: true, balance: this.#requireBalance(tenant), transaction };
      }

      case 'tier': {
        const result = this.#db
          .prepare(
            `UPDATE ${this.#balances} SET subscription_tier = ?, updated_at = ?
             WHERE user_id = ? AND org_id = ?`,
          )
          .run(delta.tier, timestamp, tenant.userId, tenant.orgId);
        if (result.changes === 0) {
          return { applied: false, balance: undefined };
        }
        const transaction = this.#insertTransaction(delta, 0, delta.metadata);
        return { applied: true, balance: this.#requireBalance(tenant), transaction };
      }
    }
  }
}
