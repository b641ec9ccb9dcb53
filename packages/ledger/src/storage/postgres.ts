// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { LedgerWriteConflictError } from '../errors.js';
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
import { BalanceRowSchema, TransactionRowSchema, decodeBalance, decodeTransaction, transactionWhere } from './rows.js';

/**
 * Minimal Postgres client interface.
 *
 * A `pg` Pool or Client satisfies it, as do most drivers that expose
 * `query(text, values)`.
 */
export interface PostgresClientLike {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end?(): Promise<void>;
}

/** Configuration for the Postgres ledger store. */
export interface PostgresLedgerStoreConfig {
  client: PostgresClientLike;
  /** Schema holding the ledger tables.  Defaults to "public". */
  schema?: string;
}

/** SQLSTATEs for serialization failure and deadlock. */
const CONFLICT_SQLSTATES: ReadonlySet<string> = new Set(['40001', '40P01']);

function isConflictError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    CONFLICT_SQLSTATES.has(error.code)
  );
}

/** Shape of the single row every mutation statement returns. */
const MutationRowSchema = z.object({
  balance: BalanceRowSchema,
  transaction: TransactionRowSchema,
});

/**
 * Postgres-backed LedgerStore.
 *
 * Every delta is one statement: a data-modifying CTE that updates or inserts
 * the balance row and appends its transaction from the RETURNING set.  The
 * statement runs atomically in its own implicit transaction, and the debit's
 * `available_credits >= $n` guard is re-evaluated after any row-lock wait.
 * Serialization failures and deadlocks surface as LedgerWriteConflictError.
 *
 * All queries use parameterised placeholders ($1, $2, ...).
 */
export class PostgresLedgerStore implements LedgerStore {
  readonly #client: PostgresClientLike;
  readonly #schema: string;

  constructor(config: PostgresLedgerStoreConfig) {
    this.#client = config.client;
    this.#schema = config.schema ?? 'public';
  }

  #table(name: 'credit_balances' | 'credit_transactions'): string {
    return `"${this.#schema}"."${name}"`;
  }

  async getBalance(tenant: TenantKey): Promise<CreditBalance | undefined> {
    const result = await this.#client.query(
      `SELECT * FROM ${this.#table('credit_balances')} WHERE user_id = $1 AND org_id = $2`,
      [tenant.userId, tenant.orgId],
    );
    const row = result.rows[0];
    return row === undefined ? undefined : decodeBalance(row);
  }

  async applyDelta(delta: LedgerDelta): Promise<LedgerMutation> {
    let rows: unknown[];
    try {
      rows = await this.#runDelta(delta);
    } catch (error: unknown) {
      if (isConflictError(error)) {
        throw new LedgerWriteConflictError(
          `Ledger write for user "${delta.tenant.userId}" in org "${delta.tenant.orgId}" was serialized out.`,
          { cause: error },
        );
      }
      throw error;
    }

    const row = rows[0];
    if (row === undefined) {
      return { applied: false, balance: await this.getBalance(delta.tenant) };
    }
    const parsed = MutationRowSchema.parse(row);
    return { applied: true, balance: parsed.balance, transaction: parsed.transaction };
  }

  async listBalances(filter: BalanceFilter = {}): Promise<readonly CreditBalance[]> {
    const result =
      filter.resetDueBy === undefined
        ? await this.#client.query(
            `SELECT * FROM ${this.#table('credit_balances')} ORDER BY user_id, org_id`,
          )
        : await this.#client.query(
            `SELECT * FROM ${this.#table('credit_balances')}
             WHERE credits_reset_at IS NOT NULL AND credits_reset_at <= $1
             ORDER BY user_id, org_id`,
            [filter.resetDueBy],
          );
    return result.rows.map(decodeBalance);
  }

  async listTransactions(filter: TransactionFilter = {}): Promise<readonly CreditTransaction[]> {
    const { clause, params } = transactionWhere(filter, (n) => `$${n}`);
    const table = this.#table('credit_transactions');
    if (filter.limit !== undefined) {
      const result = await this.#client.query(
        `SELECT * FROM (
           SELECT * FROM ${table} ${clause} ORDER BY seq DESC LIMIT $${params.length + 1}
         ) recent ORDER BY seq ASC`,
        [...params, filter.limit],
      );
      return result.rows.map(decodeTransaction);
    }
    const result = await this.#client.query(`SELECT * FROM ${table} ${clause} ORDER BY seq ASC`, params);
    return result.rows.map(decodeTransaction);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS ${this.#table('credit_balances')} (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        org_id TEXT NOT NULL,
        total_credits INTEGER NOT NULL,
        used_credits INTEGER NOT NULL,
        available_credits INTEGER NOT NULL CHECK (available_credits >= 0),
        subscription_tier TEXT NOT NULL,
        credits_reset_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL,
        UNIQUE (user_id, org_id)
      );
      CREATE TABLE IF NOT EXISTS ${this.#table('credit_transactions')} (
        seq BIGSERIAL,
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        org_id TEXT NOT NULL,
        action_type TEXT NOT NULL,
        credits_used INTEGER NOT NULL,
        description TEXT,
        metadata JSONB,
        created_at TIMESTAMPTZ NOT NULL
      );
      CREATE INDEX IF NOT EXISTS credit_transactions_tenant_idx
        ON ${this.#table('credit_transactions')} (user_id, org_id, created_at);
      CREATE INDEX IF NOT EXISTS credit_balances_reset_idx
        ON ${this.#table('credit_balances')} (credits_reset_at);
    `);
  }

  async disconnect(): Promise<void> {
    await this.#client.end?.();
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.#client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Statements
  // -------------------------------------------------------------------------

  /**
   * Appends the transaction for the row in CTE `source` and selects both as
   * JSON objects.  `$1..$5` are always tx id, action type, credits used,
   * description and metadata; `$6` is the timestamp.
   */
  #appendTransaction(source: string, metadataSql = '$5::jsonb'): string {
    return `
      tx AS (
        INSERT INTO ${this.#table('credit_transactions')}
          (id, user_id, org_id, action_type, credits_used, description, metadata, created_at)
        SELECT $1, user_id, org_id, $2, $3, $4, ${metadataSql}, $6::timestamptz FROM ${source}
        RETURNING id, user_id, org_id, action_type, credits_used, description, metadata, created_at
      )
      SELECT row_to_json(${source}.*) AS balance, row_to_json(tx.*) AS transaction
      FROM ${source}, tx`;
  }

  async #runDelta(delta: LedgerDelta): Promise<unknown[]> {
    const balances = this.#table('credit_balances');
    const { tenant } = delta;
    const metadata = delta.metadata === null ? null : JSON.stringify(delta.metadata);
    const txId = randomUUID();
    const common = (creditsUsed: number): unknown[] => [
      txId,
      delta.actionType,
      creditsUsed,
      delta.description,
      metadata,
      delta.timestamp,
      tenant.userId,
      tenant.orgId,
    ];

    switch (delta.kind) {
      case 'debit': {
        const result = await this.#client.query(
          `WITH changed AS (
             UPDATE ${balances}
             SET used_credits = used_credits + $9, available_credits = available_credits - $9,
                 updated_at = $6::timestamptz
             WHERE user_id = $7 AND org_id = $8 AND available_credits >= $9
             RETURNING *
           ),
           ${this.#appendTransaction('changed')}`,
          [...common(delta.amount), delta.amount],
        );
        return result.rows;
      }

      case 'credit': {
        const result = await this.#client.query(
          `WITH changed AS (
             INSERT INTO ${balances}
               (id, user_id, org_id, total_credits, used_credits, available_credits,
                subscription_tier, credits_reset_at, created_at, updated_at)
             VALUES ($9, $7, $8, $10, 0, $10, $11, $12::timestamptz, $6::timestamptz, $6::timestamptz)
             ON CONFLICT (user_id, org_id) DO UPDATE SET
               total_credits = ${balances}.total_credits + EXCLUDED.total_credits,
               available_credits = ${balances}.available_credits + EXCLUDED.available_credits,
               updated_at = EXCLUDED.updated_at
             RETURNING *
           ),
           ${this.#appendTransaction('changed')}`,
          [...common(-delta.amount), randomUUID(), delta.amount, delta.defaultTier, delta.defaultResetAt],
        );
        return result.rows;
      }

      case 'reset': {
        if (delta.mode === 'onboard') {
          const result = await this.#client.query(
            `WITH changed AS (
               INSERT INTO ${balances}
                 (id, user_id, org_id, total_credits, used_credits, available_credits,
                  subscription_tier, credits_reset_at, created_at, updated_at)
               VALUES ($9, $7, $8, $10, 0, $10, $11, $12::timestamptz, $6::timestamptz, $6::timestamptz)
               ON CONFLICT (user_id, org_id) DO NOTHING
               RETURNING *
             ),
             ${this.#appendTransaction('changed')}`,
            [...common(-delta.allotment), randomUUID(), delta.allotment, delta.tier, delta.nextResetAt],
          );
          return result.rows;
        }

        const guard =
          delta.expectedResetAt === undefined
            ? ''
            : 'AND credits_reset_at IS NOT DISTINCT FROM $12::timestamptz';
        const result = await this.#client.query(
          `WITH prior AS (
             SELECT id, total_credits, used_credits, available_credits FROM ${balances}
             WHERE user_id = $7 AND org_id = $8 ${guard}
             FOR UPDATE
           ),
           changed AS (
             UPDATE ${balances} b
             SET total_credits = $9, used_credits = 0, available_credits = $9,
                 subscription_tier = $10, credits_reset_at = $11::timestamptz, updated_at = $6::timestamptz
             FROM prior WHERE b.id = prior.id
             RETURNING b.*
           ),
           ${this.#appendTransaction(
             'changed',
             `COALESCE($5::jsonb, '{}'::jsonb) || (SELECT jsonb_build_object(
                'previousTotal', total_credits,
                'previousUsed', used_credits,
                'forfeited', available_credits) FROM prior)`,
           )}`,
          [
            ...common(-delta.allotment),
            delta.allotment,
            delta.tier,
            delta.nextResetAt,
            ...(delta.expectedResetAt === undefined ? [] : [delta.expectedResetAt]),
          ],
        );
        return result.rows;
      }

      case 'tier': {
        const result = await this.#client.query(
          `WITH changed AS (
             UPDATE ${balances} SET subscription_tier = $9, updated_at = $6::timestamptz
             WHERE user_id = $7 AND org_id = $8
             RETURNING *
           ),
           ${this.#appendTransaction('changed')}`,
          [...common(0), delta.tier],
        );
        return result.rows;
      }
    }
  }
}
