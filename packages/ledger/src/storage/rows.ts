// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { SUBSCRIPTION_TIERS } from '../types.js';
import type { CreditBalance, CreditTransaction, TransactionFilter } from '../types.js';

// Column decoders shared by the SQL adapters.  SQLite hands back TEXT for
// timestamps and JSON; Postgres hands back Date / parsed JSON, or strings when
// the row went through row_to_json().

const TimestampColumn = z
  .union([z.string(), z.date()])
  .transform((value) => new Date(value).toISOString());

const MetadataColumn = z
  .union([
    z
      .string()
      .transform((text): unknown => JSON.parse(text))
      .pipe(z.record(z.unknown())),
    z.record(z.unknown()),
  ])
  .nullable();

export const BalanceRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    org_id: z.string(),
    total_credits: z.number().int(),
    used_credits: z.number().int(),
    available_credits: z.number().int(),
    subscription_tier: z.enum(SUBSCRIPTION_TIERS),
    credits_reset_at: TimestampColumn.nullable(),
    created_at: TimestampColumn,
    updated_at: TimestampColumn,
  })
  .transform(
    (row): CreditBalance => ({
      id: row.id,
      userId: row.user_id,
      orgId: row.org_id,
      totalCredits: row.total_credits,
      usedCredits: row.used_credits,
      availableCredits: row.available_credits,
      subscriptionTier: row.subscription_tier,
      creditsResetAt: row.credits_reset_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

export const TransactionRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    org_id: z.string(),
    action_type: z.string(),
    credits_used: z.number().int(),
    description: z.string().nullable(),
    metadata: MetadataColumn,
    created_at: TimestampColumn,
  })
  .transform(
    (row): CreditTransaction => ({
      id: row.id,
      userId: row.user_id,
      orgId: row.org_id,
      actionType: row.action_type,
      creditsUsed: row.credits_used,
      description: row.description,
      metadata: row.metadata,
      createdAt: row.created_at,
    }),
  );

export function decodeBalance(row: unknown): CreditBalance {
  return BalanceRowSchema.parse(row);
}

export function decodeTransaction(row: unknown): CreditTransaction {
  return TransactionRowSchema.parse(row);
}

/**
 * Builds the WHERE clause for a transaction filter.
 *
 * `placeholder(n)` renders the n-th (1-based) bind marker, `?` for SQLite and
 * `$n` for Postgres.
 */
export function transactionWhere(
  filter: TransactionFilter,
  placeholder: (index: number) => string,
): { clause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const add = (sql: string, value: unknown): void => {
    params.push(value);
    conditions.push(sql.replace('?', placeholder(params.length)));
  };

  if (filter.userId !== undefined) add('user_id = ?', filter.userId);
  if (filter.orgId !== undefined) add('org_id = ?', filter.orgId);
  if (filter.actionType !== undefined) add('action_type = ?', filter.actionType);
  if (filter.since !== undefined) add('created_at >= ?', filter.since);
  if (filter.until !== undefined) add('created_at <= ?', filter.until);

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}
