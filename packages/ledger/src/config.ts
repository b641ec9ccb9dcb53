// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import { ACTION_KINDS } from './costs.js';

// ---------------------------------------------------------------------------
// Ledger config
// ---------------------------------------------------------------------------

const CreditAmountSchema = z.number().int().positive();

const CostOverridesSchema = z
  .object({
    email_classification: CreditAmountSchema.optional(),
    email_draft_short: CreditAmountSchema.optional(),
    email_draft_long: CreditAmountSchema.optional(),
    sender_research_basic: CreditAmountSchema.optional(),
    sender_research_deep: CreditAmountSchema.optional(),
    workflow_execution: CreditAmountSchema.optional(),
    follow_up_send: CreditAmountSchema.optional(),
  })
  .strict();

const TierOverrideSchema = z
  .object({
    monthlyCredits: CreditAmountSchema.optional(),
    maxWorkflows: z.number().int().nonnegative().optional(),
    maxFollowUps: z.number().int().nonnegative().optional(),
  })
  .strict();

/**
 * Zod schema for LedgerConfig.
 */
export const LedgerConfigSchema = z.object({
  /** Per-action credit cost overrides.  Unlisted actions keep their defaults. */
  costs: CostOverridesSchema.optional(),
  /** Per-tier allotment overrides. */
  tiers: z
    .object({
      free: TierOverrideSchema.optional(),
      pro: TierOverrideSchema.optional(),
      business: TierOverrideSchema.optional(),
    })
    .strict()
    .optional(),
  /**
   * A debit that leaves available credits at or below this percentage of the
   * cycle total emits `ledger:low_balance`.  Defaults to 10.
   */
  lowBalancePercent: z.number().min(0).max(100).default(10),
  /**
   * Serialize ledger mutations per tenant inside this process.  Required for
   * stores that cannot compare-and-write on their own; harmless otherwise.
   */
  serializePerTenant: z.boolean().default(true),
  /**
   * Back-off schedule for LedgerWriteConflictError retries.  One retry per
   * entry; the conflict is rethrown once the list is exhausted.
   */
  writeRetryDelaysMs: z.array(z.number().int().nonnegative()).default([10, 50, 200]),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;

// ---------------------------------------------------------------------------
// Logging config
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/**
 * Runs `schema.safeParse` and converts failures into InvalidConfigError.
 * Shared by every package in the workspace.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Parse and validate a LedgerConfig, throwing InvalidConfigError on failure.
 */
export function parseLedgerConfig(raw: unknown): LedgerConfig {
  return parseWithSchema(LedgerConfigSchema, raw);
}

/**
 * Builds a raw ledger config from `CREDITCORE_*` environment variables.
 *
 *   CREDITCORE_LOW_BALANCE_PERCENT     number
 *   CREDITCORE_SERIALIZE_PER_TENANT    "true" | "false"
 *   CREDITCORE_COST_<ACTION>           integer, e.g. CREDITCORE_COST_EMAIL_CLASSIFICATION
 *   CREDITCORE_TIER_<TIER>_CREDITS     integer, e.g. CREDITCORE_TIER_PRO_CREDITS
 *
 * The result still goes through parseLedgerConfig().
 */
export function ledgerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const raw: Record<string, unknown> = {};

  if (env['CREDITCORE_LOW_BALANCE_PERCENT'] !== undefined) {
    raw['lowBalancePercent'] = Number(env['CREDITCORE_LOW_BALANCE_PERCENT']);
  }
  if (env['CREDITCORE_SERIALIZE_PER_TENANT'] !== undefined) {
    raw['serializePerTenant'] = env['CREDITCORE_SERIALIZE_PER_TENANT'] === 'true';
  }

  const costs: Record<string, number> = {};
  for (const kind of ACTION_KINDS) {
    const value = env[`CREDITCORE_COST_${kind.toUpperCase()}`];
    if (value !== undefined) costs[kind] = Number(value);
  }
  if (Object.keys(costs).length > 0) raw['costs'] = costs;

  const tiers: Record<string, { monthlyCredits: number }> = {};
  for (const tier of ['free', 'pro', 'business']) {
    const value = env[`CREDITCORE_TIER_${tier.toUpperCase()}_CREDITS`];
    if (value !== undefined) tiers[tier] = { monthlyCredits: Number(value) };
  }
  if (Object.keys(tiers).length > 0) raw['tiers'] = tiers;

  return parseLedgerConfig(raw);
}
