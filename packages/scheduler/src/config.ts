// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { parseWithSchema } from '@creditcore/ledger';
import * as cron from 'node-cron';
import { z } from 'zod';
import { isValidTimeZone } from './timezone.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

const DurationMsSchema = z.number().int().positive();

const CronExpressionSchema = z
  .string()
  .refine((expression) => cron.validate(expression), { message: 'Invalid cron expression' });

const TimeZoneSchema = z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' });

/**
 * Zod schema for SchedulerConfig.
 */
export const SchedulerConfigSchema = z.object({
  /** How long after the scheduled time an entry stays eligible. */
  dueWindowMs: DurationMsSchema.default(5 * MINUTE_MS),
  /** Minimum gap between two successful runs of the same daily entry. */
  cooldownMs: DurationMsSchema.default(23 * HOUR_MS),
  /** Upper bound on one task handler run. */
  dispatchTimeoutMs: DurationMsSchema.default(25 * MINUTE_MS),
  /** A claim older than this is presumed abandoned and released. */
  staleClaimMs: DurationMsSchema.default(30 * MINUTE_MS),
  /** maxRetries given to entries created without one. */
  defaultMaxRetries: z.number().int().nonnegative().default(3),
  /** How far back the first fetch of an account looks. */
  fetchLookbackMs: DurationMsSchema.default(24 * HOUR_MS),
  /** Messages fetched per account per run. */
  fetchLimit: z.number().int().positive().default(100),
  /** Messages summarised per digest. */
  digestMessageLimit: z.number().int().positive().default(50),
  /** Time zone the cron expressions are evaluated in. */
  cronTimezone: TimeZoneSchema.default('UTC'),
  fetchCron: CronExpressionSchema.default('*/5 * * * *'),
  digestCron: CronExpressionSchema.default('*/5 * * * *'),
  followUpCron: CronExpressionSchema.default('0 * * * *'),
  resetCron: CronExpressionSchema.default('0 * * * *'),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

/**
 * Parse and validate a SchedulerConfig, throwing InvalidConfigError on failure.
 */
export function parseSchedulerConfig(raw: unknown): SchedulerConfig {
  return parseWithSchema(SchedulerConfigSchema, raw);
}

const ENV_NUMBERS: ReadonlyArray<[string, keyof SchedulerConfig]> = [
  ['CREDITCORE_DUE_WINDOW_MS', 'dueWindowMs'],
  ['CREDITCORE_COOLDOWN_MS', 'cooldownMs'],
  ['CREDITCORE_DISPATCH_TIMEOUT_MS', 'dispatchTimeoutMs'],
  ['CREDITCORE_STALE_CLAIM_MS', 'staleClaimMs'],
  ['CREDITCORE_MAX_RETRIES', 'defaultMaxRetries'],
  ['CREDITCORE_FETCH_LOOKBACK_MS', 'fetchLookbackMs'],
  ['CREDITCORE_FETCH_LIMIT', 'fetchLimit'],
  ['CREDITCORE_DIGEST_MESSAGE_LIMIT', 'digestMessageLimit'],
];

const ENV_STRINGS: ReadonlyArray<[string, keyof SchedulerConfig]> = [
  ['CREDITCORE_CRON_TIMEZONE', 'cronTimezone'],
  ['CREDITCORE_FETCH_CRON', 'fetchCron'],
  ['CREDITCORE_DIGEST_CRON', 'digestCron'],
  ['CREDITCORE_FOLLOW_UP_CRON', 'followUpCron'],
  ['CREDITCORE_RESET_CRON', 'resetCron'],
];

/**
 * Builds a scheduler config from `CREDITCORE_*` environment variables, e.g.
 * CREDITCORE_DUE_WINDOW_MS=600000 or CREDITCORE_RESET_CRON="0 0 1 * *".
 */
export function schedulerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SchedulerConfig {
  const raw: Record<string, unknown> = {};
  for (const [name, key] of ENV_NUMBERS) {
    const value = env[name];
    if (value !== undefined) raw[key] = Number(value);
  }
  for (const [name, key] of ENV_STRINGS) {
    const value = env[name];
    if (value !== undefined) raw[key] = value;
  }
  return parseSchedulerConfig(raw);
}
