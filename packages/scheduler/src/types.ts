// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Schedule entry model for @creditcore/scheduler.
 *
 * An entry is either a daily time-of-day trigger (digests) or a one-shot
 * trigger at an absolute instant (follow-ups).  It moves through
 *
 *   pending → dispatched → pending | completed | cancelled
 *
 * and is only ever selected while active and pending.
 */

import { parseWithSchema } from '@creditcore/ledger';
import type { TenantKey, Timestamp } from '@creditcore/ledger';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { isValidTimeZone } from './timezone.js';

export const SCHEDULE_STATUSES = ['pending', 'dispatched', 'completed', 'cancelled'] as const;
export type ScheduleStatus = (typeof SCHEDULE_STATUSES)[number];

// ---------------------------------------------------------------------------
// Triggers
// ---------------------------------------------------------------------------

/** "HH:MM" on a 24-hour clock. */
export const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM (24-hour)');

export const DailyTriggerSchema = z.object({
  kind: z.literal('daily'),
  timeOfDay: TimeOfDaySchema,
  timezone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' }).default('UTC'),
});

export const OnceTriggerSchema = z.object({
  kind: z.literal('once'),
  at: z.string().datetime({ offset: true }),
});

export const ScheduleTriggerSchema = z.discriminatedUnion('kind', [DailyTriggerSchema, OnceTriggerSchema]);

export type DailyTrigger = z.infer<typeof DailyTriggerSchema>;
export type OnceTrigger = z.infer<typeof OnceTriggerSchema>;
export type ScheduleTrigger = z.infer<typeof ScheduleTriggerSchema>;

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export const DigestTaskSchema = z.object({
  kind: z.literal('digest'),
  accountId: z.string().min(1),
  /** Which messages the digest covers, e.g. "important" or "all". */
  criteriaType: z.string().min(1),
});

export const FollowUpTaskSchema = z.object({
  kind: z.literal('follow_up'),
  emailId: z.string().min(1),
  followUpType: z.string().min(1),
  templateMessage: z.string().optional(),
});

export const ScheduleTaskSchema = z.discriminatedUnion('kind', [DigestTaskSchema, FollowUpTaskSchema]);

export type DigestTask = z.infer<typeof DigestTaskSchema>;
export type FollowUpTask = z.infer<typeof FollowUpTaskSchema>;
export type ScheduleTask = z.infer<typeof ScheduleTaskSchema>;
export type TaskKind = ScheduleTask['kind'];

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export interface ScheduleEntry {
  readonly id: string;
  /** Billing tenant charged for credit-consuming tasks. */
  readonly userId: string;
  readonly orgId: string;
  /** Agent or email account the entry belongs to. */
  readonly ownerId: string;
  readonly task: ScheduleTask;
  readonly trigger: ScheduleTrigger;
  readonly recipient: string;
  readonly isActive: boolean;
  readonly status: ScheduleStatus;
  /** Set only after a successful dispatch. */
  readonly lastRunAt: Timestamp | null;
  readonly nextRunAt: Timestamp | null;
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly claimedAt: Timestamp | null;
  readonly completedAt: Timestamp | null;
  readonly cancelledAt: Timestamp | null;
  readonly cancellationReason: string | null;
  readonly lastError: string | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

export function tenantOf(entry: ScheduleEntry): TenantKey {
  return { userId: entry.userId, orgId: entry.orgId };
}

export const NewScheduleEntrySchema = z.object({
  id: z.string().min(1).optional(),
  userId: z.string().min(1),
  orgId: z.string().min(1),
  ownerId: z.string().min(1),
  task: ScheduleTaskSchema,
  trigger: ScheduleTriggerSchema,
  recipient: z.string().min(1),
  maxRetries: z.number().int().nonnegative().optional(),
  isActive: z.boolean().default(true),
});

export type NewScheduleEntry = z.input<typeof NewScheduleEntrySchema>;

/**
 * Validates `input` and builds a pending entry.  `nextRunAt` is left for the
 * caller (usually the store's owner) to fill with computeNextRunAt().
 *
 * @throws InvalidConfigError when the input does not match NewScheduleEntrySchema.
 */
export function createScheduleEntry(
  input: NewScheduleEntry,
  options: { now: Date; defaultMaxRetries: number; nextRunAt?: Timestamp | null },
): ScheduleEntry {
  const parsed = parseWithSchema(NewScheduleEntrySchema, input);
  const timestamp = options.now.toISOString();
  return {
    id: parsed.id ?? randomUUID(),
    userId: parsed.userId,
    orgId: parsed.orgId,
    ownerId: parsed.ownerId,
    task: parsed.task,
    trigger: parsed.trigger,
    recipient: parsed.recipient,
    isActive: parsed.isActive,
    status: 'pending',
    lastRunAt: null,
    nextRunAt: options.nextRunAt ?? null,
    retryCount: 0,
    maxRetries: parsed.maxRetries ?? options.defaultMaxRetries,
    claimedAt: null,
    completedAt: null,
    cancelledAt: null,
    cancellationReason: null,
    lastError: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}
