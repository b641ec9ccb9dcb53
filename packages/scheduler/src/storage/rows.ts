// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { SCHEDULE_STATUSES, ScheduleTaskSchema, ScheduleTriggerSchema } from '../types.js';
import type { ScheduleEntry } from '../types.js';

const TimestampColumn = z.string().transform((value) => new Date(value).toISOString());

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text): unknown => JSON.parse(text))
    .pipe(schema);
}

export const ScheduleRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    org_id: z.string(),
    owner_id: z.string(),
    task_spec: jsonColumn(ScheduleTaskSchema),
    trigger_spec: jsonColumn(ScheduleTriggerSchema),
    recipient: z.string(),
    is_active: z.union([z.literal(0), z.literal(1)]),
    status: z.enum(SCHEDULE_STATUSES),
    last_run_at: TimestampColumn.nullable(),
    next_run_at: TimestampColumn.nullable(),
    retry_count: z.number().int(),
    max_retries: z.number().int(),
    claimed_at: TimestampColumn.nullable(),
    completed_at: TimestampColumn.nullable(),
    cancelled_at: TimestampColumn.nullable(),
    cancellation_reason: z.string().nullable(),
    last_error: z.string().nullable(),
    created_at: TimestampColumn,
    updated_at: TimestampColumn,
  })
  .transform(
    (row): ScheduleEntry => ({
      id: row.id,
      userId: row.user_id,
      orgId: row.org_id,
      ownerId: row.owner_id,
      task: row.task_spec,
      trigger: row.trigger_spec,
      recipient: row.recipient,
      isActive: row.is_active === 1,
      status: row.status,
      lastRunAt: row.last_run_at,
      nextRunAt: row.next_run_at,
      retryCount: row.retry_count,
      maxRetries: row.max_retries,
      claimedAt: row.claimed_at,
      completedAt: row.completed_at,
      cancelledAt: row.cancelled_at,
      cancellationReason: row.cancellation_reason,
      lastError: row.last_error,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

export function decodeScheduleEntry(row: unknown): ScheduleEntry {
  return ScheduleRowSchema.parse(row);
}

/** Named bind parameters for an INSERT of `entry`. */
export function encodeScheduleEntry(entry: ScheduleEntry): Record<string, string | number | null> {
  return {
    id: entry.id,
    user_id: entry.userId,
    org_id: entry.orgId,
    owner_id: entry.ownerId,
    task_kind: entry.task.kind,
    task_spec: JSON.stringify(entry.task),
    trigger_spec: JSON.stringify(entry.trigger),
    recipient: entry.recipient,
    is_active: entry.isActive ? 1 : 0,
    status: entry.status,
    last_run_at: entry.lastRunAt,
    next_run_at: entry.nextRunAt,
    retry_count: entry.retryCount,
    max_retries: entry.maxRetries,
    claimed_at: entry.claimedAt,
    completed_at: entry.completedAt,
    cancelled_at: entry.cancelledAt,
    cancellation_reason: entry.cancellationReason,
    last_error: entry.lastError,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}
