// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Timestamp } from '@creditcore/ledger';
import { toZonedParts, zonedTimeToUtc } from './timezone.js';
import type { DailyTrigger, ScheduleEntry, ScheduleTrigger } from './types.js';

export interface DuePolicy {
  /** How long after the scheduled time an entry stays eligible. */
  readonly dueWindowMs: number;
  /** Minimum gap since the last successful run. */
  readonly cooldownMs: number;
}

function parseTimeOfDay(timeOfDay: string): { hour: number; minute: number } {
  const match = /^(\d{2}):(\d{2})$/.exec(timeOfDay);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (match === null || hour > 23 || minute > 59) {
    throw new RangeError(`Invalid time of day "${timeOfDay}", expected HH:MM.`);
  }
  return { hour, minute };
}

function occurrenceOn(trigger: DailyTrigger, now: Date, dayOffset: number): Date {
  const { hour, minute } = parseTimeOfDay(trigger.timeOfDay);
  const today = toZonedParts(now, trigger.timezone);
  return zonedTimeToUtc(today.year, today.month, today.day + dayOffset, hour, minute, trigger.timezone);
}

/** Latest instant at or before `now` when the trigger's wall-clock time came round. */
export function mostRecentOccurrence(trigger: DailyTrigger, now: Date): Date {
  const today = occurrenceOn(trigger, now, 0);
  return today.getTime() <= now.getTime() ? today : occurrenceOn(trigger, now, -1);
}

/** Earliest instant strictly after `after` when the trigger fires. */
export function nextOccurrence(trigger: DailyTrigger, after: Date): Date {
  const today = occurrenceOn(trigger, after, 0);
  return today.getTime() > after.getTime() ? today : occurrenceOn(trigger, after, 1);
}

/**
 * Due predicate.
 *
 * daily: active, pending, `now` within `dueWindowMs` after the most recent
 * occurrence, and the last successful run more than `cooldownMs` ago.
 * once: active, pending, and `at` reached.
 */
export function isDue(entry: ScheduleEntry, now: Date, policy: DuePolicy): boolean {
  if (!entry.isActive || entry.status !== 'pending') return false;

  const trigger = entry.trigger;
  if (trigger.kind === 'once') {
    return new Date(trigger.at).getTime() <= now.getTime();
  }

  const sinceOccurrence = now.getTime() - mostRecentOccurrence(trigger, now).getTime();
  if (sinceOccurrence < 0 || sinceOccurrence > policy.dueWindowMs) return false;

  if (entry.lastRunAt === null) return true;
  return now.getTime() - new Date(entry.lastRunAt).getTime() > policy.cooldownMs;
}

/**
 * The next time the entry should run, as seen at `now`.  One-shot triggers
 * always answer their own instant; the dispatcher clears it on completion.
 */
export function computeNextRunAt(trigger: ScheduleTrigger, now: Date): Timestamp {
  if (trigger.kind === 'once') return new Date(trigger.at).toISOString();
  return nextOccurrence(trigger, now).toISOString();
}
