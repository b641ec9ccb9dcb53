// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Adds calendar months in UTC.  The day of month is clamped to the last day
 * of the target month, so Jan 31 + 1 month is Feb 28 (or 29).
 */
export function addMonths(date: Date, months: number): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + months;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(date.getUTCDate(), lastDay);
  return new Date(
    Date.UTC(
      year,
      month,
      day,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds(),
    ),
  );
}

/**
 * Next reset anchor after a reset that was due at `previous`.
 *
 * Advances one month from the previous anchor; when that is still not after
 * `now` (the job was down for more than a month) it keeps stepping whole
 * months from the original anchor until the result is in the future.
 * Without a previous anchor the cycle starts one month from `now`.
 */
export function nextResetAfter(previous: Date | null, now: Date): Date {
  if (previous === null) return addMonths(now, 1);

  let months = 1;
  let candidate = addMonths(previous, months);
  while (candidate.getTime() <= now.getTime()) {
    months += 1;
    candidate = addMonths(previous, months);
  }
  return candidate;
}
