// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { CreditCoreError } from '@creditcore/ledger';

/**
 * A scheduled task failed.  The dispatcher records it against the entry's
 * retry budget; `retryCount` is the count after this failure.
 */
export class ScheduleDispatchError extends CreditCoreError {
  readonly entryId: string;
  readonly retryCount: number;

  constructor(entryId: string, retryCount: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('SCHEDULE_DISPATCH_FAILED', `Dispatch of schedule "${entryId}" failed (attempt ${retryCount}): ${detail}`, {
      cause,
    });
    this.name = 'ScheduleDispatchError';
    this.entryId = entryId;
    this.retryCount = retryCount;
  }
}

/** A task handler ran past the dispatch timeout. */
export class DispatchTimeoutError extends CreditCoreError {
  readonly entryId: string;
  readonly timeoutMs: number;

  constructor(entryId: string, timeoutMs: number) {
    super('DISPATCH_TIMEOUT', `Dispatch of schedule "${entryId}" exceeded ${timeoutMs} ms.`);
    this.name = 'DispatchTimeoutError';
    this.entryId = entryId;
    this.timeoutMs = timeoutMs;
  }
}

/** A task references an email account the directory no longer knows. */
export class AccountNotFoundError extends CreditCoreError {
  readonly accountId: string;

  constructor(accountId: string) {
    super('ACCOUNT_NOT_FOUND', `No connected email account "${accountId}".`);
    this.name = 'AccountNotFoundError';
    this.accountId = accountId;
  }
}
