// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { TenantKey } from './types.js';

/**
 * Base class for all creditcore errors.
 *
 * Every error carries a machine-readable `code` that calling code can switch
 * on without parsing human-readable messages.
 */
export class CreditCoreError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CreditCoreError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a spend cannot be covered by the tenant's available credits.
 *
 * Recoverable and user-facing: the action was never attempted, and the
 * caller should offer an upgrade or point at the next reset.
 */
export class InsufficientCreditsError extends CreditCoreError {
  readonly userId: string;
  readonly orgId: string;
  readonly requested: number;
  readonly available: number;

  constructor(tenant: TenantKey, requested: number, available: number) {
    super(
      'INSUFFICIENT_CREDITS',
      `Insufficient credits for user "${tenant.userId}" in org "${tenant.orgId}": ` +
        `requested ${requested}, available ${available}. Upgrade your plan or wait for the monthly reset.`,
    );
    this.name = 'InsufficientCreditsError';
    this.userId = tenant.userId;
    this.orgId = tenant.orgId;
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Raised by a Ledger Store when a concurrent writer won the race at the
 * storage layer (SQLITE_BUSY, serialization failure, deadlock).
 *
 * Transient and internal: CreditAuthority retries it before giving up.
 */
export class LedgerWriteConflictError extends CreditCoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LEDGER_WRITE_CONFLICT', message, options);
    this.name = 'LedgerWriteConflictError';
  }
}

/** Thrown when an operation requires an existing balance row and none exists. */
export class BalanceNotFoundError extends CreditCoreError {
  readonly userId: string;
  readonly orgId: string;

  constructor(tenant: TenantKey) {
    super(
      'BALANCE_NOT_FOUND',
      `No credit balance exists for user "${tenant.userId}" in org "${tenant.orgId}".`,
    );
    this.name = 'BalanceNotFoundError';
    this.userId = tenant.userId;
    this.orgId = tenant.orgId;
  }
}

/**
 * Thrown by ActionGate when the wrapped work fails after its credits were
 * charged.  The charge stands; `creditsUsed` and `availableCredits` report
 * the billing outcome next to the original `cause`.
 */
export class ActionExecutionError extends CreditCoreError {
  readonly action: string;
  readonly creditsUsed: number;
  readonly availableCredits: number;

  constructor(action: string, creditsUsed: number, availableCredits: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('ACTION_EXECUTION_FAILED', `Action "${action}" failed after charging ${creditsUsed} credits: ${detail}`, {
      cause,
    });
    this.name = 'ActionExecutionError';
    this.action = action;
    this.creditsUsed = creditsUsed;
    this.availableCredits = availableCredits;
  }
}

/** Thrown when a monthly reset could not be written; the next run retries it. */
export class TierResetError extends CreditCoreError {
  readonly userId: string;
  readonly orgId: string;

  constructor(tenant: TenantKey, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      'TIER_RESET_FAILED',
      `Monthly reset failed for user "${tenant.userId}" in org "${tenant.orgId}": ${detail}`,
      { cause },
    );
    this.name = 'TierResetError';
    this.userId = tenant.userId;
    this.orgId = tenant.orgId;
  }
}

/**
 * Thrown when configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error in
 * `path: message` form, ready for structured loggers.
 */
export class InvalidConfigError extends CreditCoreError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
