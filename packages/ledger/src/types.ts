// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Shared type definitions for @creditcore/ledger.
 *
 * Balances and transactions are plain readonly records.  Stores hand out
 * copies, so callers can hold on to a snapshot without it changing under them.
 */

// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** ISO 8601 timestamp string, e.g. "2026-01-01T00:00:00.000Z". */
export type Timestamp = string;

/** Billing and isolation unit: one user inside one organisation. */
export interface TenantKey {
  readonly userId: string;
  readonly orgId: string;
}

// ---------------------------------------------------------------------------
// Subscription tiers
// ---------------------------------------------------------------------------

export const SUBSCRIPTION_TIERS = ['free', 'pro', 'business'] as const;

export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

// ---------------------------------------------------------------------------
// Ledger records
// ---------------------------------------------------------------------------

/**
 * Per-tenant credit balance.
 *
 * `availableCredits` is stored redundantly so the debit can be a single
 * compare-and-decrement; it always equals `totalCredits - usedCredits`.
 */
export interface CreditBalance {
  readonly id: string;
  readonly userId: string;
  readonly orgId: string;
  /** Credits granted in the current cycle (allotment plus top-ups). */
  readonly totalCredits: number;
  /** Credits spent in the current cycle. */
  readonly usedCredits: number;
  readonly availableCredits: number;
  readonly subscriptionTier: SubscriptionTier;
  /** Next scheduled monthly reset; null means the row never auto-resets. */
  readonly creditsResetAt: Timestamp | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/**
 * Immutable audit entry.  One is appended for every applied ledger mutation.
 *
 * Sign convention: positive `creditsUsed` is a spend, negative is a grant.
 */
export interface CreditTransaction {
  readonly id: string;
  readonly userId: string;
  readonly orgId: string;
  readonly actionType: string;
  readonly creditsUsed: number;
  readonly description: string | null;
  readonly metadata: Record<string, unknown> | null;
  readonly createdAt: Timestamp;
}

/** Action types the ledger itself writes. */
export const LEDGER_ACTION = {
  GRANT: 'credit_added',
  MONTHLY_RESET: 'monthly_reset',
  ONBOARDING: 'tier_onboarding',
  TIER_CHANGE: 'tier_change',
} as const;

/**
 * Action types that re-baseline a balance.  Reconciliation only sums the log
 * from the latest of these onward.
 */
export const BASELINE_ACTIONS: ReadonlySet<string> = new Set([
  LEDGER_ACTION.MONTHLY_RESET,
  LEDGER_ACTION.ONBOARDING,
]);

// ---------------------------------------------------------------------------
// Deltas: the only way a balance changes
// ---------------------------------------------------------------------------

interface DeltaBase {
  readonly tenant: TenantKey;
  readonly actionType: string;
  readonly description: string | null;
  readonly metadata: Record<string, unknown> | null;
  /** Wall-clock time of the mutation, stamped on the balance and the transaction. */
  readonly timestamp: Timestamp;
}

/** Conditional spend: applies only when the row exists and can cover `amount`. */
export interface DebitDelta extends DeltaBase {
  readonly kind: 'debit';
  readonly amount: number;
}

/** Additive grant.  Creates the row when missing. */
export interface CreditDelta extends DeltaBase {
  readonly kind: 'credit';
  readonly amount: number;
  /** Tier given to a row created by this grant. */
  readonly defaultTier: SubscriptionTier;
  /** Reset anchor given to a row created by this grant. */
  readonly defaultResetAt: Timestamp | null;
}

/**
 * Overwrite to a fresh allotment.
 *
 * `reset` updates an existing row whose `creditsResetAt` still equals
 * `expectedResetAt` and merges `previousTotal`, `previousUsed` and
 * `forfeited`, read under the same lock, into the transaction metadata.
 * `onboard` inserts only when no row exists.
 */
export interface ResetDelta extends DeltaBase {
  readonly kind: 'reset';
  readonly mode: 'reset' | 'onboard';
  readonly tier: SubscriptionTier;
  readonly allotment: number;
  readonly nextResetAt: Timestamp;
  readonly expectedResetAt?: Timestamp | null;
}

/** Tier relabel.  Credits are untouched; the new allotment lands at the next reset. */
export interface TierDelta extends DeltaBase {
  readonly kind: 'tier';
  readonly tier: SubscriptionTier;
}

export type LedgerDelta = DebitDelta | CreditDelta | ResetDelta | TierDelta;

/** Outcome of LedgerStore.applyDelta(). */
export type LedgerMutation =
  | {
      readonly applied: true;
      readonly balance: CreditBalance;
      readonly transaction: CreditTransaction;
    }
  | {
      readonly applied: false;
      /** Current balance, or undefined when no row exists. */
      readonly balance: CreditBalance | undefined;
    };

// ---------------------------------------------------------------------------
// Query shapes
// ---------------------------------------------------------------------------

/** Filter for transaction listings.  All fields are AND-ed. */
export interface TransactionFilter {
  readonly userId?: string;
  readonly orgId?: string;
  readonly actionType?: string;
  /** Transactions created at or after this timestamp. */
  readonly since?: Timestamp;
  /** Transactions created at or before this timestamp. */
  readonly until?: Timestamp;
  readonly limit?: number;
}

export interface BalanceFilter {
  /** Only balances whose `creditsResetAt` is at or before this timestamp. */
  readonly resetDueBy?: Timestamp;
}

// ---------------------------------------------------------------------------
// Authority results
// ---------------------------------------------------------------------------

export type DeductResult =
  | {
      readonly ok: true;
      readonly balance: CreditBalance;
      readonly transaction: CreditTransaction;
    }
  | {
      readonly ok: false;
      readonly reason: 'insufficient_credits';
      readonly requested: number;
      readonly available: number;
    };

export interface MutationOptions {
  readonly description?: string;
  readonly metadata?: Record<string, unknown>;
  /** Effective time of the write.  Defaults to the authority's clock. */
  readonly at?: Date;
}
