// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { BASELINE_ACTIONS } from './types.js';
import type { CreditBalance, CreditTransaction } from './types.js';

export interface CreditTotals {
  readonly totalCredits: number;
  readonly usedCredits: number;
  readonly availableCredits: number;
}

export interface ReconciliationReport {
  readonly userId: string;
  readonly orgId: string;
  /** Totals replayed from the log. */
  readonly expected: CreditTotals;
  /** Totals stored on the balance row. */
  readonly actual: CreditTotals;
  readonly consistent: boolean;
  /** Id of the reset or onboarding entry the replay started from, if any. */
  readonly baselineTransactionId: string | null;
  readonly transactionsReplayed: number;
}

/**
 * Replays a tenant's transaction log against its balance row.
 *
 * The replay starts at the latest monthly reset or onboarding entry, since
 * those overwrite the balance.  Grants count towards the total, spends
 * towards used, and zero-credit entries (tier changes) are ignored.
 *
 * `transactions` must be in append order and belong to the balance's tenant.
 */
export function reconcileBalance(
  balance: CreditBalance,
  transactions: readonly CreditTransaction[],
): ReconciliationReport {
  let start = 0;
  for (let i = transactions.length - 1; i >= 0; i--) {
    const tx = transactions[i];
    if (tx !== undefined && BASELINE_ACTIONS.has(tx.actionType)) {
      start = i;
      break;
    }
  }

  const window = transactions.slice(start);
  const baseline = window[0];
  let granted = 0;
  let spent = 0;
  for (const tx of window) {
    if (tx.creditsUsed < 0) granted += -tx.creditsUsed;
    else spent += tx.creditsUsed;
  }

  const expected: CreditTotals = {
    totalCredits: granted,
    usedCredits: spent,
    availableCredits: granted - spent,
  };
  const actual: CreditTotals = {
    totalCredits: balance.totalCredits,
    usedCredits: balance.usedCredits,
    availableCredits: balance.availableCredits,
  };

  return {
    userId: balance.userId,
    orgId: balance.orgId,
    expected,
    actual,
    consistent:
      expected.totalCredits === actual.totalCredits &&
      expected.usedCredits === actual.usedCredits &&
      expected.availableCredits === actual.availableCredits,
    baselineTransactionId:
      baseline !== undefined && BASELINE_ACTIONS.has(baseline.actionType) ? baseline.id : null,
    transactionsReplayed: window.length,
  };
}
