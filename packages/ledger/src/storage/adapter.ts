// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  BalanceFilter,
  CreditBalance,
  CreditTransaction,
  LedgerDelta,
  LedgerMutation,
  TenantKey,
  TransactionFilter,
} from '../types.js';

/**
 * LedgerStore is the persistence contract for balances and their audit log.
 *
 * Rules every adapter follows:
 *   1. `applyDelta` is the only write path.  Each call is one atomic step:
 *      the balance row changes and exactly one CreditTransaction is appended,
 *      or nothing is written at all.
 *   2. Debits are conditional on `availableCredits >= amount`, evaluated in
 *      the same step as the write.  A refused debit writes nothing.
 *   3. A write lost to a concurrent writer at the storage layer surfaces as
 *      LedgerWriteConflictError so callers can retry it.
 *   4. Reads return copies.
 */
export interface LedgerStore {
  getBalance(tenant: TenantKey): Promise<CreditBalance | undefined>;

  applyDelta(delta: LedgerDelta): Promise<LedgerMutation>;

  /** Balances ordered by (userId, orgId). */
  listBalances(filter?: BalanceFilter): Promise<readonly CreditBalance[]>;

  /** Transactions in append order. `limit` keeps the most recent entries. */
  listTransactions(filter?: TransactionFilter): Promise<readonly CreditTransaction[]>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Creates tables when missing.  Called once before first use. */
  connect?(): Promise<void>;

  disconnect?(): Promise<void>;

  isHealthy?(): Promise<boolean>;
}
