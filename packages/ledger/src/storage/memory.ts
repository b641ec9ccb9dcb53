// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type {
  BalanceFilter,
  CreditBalance,
  CreditTransaction,
  LedgerDelta,
  LedgerMutation,
  TenantKey,
  TransactionFilter,
} from '../types.js';
import type { LedgerStore } from './adapter.js';

function tenantKey(tenant: TenantKey): string {
  return `${tenant.userId}\u0000${tenant.orgId}`;
}

/**
 * In-memory LedgerStore.
 *
 * `applyDelta` runs without an await between the check and the write, which
 * makes each call atomic on the single JavaScript thread.  All data is lost
 * when the process exits.
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly #balances = new Map<string, CreditBalance>();
  readonly #transactions: CreditTransaction[] = [];

  async getBalance(tenant: TenantKey): Promise<CreditBalance | undefined> {
    const balance = this.#balances.get(tenantKey(tenant));
    return balance === undefined ? undefined : { ...balance };
  }

  async applyDelta(delta: LedgerDelta): Promise<LedgerMutation> {
    const key = tenantKey(delta.tenant);
    const current = this.#balances.get(key);
    const next = this.#nextBalance(current, delta);
    if (next === undefined) {
      return { applied: false, balance: current === undefined ? undefined : { ...current } };
    }

    const transaction: CreditTransaction = {
      id: randomUUID(),
      userId: delta.tenant.userId,
      orgId: delta.tenant.orgId,
      actionType: delta.actionType,
      creditsUsed: next.creditsUsed,
      description: delta.description,
      metadata: next.metadata,
      createdAt: delta.timestamp,
    };

    this.#balances.set(key, next.balance);
    this.#transactions.push(transaction);
    return { applied: true, balance: { ...next.balance }, transaction: { ...transaction } };
  }

  async listBalances(filter: BalanceFilter = {}): Promise<readonly CreditBalance[]> {
    const dueBy = filter.resetDueBy === undefined ? undefined : Date.parse(filter.resetDueBy);
    return [...this.#balances.values()]
      .filter(
        (balance) =>
          dueBy === undefined ||
          (balance.creditsResetAt !== null && Date.parse(balance.creditsResetAt) <= dueBy),
      )
      .sort((a, b) => a.userId.localeCompare(b.userId) || a.orgId.localeCompare(b.orgId))
      .map((balance) => ({ ...balance }));
  }

  async listTransactions(filter: TransactionFilter = {}): Promise<readonly CreditTransaction[]> {
    const since = filter.since === undefined ? undefined : Date.parse(filter.since);
    const until = filter.until === undefined ? undefined : Date.parse(filter.until);

    const matching = this.#transactions.filter((tx) => {
      if (filter.userId !== undefined && tx.userId !== filter.userId) return false;
      if (filter.orgId !== undefined && tx.orgId !== filter.orgId) return false;
      if (filter.actionType !== undefined && tx.actionType !== filter.actionType) return false;
      const createdAt = Date.parse(tx.createdAt);
      if (since !== undefined && createdAt < since) return false;
      if (until !== undefined && createdAt > until) return false;
      return true;
    });

    const limited =
      filter.limit !== undefined ? matching.slice(Math.max(0, matching.length - filter.limit)) : matching;
    return limited.map((tx) => ({ ...tx }));
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /** Removes every balance and transaction. */
  clear(): void {
    this.#balances.clear();
    this.#transactions.length = 0;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  #nextBalance(
    current: CreditBalance | undefined,
    delta: LedgerDelta,
  ):
    | { balance: CreditBalance; creditsUsed: number; metadata: Record<string, unknown> | null }
    | undefined {
    const ts = delta.timestamp;

    switch (delta.kind) {
      case 'debit': {
        if (current === undefined || current.availableCredits < delta.amount) return undefined;
        return {
          balance: {
            ...current,
            usedCredits: current.usedCredits + delta.amount,
            availableCredits: current.availableCredits - delta.amount,
            updatedAt: ts,
          },
          creditsUsed: delta.amount,
          metadata: delta.metadata,
        };
      }

      case 'credit': {
        const balance: CreditBalance =
          current === undefined
            ? {
                id: randomUUID(),
                userId: delta.tenant.userId,
                orgId: delta.tenant.orgId,
                totalCredits: delta.amount,
                usedCredits: 0,
                availableCredits: delta.amount,
                subscriptionTier: delta.defaultTier,
                creditsResetAt: delta.defaultResetAt,
                createdAt: ts,
                updatedAt: ts,
              }
            : {
                ...current,
                totalCredits: current.totalCredits + delta.amount,
                availableCredits: current.availableCredits + delta.amount,
                updatedAt: ts,
              };
        return { balance, creditsUsed: -delta.amount, metadata: delta.metadata };
      }

      case 'reset': {
        if (delta.mode === 'onboard') {
          if (current !== undefined) return undefined;
          return {
            balance: {
              id: randomUUID(),
              userId: delta.tenant.userId,
              orgId: delta.tenant.orgId,
              totalCredits: delta.allotment,
              usedCredits: 0,
              availableCredits: delta.allotment,
              subscriptionTier: delta.tier,
              creditsResetAt: delta.nextResetAt,
              createdAt: ts,
              updatedAt: ts,
            },
            creditsUsed: -delta.allotment,
            metadata: delta.metadata,
          };
        }

        if (current === undefined) return undefined;
        if (delta.expectedResetAt !== undefined && current.creditsResetAt !== delta.expectedResetAt) {
          return undefined;
        }
        return {
          balance: {
            ...current,
            totalCredits: delta.allotment,
            usedCredits: 0,
            availableCredits: delta.allotment,
            subscriptionTier: delta.tier,
            creditsResetAt: delta.nextResetAt,
            updatedAt: ts,
          },
          creditsUsed: -delta.allotment,
          metadata: {
            ...delta.metadata,
            previousTotal: current.totalCredits,
            previousUsed: current.usedCredits,
            forfeited: current.availableCredits,
          },
        };
      }

      case 'tier': {
        if (current === undefined) return undefined;
        return {
          balance: { ...current, subscriptionTier: delta.tier, updatedAt: ts },
          creditsUsed: 0,
          metadata: delta.metadata,
        };
      }
    }
  }
}
