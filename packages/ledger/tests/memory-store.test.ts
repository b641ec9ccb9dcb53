// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, expect, it } from 'vitest';
import { MemoryLedgerStore } from '../src/storage/memory.js';
import { ALICE, debit, onboardDelta } from './helpers.js';
import { describeLedgerStoreContract } from './store-contract.js';

describeLedgerStoreContract('MemoryLedgerStore', async () => new MemoryLedgerStore());

describe('MemoryLedgerStore', () => {
  it('hands out copies that do not track later writes', async () => {
    const store = new MemoryLedgerStore();
    await store.applyDelta(onboardDelta(ALICE, 400));
    const snapshot = await store.getBalance(ALICE);

    await store.applyDelta(debit(ALICE, 5));

    expect(snapshot?.availableCredits).toBe(400);
    expect((await store.getBalance(ALICE))?.availableCredits).toBe(395);
  });

  it('clear() drops balances and transactions', async () => {
    const store = new MemoryLedgerStore();
    await store.applyDelta(onboardDelta(ALICE, 400));
    store.clear();
    expect(await store.getBalance(ALICE)).toBeUndefined();
    expect(await store.listTransactions()).toHaveLength(0);
  });

  it('reports healthy', async () => {
    expect(await new MemoryLedgerStore().isHealthy()).toBe(true);
  });
});
