// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import Database from 'better-sqlite3';
import { describe, expect, it, vi } from 'vitest';
import { LedgerWriteConflictError } from '../src/errors.js';
import { SQLiteLedgerStore } from '../src/storage/sqlite.js';
import { ALICE, debit, onboardDelta } from './helpers.js';
import { describeLedgerStoreContract } from './store-contract.js';

async function openStore(tablePrefix?: string): Promise<{ db: Database.Database; store: SQLiteLedgerStore }> {
  const db = new Database(':memory:');
  const store = new SQLiteLedgerStore({ database: db, ...(tablePrefix !== undefined && { tablePrefix }) });
  await store.connect();
  return { db, store };
}

describeLedgerStoreContract('SQLiteLedgerStore', async () => (await openStore()).store);

describe('SQLiteLedgerStore', () => {
  it('creates prefixed tables', async () => {
    const { db } = await openStore('cc_');
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => (typeof row === 'object' && row !== null && 'name' in row ? row.name : undefined));
    expect(tables).toEqual(['cc_credit_balances', 'cc_credit_transactions']);
  });

  it('connect() is idempotent', async () => {
    const { store } = await openStore();
    await expect(store.connect()).resolves.toBeUndefined();
  });

  it('stores metadata as JSON and reads it back', async () => {
    const { store } = await openStore();
    await store.applyDelta(onboardDelta(ALICE, 400));
    await store.applyDelta({ ...debit(ALICE, 3), metadata: { emailId: 'msg-1', attempt: 2 } });

    const [, tx] = await store.listTransactions({ userId: 'user-alice' });
    expect(tx?.metadata).toEqual({ emailId: 'msg-1', attempt: 2 });
  });

  it('rejects a negative balance at the schema level', async () => {
    const { db, store } = await openStore();
    await store.applyDelta(onboardDelta(ALICE, 400));
    expect(() =>
      db.prepare('UPDATE credit_balances SET available_credits = -1 WHERE user_id = ?').run('user-alice'),
    ).toThrow(/CHECK constraint failed/);
  });

  it('maps a locked database to LedgerWriteConflictError', async () => {
    const { db, store } = await openStore();
    await store.applyDelta(onboardDelta(ALICE, 400));

    const busy = Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
    vi.spyOn(db, 'prepare').mockImplementation(() => {
      throw busy;
    });

    await expect(store.applyDelta(debit(ALICE, 1))).rejects.toBeInstanceOf(LedgerWriteConflictError);
  });

  it('reports health and closes the database on disconnect', async () => {
    const { db, store } = await openStore();
    expect(await store.isHealthy()).toBe(true);
    await store.disconnect();
    expect(db.open).toBe(false);
    expect(await store.isHealthy()).toBe(false);
  });
});
