// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-ledger.ts
 *
 * The charge-before-execute loop on a SQLite ledger:
 *   1. Onboard a tenant on the free tier.
 *   2. Run gated actions until the credits run out.
 *   3. Reset the month and reconcile the log.
 *
 * Run with:  npx tsx packages/ledger/examples/basic-ledger.ts
 */

import Database from 'better-sqlite3';
import {
  ActionGate,
  CreditAuthority,
  EVENT_LOW_BALANCE,
  SQLiteLedgerStore,
  createLogger,
  selectDraftAction,
} from '../src/index.js';
import type { ActionKind } from '../src/index.js';

const logger = createLogger({ name: 'basic-ledger', level: 'warn' });

const store = new SQLiteLedgerStore({ database: new Database(':memory:') });
await store.connect();

const authority = new CreditAuthority({
  store,
  logger,
  config: { tiers: { free: { monthlyCredits: 20 } } },
});
const gate = new ActionGate({ authority, logger });
const tenant = { userId: 'user-1', orgId: 'org-1' };

authority.events.on(EVENT_LOW_BALANCE, (event) => {
  console.log(`low balance: ${event.availableCredits}/${event.totalCredits} credits left`);
});

await authority.onboard(tenant, 'free');

// ─── Spend until the gate refuses ─────────────────────────────────────────────

const plan: ActionKind[] = [
  'email_classification',
  selectDraftAction(120),
  'sender_research_deep',
  selectDraftAction(1_800),
  'workflow_execution',
];

for (const action of plan) {
  const outcome = await gate.execute({ tenant, action }, async () => `${action} done`);
  if (outcome.status === 'rejected') {
    console.log(`${action}: REJECTED  ${outcome.message}`);
    continue;
  }
  console.log(`${action}: charged ${outcome.creditsUsed}, ${outcome.availableCredits} left`);
}

// ─── Month end ────────────────────────────────────────────────────────────────

const reset = await authority.resetMonthly(tenant, 'free');
console.log(`after reset: ${reset.availableCredits} credits, next reset ${reset.creditsResetAt ?? 'never'}`);

const report = await authority.reconcile(tenant);
console.log(`log reconciles with balance: ${report.consistent}`);

await store.disconnect();
