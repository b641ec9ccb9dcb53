// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ActionGate, CreditAuthority, MemoryLedgerStore } from '@creditcore/ledger';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ScheduleDispatcher } from '../src/dispatcher.js';
import { DigestTaskHandler } from '../src/handlers/digest.js';
import { FollowUpTaskHandler } from '../src/handlers/follow-up.js';
import { DISPATCH_DIGESTS, DispatchSchedulesJob } from '../src/jobs/dispatch-schedules.js';
import { FetchAllAccountsJob } from '../src/jobs/fetch-all-accounts.js';
import type { FetchAllAccountsJobOptions } from '../src/jobs/fetch-all-accounts.js';
import { createStandardJobs } from '../src/jobs/index.js';
import { ResetMonthlyCreditsJob } from '../src/jobs/reset-monthly-credits.js';
import { parseSchedulerConfig } from '../src/config.js';
import { MemoryScheduleStore } from '../src/storage/memory.js';
import {
  ALICE,
  BOB,
  FakeAccountDirectory,
  FakeClassifier,
  FakeComposer,
  FakeDrafter,
  FakeEmailFetcher,
  RecordingSender,
  account,
  message,
  silentLogger,
} from './helpers.js';

const DAY = 24 * 60 * 60 * 1000;

describe('FetchAllAccountsJob', () => {
  let ledger: MemoryLedgerStore;
  let authority: CreditAuthority;
  let accounts: FakeAccountDirectory;
  let fetcher: FakeEmailFetcher;
  let classifier: FakeClassifier;

  function job(overrides: Partial<FetchAllAccountsJobOptions> = {}): FetchAllAccountsJob {
    return new FetchAllAccountsJob({
      accounts,
      fetcher,
      classifier,
      gate: new ActionGate({ authority, logger: silentLogger }),
      cronExpression: '*/5 * * * *',
      lookbackMs: DAY,
      limit: 100,
      logger: silentLogger,
      ...overrides,
    });
  }

  beforeEach(async () => {
    ledger = new MemoryLedgerStore();
    authority = new CreditAuthority({ store: ledger, logger: silentLogger });
    accounts = new FakeAccountDirectory([
      account('acct-alice-1', ALICE),
      account('acct-alice-2', ALICE, '2026-03-10T06:00:00.000Z'),
      account('acct-bob', BOB),
    ]);
    fetcher = new FakeEmailFetcher();
    classifier = new FakeClassifier();
  });

  it('classifies through the gate and stops for a tenant that runs dry', async () => {
    await authority.onboard(ALICE, 'free');
    await authority.tryDeduct(ALICE, 398, 'workflow_execution');
    fetcher.inbox.set('acct-alice-1', [
      message('a1', '2026-03-10T07:31:00.000Z'),
      message('a2', '2026-03-10T07:32:00.000Z'),
      message('a3', '2026-03-10T07:33:00.000Z'),
    ]);
    fetcher.inbox.set('acct-alice-2', [message('a4'), message('a5')]);
    fetcher.failing.add('acct-bob');

    const summary = await job().run(new Date('2026-03-10T08:05:00Z'));

    expect(summary).toEqual({
      accounts: 3,
      messages: 5,
      classified: 2,
      rejected: 3,
      failed: 0,
      fetchFailed: 1,
      drafted: 0,
      draftsRejected: 0,
      draftsFailed: 0,
    });
    expect(classifier.classified).toEqual(['a1', 'a2']);
    expect((await authority.getBalance(ALICE))?.availableCredits).toBe(0);
    // Only the handled mail is marked; a3, a4 and a5 come back on the next run.
    expect(accounts.fetched).toEqual([{ accountId: 'acct-alice-1', at: '2026-03-10T07:32:00.000Z' }]);
  });

  it('handles messages in the order they arrived', async () => {
    await authority.onboard(ALICE, 'free');
    await authority.tryDeduct(ALICE, 399, 'workflow_execution');
    fetcher.inbox.set('acct-alice-1', [
      message('late', '2026-03-10T07:45:00.000Z'),
      message('early', '2026-03-10T07:15:00.000Z'),
    ]);

    await job().run(new Date('2026-03-10T08:05:00Z'));

    expect(classifier.classified).toEqual(['early']);
    expect(accounts.fetched[0]).toEqual({ accountId: 'acct-alice-1', at: '2026-03-10T07:15:00.000Z' });
  });

  it('marks every account fetched at the tick when all its mail was handled', async () => {
    await authority.onboard(ALICE, 'free');
    fetcher.inbox.set('acct-alice-1', [message('a1'), message('a2')]);

    await job().run(new Date('2026-03-10T08:05:00Z'));

    expect(accounts.fetched).toEqual([
      { accountId: 'acct-alice-1', at: '2026-03-10T08:05:00.000Z' },
      { accountId: 'acct-alice-2', at: '2026-03-10T08:05:00.000Z' },
      { accountId: 'acct-bob', at: '2026-03-10T08:05:00.000Z' },
    ]);
  });

  it('holds the mark at the last message of a full page', async () => {
    await authority.onboard(ALICE, 'free');
    fetcher.inbox.set('acct-alice-1', [
      message('a1', '2026-03-10T07:31:00.000Z'),
      message('a2', '2026-03-10T07:32:00.000Z'),
      message('a3', '2026-03-10T07:33:00.000Z'),
    ]);

    await job({ limit: 2 }).run(new Date('2026-03-10T08:05:00Z'));

    expect(classifier.classified).toEqual(['a1', 'a2']);
    expect(accounts.fetched[0]).toEqual({ accountId: 'acct-alice-1', at: '2026-03-10T07:32:00.000Z' });
  });

  describe('urgent replies', () => {
    let drafter: FakeDrafter;

    beforeEach(async () => {
      drafter = new FakeDrafter();
      await authority.onboard(ALICE, 'free');
      classifier.labels.set('a1', 'urgent');
      fetcher.inbox.set('acct-alice-1', [
        message('a1', '2026-03-10T07:31:00.000Z'),
        message('a2', '2026-03-10T07:32:00.000Z'),
      ]);
    });

    it('drafts a short reply to urgent mail only', async () => {
      const summary = await job({ drafter }).run(new Date('2026-03-10T08:05:00Z'));

      expect(summary).toMatchObject({ classified: 2, drafted: 1, draftsRejected: 0, draftsFailed: 0 });
      expect(drafter.drafted).toEqual(['a1']);
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(395);
      const [draft] = await authority.listTransactions(ALICE, { actionType: 'email_draft_short' });
      expect(draft?.creditsUsed).toBe(3);
      expect(draft?.description).toBe('Draft reply to a1');
      expect(draft?.createdAt).toBe('2026-03-10T08:05:00.000Z');
    });

    it('charges the long draft rate for a long expected reply', async () => {
      drafter.lengths.set('a1', 1_800);

      await job({ drafter }).run(new Date('2026-03-10T08:05:00Z'));

      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(391);
      expect(await authority.listTransactions(ALICE, { actionType: 'email_draft_long' })).toHaveLength(1);
    });

    it('skips a draft the tenant cannot afford and keeps classifying', async () => {
      await authority.tryDeduct(ALICE, 397, 'workflow_execution');
      drafter.lengths.set('a1', 1_800);

      const summary = await job({ drafter }).run(new Date('2026-03-10T08:05:00Z'));

      expect(summary).toMatchObject({ classified: 2, rejected: 0, drafted: 0, draftsRejected: 1 });
      expect(drafter.drafted).toEqual([]);
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(1);
      expect(accounts.fetched[0]).toEqual({ accountId: 'acct-alice-1', at: '2026-03-10T08:05:00.000Z' });
    });

    it('keeps the draft charge when drafting fails', async () => {
      drafter.failure = new Error('model overloaded');

      const summary = await job({ drafter }).run(new Date('2026-03-10T08:05:00Z'));

      expect(summary).toMatchObject({ classified: 2, drafted: 0, draftsFailed: 1 });
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(395);
    });

    it('leaves urgent mail alone without a drafter', async () => {
      const summary = await job().run(new Date('2026-03-10T08:05:00Z'));

      expect(summary).toMatchObject({ classified: 2, drafted: 0 });
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(398);
    });
  });

  it('fetches since the last fetch, or one look-back period for a new account', async () => {
    await job().run(new Date('2026-03-10T08:05:00Z'));

    expect(fetcher.requests.map((r) => [r.accountId, r.request.since])).toEqual([
      ['acct-alice-1', '2026-03-09T08:05:00.000Z'],
      ['acct-alice-2', '2026-03-10T06:00:00.000Z'],
      ['acct-bob', '2026-03-09T08:05:00.000Z'],
    ]);
  });

  it('counts a failed classification and keeps its charge', async () => {
    await authority.onboard(ALICE, 'free');
    fetcher.inbox.set('acct-alice-1', [message('a1'), message('a2')]);
    vi.spyOn(classifier, 'classify').mockRejectedValueOnce(new Error('model overloaded'));

    const summary = await job().run(new Date('2026-03-10T08:05:00Z'));

    expect(summary).toMatchObject({ classified: 1, failed: 1 });
    expect((await authority.getBalance(ALICE))?.availableCredits).toBe(398);
  });
});

describe('ResetMonthlyCreditsJob', () => {
  let ledger: MemoryLedgerStore;
  let authority: CreditAuthority;
  let now: Date;

  beforeEach(async () => {
    now = new Date('2026-03-01T00:00:00Z');
    ledger = new MemoryLedgerStore();
    authority = new CreditAuthority({ store: ledger, logger: silentLogger, now: () => now });
    await authority.onboard(ALICE, 'free');
    now = new Date('2026-03-20T00:00:00Z');
    await authority.onboard(BOB, 'pro');
    await authority.tryDeduct(ALICE, 150, 'workflow_execution');
  });

  function job(): ResetMonthlyCreditsJob {
    return new ResetMonthlyCreditsJob({ authority, cronExpression: '0 * * * *', logger: silentLogger });
  }

  it('resets only balances whose reset time has passed', async () => {
    now = new Date('2026-04-01T00:00:00Z');

    const summary = await job().run(now);

    expect(summary).toEqual({ due: 1, reset: 1, failed: 0 });
    expect(await authority.getBalance(ALICE)).toMatchObject({
      totalCredits: 400,
      usedCredits: 0,
      availableCredits: 400,
      creditsResetAt: '2026-05-01T00:00:00.000Z',
    });
    expect((await authority.getBalance(BOB))?.creditsResetAt).toBe('2026-04-20T00:00:00.000Z');
  });

  it('resets as of the tick even when the authority clock lags', async () => {
    const tick = new Date('2026-06-15T09:00:00Z');

    expect(await job().run(tick)).toEqual({ due: 2, reset: 2, failed: 0 });

    expect((await authority.getBalance(ALICE))?.creditsResetAt).toBe('2026-07-01T00:00:00.000Z');
    expect((await authority.getBalance(BOB))?.creditsResetAt).toBe('2026-06-20T00:00:00.000Z');
    const [reset] = await authority.listTransactions(ALICE, { actionType: 'monthly_reset' });
    expect(reset?.createdAt).toBe('2026-06-15T09:00:00.000Z');
  });

  it('leaves a failed reset for the next run', async () => {
    now = new Date('2026-04-01T00:00:00Z');
    vi.spyOn(ledger, 'applyDelta').mockRejectedValueOnce(new Error('disk full'));

    expect(await job().run(now)).toEqual({ due: 1, reset: 0, failed: 1 });
    expect((await authority.getBalance(ALICE))?.availableCredits).toBe(250);

    now = new Date('2026-04-01T01:00:00Z');
    expect(await job().run(now)).toEqual({ due: 1, reset: 1, failed: 0 });
    expect((await authority.getBalance(ALICE))?.availableCredits).toBe(400);
  });
});

describe('createStandardJobs', () => {
  it('builds the four jobs on the configured cadences', () => {
    const authority = new CreditAuthority({ store: new MemoryLedgerStore(), logger: silentLogger });
    const gate = new ActionGate({ authority, logger: silentLogger });
    const accounts = new FakeAccountDirectory();
    const fetcher = new FakeEmailFetcher();
    const composer = new FakeComposer();
    const sender = new RecordingSender();
    const config = parseSchedulerConfig({ resetCron: '0 0 1 * *' });
    const dispatcher = new ScheduleDispatcher({
      store: new MemoryScheduleStore(),
      gate,
      handlers: {
        digest: new DigestTaskHandler({ accounts, fetcher, composer, sender, messageLimit: 50, lookbackMs: DAY }),
        follow_up: new FollowUpTaskHandler({ composer, sender }),
      },
      logger: silentLogger,
    });

    const jobs = createStandardJobs({
      config,
      authority,
      gate,
      dispatcher,
      accounts,
      fetcher,
      classifier: new FakeClassifier(),
      logger: silentLogger,
    });

    expect(jobs.map((j) => [j.name, j.cronExpression])).toEqual([
      ['fetch-all-accounts', '*/5 * * * *'],
      ['dispatch-digests', '*/5 * * * *'],
      ['process-follow-ups', '0 * * * *'],
      ['reset-monthly-credits', '0 0 1 * *'],
    ]);
  });
});

describe('DispatchSchedulesJob', () => {
  it('dispatches the configured task kind at the tick time', async () => {
    const authority = new CreditAuthority({ store: new MemoryLedgerStore(), logger: silentLogger });
    const composer = new FakeComposer();
    const sender = new RecordingSender();
    const dispatcher = new ScheduleDispatcher({
      store: new MemoryScheduleStore(),
      gate: new ActionGate({ authority, logger: silentLogger }),
      handlers: {
        digest: new DigestTaskHandler({
          accounts: new FakeAccountDirectory(),
          fetcher: new FakeEmailFetcher(),
          composer,
          sender,
          messageLimit: 50,
          lookbackMs: DAY,
        }),
        follow_up: new FollowUpTaskHandler({ composer, sender }),
      },
      logger: silentLogger,
    });
    const dispatchDue = vi.spyOn(dispatcher, 'dispatchDue');
    const job = new DispatchSchedulesJob({
      name: DISPATCH_DIGESTS,
      kind: 'digest',
      cronExpression: '*/5 * * * *',
      dispatcher,
    });
    const tick = new Date('2026-03-10T08:05:00Z');

    const summary = await job.run(tick);

    expect(dispatchDue).toHaveBeenCalledWith('digest', tick);
    expect(summary).toEqual({
      considered: 0,
      released: 0,
      succeeded: 0,
      deferred: 0,
      failed: 0,
      cancelled: 0,
      skipped: 0,
    });
  });
});
