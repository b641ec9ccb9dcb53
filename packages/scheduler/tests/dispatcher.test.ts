// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ActionGate, CreditAuthority, MemoryLedgerStore } from '@creditcore/ledger';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ScheduleDispatcher } from '../src/dispatcher.js';
import { ScheduleDispatchError } from '../src/errors.js';
import { EVENT_CANCELLED, EVENT_DEFERRED, EVENT_DISPATCHED, EVENT_FAILED } from '../src/events.js';
import { DigestTaskHandler } from '../src/handlers/digest.js';
import { FollowUpTaskHandler } from '../src/handlers/follow-up.js';
import type { TaskHandler } from '../src/handlers/handler.js';
import { MemoryScheduleStore } from '../src/storage/memory.js';
import {
  ALICE,
  BOB,
  FakeAccountDirectory,
  FakeComposer,
  FakeEmailFetcher,
  RecordingSender,
  account,
  digestEntry,
  followUpEntry,
  message,
  silentLogger,
} from './helpers.js';

const AT_0802 = new Date('2026-03-10T08:02:00Z');
const AT_0901 = new Date('2026-03-10T09:01:00Z');

describe('ScheduleDispatcher', () => {
  let authority: CreditAuthority;
  let store: MemoryScheduleStore;
  let fetcher: FakeEmailFetcher;
  let sender: RecordingSender;
  let digestHandler: TaskHandler<'digest'>;
  let followUpHandler: TaskHandler<'follow_up'>;

  function dispatcher(config: Record<string, unknown> = {}): ScheduleDispatcher {
    return new ScheduleDispatcher({
      store,
      gate: new ActionGate({ authority, logger: silentLogger }),
      handlers: { digest: digestHandler, follow_up: followUpHandler },
      config,
      logger: silentLogger,
    });
  }

  beforeEach(async () => {
    authority = new CreditAuthority({
      store: new MemoryLedgerStore(),
      logger: silentLogger,
      now: () => new Date('2026-03-01T00:00:00Z'),
    });
    await authority.onboard(ALICE, 'free');

    store = new MemoryScheduleStore();
    fetcher = new FakeEmailFetcher();
    sender = new RecordingSender();
    const composer = new FakeComposer();
    digestHandler = new DigestTaskHandler({
      accounts: new FakeAccountDirectory([account('acct-alice', ALICE)]),
      fetcher,
      composer,
      sender,
      messageLimit: 50,
      lookbackMs: 24 * 60 * 60 * 1000,
    });
    followUpHandler = new FollowUpTaskHandler({ composer, sender });
  });

  describe('follow-ups', () => {
    it('charges follow_up_send, sends and completes the entry', async () => {
      const entry = await store.save(followUpEntry({ id: 'follow-1' }));
      const d = dispatcher();
      const dispatched = vi.fn();
      d.events.on(EVENT_DISPATCHED, dispatched);

      const outcome = await d.dispatch(entry, AT_0901);

      expect(outcome.status).toBe('succeeded');
      if (outcome.status !== 'succeeded') return;
      expect(outcome.creditsUsed).toBe(1);
      expect(outcome.entry).toMatchObject({
        status: 'completed',
        lastRunAt: '2026-03-10T09:01:00.000Z',
        completedAt: '2026-03-10T09:01:00.000Z',
        nextRunAt: null,
      });
      expect(sender.sent).toEqual([
        { to: 'bob@example.com', subject: 'Following up (reminder)', body: 'Re: email-1' },
      ]);
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(399);
      const [charge] = await authority.listTransactions(ALICE, { actionType: 'follow_up_send' });
      expect(charge?.createdAt).toBe('2026-03-10T09:01:00.000Z');
      expect(dispatched).toHaveBeenCalledWith({
        entryId: 'follow-1',
        kind: 'follow_up',
        userId: 'user-alice',
        orgId: 'org-acme',
        creditsUsed: 1,
        nextRunAt: null,
        timestamp: '2026-03-10T09:01:00.000Z',
      });
    });

    it('defers without spending a retry when the tenant has no credits', async () => {
      const entry = await store.save(followUpEntry({ id: 'follow-bob', ...BOB }));
      const d = dispatcher();
      const deferred = vi.fn();
      d.events.on(EVENT_DEFERRED, deferred);

      const outcome = await d.dispatch(entry, AT_0901);

      expect(outcome).toMatchObject({ status: 'deferred', creditsRequired: 1, availableCredits: 0 });
      expect(await store.get('follow-bob')).toMatchObject({ status: 'pending', retryCount: 0, lastRunAt: null });
      expect(sender.sent).toEqual([]);
      expect(deferred).toHaveBeenCalledTimes(1);
    });

    it('keeps the charge when sending fails', async () => {
      const entry = await store.save(followUpEntry({ id: 'follow-1' }));
      sender.failure = new Error('smtp 554');

      const outcome = await dispatcher().dispatch(entry, AT_0901);

      expect(outcome.status).toBe('failed');
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(399);
      expect(await store.get('follow-1')).toMatchObject({ status: 'pending', retryCount: 1, lastError: 'smtp 554' });
    });
  });

  describe('digests', () => {
    it('sends the digest without charging and schedules tomorrow', async () => {
      fetcher.inbox.set('acct-alice', [message('m1'), message('m2')]);
      const entry = await store.save(digestEntry({ id: 'digest-1' }));

      const outcome = await dispatcher().dispatch(entry, AT_0802);

      expect(outcome.status).toBe('succeeded');
      if (outcome.status !== 'succeeded') return;
      expect(outcome.creditsUsed).toBe(0);
      expect(outcome.report).toEqual({ delivered: true, messages: 2 });
      expect(outcome.entry).toMatchObject({
        status: 'pending',
        lastRunAt: '2026-03-10T08:02:00.000Z',
        nextRunAt: '2026-03-11T08:00:00.000Z',
      });
      expect(sender.sent).toEqual([
        { to: 'alice@example.com', subject: 'Your important digest', body: 'Subject m1\nSubject m2' },
      ]);
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(400);
    });

    it('treats an empty inbox as a run that sends nothing', async () => {
      const entry = await store.save(digestEntry({ id: 'digest-1' }));

      const outcome = await dispatcher().dispatch(entry, AT_0802);

      expect(outcome.status).toBe('succeeded');
      if (outcome.status !== 'succeeded') return;
      expect(outcome.report).toEqual({ delivered: false, messages: 0 });
      expect(outcome.entry.lastRunAt).toBe('2026-03-10T08:02:00.000Z');
      expect(sender.sent).toEqual([]);
    });
  });

  describe('retry bound', () => {
    it('cancels after maxRetries + 1 failures and never dispatches again', async () => {
      await store.save(followUpEntry({ id: 'follow-1', maxRetries: 2 }));
      sender.failure = new Error('token revoked');
      const d = dispatcher();
      const failed = vi.fn();
      const cancelled = vi.fn();
      d.events.on(EVENT_FAILED, failed);
      d.events.on(EVENT_CANCELLED, cancelled);

      const statuses: string[] = [];
      for (let i = 0; i < 4; i++) {
        const current = await store.get('follow-1');
        if (current === undefined) throw new Error('entry vanished');
        statuses.push((await d.dispatch(current, AT_0901)).status);
      }

      expect(statuses).toEqual(['failed', 'failed', 'cancelled', 'skipped']);
      expect(failed).toHaveBeenCalledTimes(2);
      expect(cancelled).toHaveBeenCalledWith({
        entryId: 'follow-1',
        kind: 'follow_up',
        userId: 'user-alice',
        orgId: 'org-acme',
        reason: 'retries_exhausted',
        retryCount: 3,
        timestamp: '2026-03-10T09:01:00.000Z',
      });
      expect(await store.get('follow-1')).toMatchObject({ status: 'cancelled', retryCount: 3 });

      const summary = await d.dispatchDue('follow_up', new Date('2026-03-10T10:00:00Z'));
      expect(summary.considered).toBe(0);
    });

    it('wraps the cause in ScheduleDispatchError', async () => {
      const entry = await store.save(followUpEntry({ id: 'follow-1' }));
      const cause = new Error('smtp 421');
      sender.failure = cause;

      const outcome = await dispatcher().dispatch(entry, AT_0901);

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error).toBeInstanceOf(ScheduleDispatchError);
      expect(outcome.error.code).toBe('SCHEDULE_DISPATCH_FAILED');
      expect(outcome.error.retryCount).toBe(1);
    });
  });

  describe('timeout', () => {
    it('fails a handler that runs past the dispatch timeout and aborts its signal', async () => {
      let signal: AbortSignal | undefined;
      followUpHandler = {
        kind: 'follow_up',
        action: 'follow_up_send',
        run: (_task, _entry, context) => {
          signal = context.signal;
          return new Promise(() => undefined);
        },
      };
      const entry = await store.save(followUpEntry({ id: 'follow-1' }));

      const outcome = await dispatcher({ dispatchTimeoutMs: 20 }).dispatch(entry, AT_0901);

      expect(outcome.status).toBe('failed');
      expect(signal?.aborted).toBe(true);
      expect((await store.get('follow-1'))?.lastError).toBe('Dispatch of schedule "follow-1" exceeded 20 ms.');
      expect((await authority.getBalance(ALICE))?.availableCredits).toBe(399);
    });
  });

  describe('claims', () => {
    it('skips an entry another worker already claimed', async () => {
      const entry = await store.save(followUpEntry({ id: 'follow-1' }));
      await store.claim('follow-1', '2026-03-10T09:00:30.000Z');

      const outcome = await dispatcher().dispatch(entry, AT_0901);

      expect(outcome).toEqual({ status: 'skipped', entryId: 'follow-1' });
      expect(sender.sent).toEqual([]);
    });

    it('does not rerun a daily entry from a snapshot taken before another worker ran it', async () => {
      fetcher.inbox.set('acct-alice', [message('m1')]);
      await store.save(digestEntry({ id: 'digest-1' }));
      const workerA = dispatcher();
      const workerB = dispatcher();

      const [snapshot] = await store.listSelectable('digest');
      if (snapshot === undefined) throw new Error('entry not selectable');
      const first = await workerA.dispatch(snapshot, AT_0802);
      const second = await workerB.dispatch(snapshot, new Date('2026-03-10T08:03:00Z'));

      expect(first.status).toBe('succeeded');
      expect(second).toEqual({ status: 'skipped', entryId: 'digest-1' });
      expect(sender.sent).toHaveLength(1);
      expect(await store.get('digest-1')).toMatchObject({
        status: 'pending',
        claimedAt: null,
        lastRunAt: '2026-03-10T08:02:00.000Z',
        nextRunAt: '2026-03-11T08:00:00.000Z',
      });
    });

    it('lets an in-flight dispatch finish after deactivation but never selects the entry again', async () => {
      fetcher.inbox.set('acct-alice', [message('m1')]);
      const entry = await store.save(digestEntry({ id: 'digest-1' }));
      const inner = digestHandler;
      digestHandler = {
        kind: 'digest',
        run: async (task, current, context) => {
          await store.deactivate('digest-1', context.now.toISOString());
          return inner.run(task, current, context);
        },
      };
      const d = dispatcher();

      const outcome = await d.dispatch(entry, AT_0802);

      expect(outcome.status).toBe('succeeded');
      expect(sender.sent).toHaveLength(1);
      expect(await store.get('digest-1')).toMatchObject({ isActive: false, status: 'pending' });
      const next = await d.dispatchDue('digest', new Date('2026-03-11T08:01:00Z'));
      expect(next.considered).toBe(0);
    });
  });

  describe('dispatchDue', () => {
    it('dispatches only entries inside their window and honours the cooldown', async () => {
      fetcher.inbox.set('acct-alice', [message('m1')]);
      await store.save(digestEntry({ id: 'digest-8' }));
      await store.save(
        digestEntry({ id: 'digest-12', trigger: { kind: 'daily', timeOfDay: '12:00', timezone: 'UTC' } }),
      );
      const d = dispatcher();

      const first = await d.dispatchDue('digest', AT_0802);
      expect(first).toEqual({
        considered: 1,
        released: 0,
        succeeded: 1,
        deferred: 0,
        failed: 0,
        cancelled: 0,
        skipped: 0,
      });

      const again = await d.dispatchDue('digest', new Date('2026-03-10T08:04:00Z'));
      expect(again.considered).toBe(0);
      expect(sender.sent).toHaveLength(1);

      const tomorrow = await d.dispatchDue('digest', new Date('2026-03-11T08:03:00Z'));
      expect(tomorrow.succeeded).toBe(1);
    });

    it('releases claims older than staleClaimMs before selecting', async () => {
      await store.save(digestEntry({ id: 'digest-8' }));
      await store.claim('digest-8', '2026-03-10T07:00:00.000Z');

      const summary = await dispatcher().dispatchDue('digest', AT_0802);

      expect(summary.released).toBe(1);
      expect(summary.succeeded).toBe(1);
    });
  });
});
