// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * daily-digest.ts
 *
 * Drives the scheduler by hand through one simulated day:
 *   1. A daily digest at 08:00 Berlin time and a follow-up at 10:00 UTC.
 *   2. Tick the jobs every five minutes from 06:55 to 10:05 UTC.  The first
 *      tick classifies the morning's mail and drafts a reply to the urgent one.
 *   3. Print what each tick dispatched.
 *
 * Run with:  npx tsx packages/scheduler/examples/daily-digest.ts
 */

import Database from 'better-sqlite3';
import { ActionGate, CreditAuthority, SQLiteLedgerStore, createLogger } from '@creditcore/ledger';
import type { ConnectedAccount, FetchRequest, FetchedMessage, OutgoingMessage } from '../src/index.js';
import {
  DigestTaskHandler,
  EVENT_DISPATCHED,
  FollowUpTaskHandler,
  SQLiteScheduleStore,
  ScheduleDispatcher,
  TaskScheduler,
  computeNextRunAt,
  createScheduleEntry,
  createStandardJobs,
  parseSchedulerConfig,
} from '../src/index.js';

const logger = createLogger({ name: 'daily-digest', level: 'warn' });
const db = new Database(':memory:');

const ledger = new SQLiteLedgerStore({ database: db });
await ledger.connect();
const schedules = new SQLiteScheduleStore({ database: db });
await schedules.connect();

const start = new Date('2026-03-10T06:55:00Z');
const tenant = { userId: 'user-1', orgId: 'org-1' };
let mailbox: ConnectedAccount = {
  accountId: 'acct-1',
  ...tenant,
  emailAddress: 'user-1@example.com',
  credentials: { refreshToken: 'placeholder' },
  lastFetchedAt: null,
};

const authority = new CreditAuthority({ store: ledger, logger, now: () => start });
const gate = new ActionGate({ authority, logger });
await authority.onboard(tenant, 'free');

// ─── Collaborators stand-ins ──────────────────────────────────────────────────

const accounts = {
  listConnectedAccounts: async () => [mailbox],
  getAccount: async (id: string) => (id === mailbox.accountId ? mailbox : undefined),
  markFetched: async (_accountId: string, at: string) => {
    mailbox = { ...mailbox, lastFetchedAt: at };
  },
};
const inbox: FetchedMessage[] = [
  { id: 'm1', from: 'ceo@example.com', subject: 'Q1 plan', snippet: '...', receivedAt: '2026-03-10T06:30:00Z' },
  {
    id: 'm2',
    from: 'legal@example.com',
    subject: 'Contract deadline today',
    snippet: '...',
    receivedAt: '2026-03-10T06:45:00Z',
  },
];
const fetcher = {
  fetchMessages: async (_account: ConnectedAccount, request: FetchRequest): Promise<FetchedMessage[]> =>
    inbox.filter((m) => Date.parse(m.receivedAt) > Date.parse(request.since)).slice(0, request.limit),
};
const classifier = {
  classify: async (_account: ConnectedAccount, m: FetchedMessage) =>
    m.subject.includes('deadline') ? 'urgent' : 'important',
};
const drafter = {
  expectedLength: () => 300,
  draftReply: async (_account: ConnectedAccount, m: FetchedMessage) => {
    console.log(`    drafted a reply to "${m.subject}"`);
  },
};
const composer = {
  composeDigest: async (r: { recipient: string; messages: readonly FetchedMessage[] }): Promise<OutgoingMessage> => ({
    to: r.recipient,
    subject: `${r.messages.length} new message(s)`,
    body: r.messages.map((m) => m.subject).join('\n'),
  }),
  composeFollowUp: async (r: { recipient: string; emailId: string }): Promise<OutgoingMessage> => ({
    to: r.recipient,
    subject: 'Following up',
    body: `About ${r.emailId}`,
  }),
};
const sender = {
  send: async (m: OutgoingMessage) => {
    console.log(`    sent "${m.subject}" to ${m.to}`);
  },
};

// ─── Wiring ───────────────────────────────────────────────────────────────────

const config = parseSchedulerConfig({});
const dispatcher = new ScheduleDispatcher({
  store: schedules,
  gate,
  handlers: {
    digest: new DigestTaskHandler({
      accounts,
      fetcher,
      composer,
      sender,
      messageLimit: config.digestMessageLimit,
      lookbackMs: config.fetchLookbackMs,
    }),
    follow_up: new FollowUpTaskHandler({ composer, sender }),
  },
  config,
  logger,
});
const scheduler = new TaskScheduler({
  jobs: createStandardJobs({
    config,
    authority,
    gate,
    dispatcher,
    accounts,
    fetcher,
    classifier,
    drafter,
    logger,
  }),
  timezone: config.cronTimezone,
  logger,
});

dispatcher.events.on(EVENT_DISPATCHED, (e) => {
  console.log(`    ${e.kind} ${e.entryId} dispatched, ${e.creditsUsed} credit(s), next ${e.nextRunAt ?? 'never'}`);
});

const digest = createScheduleEntry(
  {
    ...tenant,
    ownerId: 'agent-1',
    task: { kind: 'digest', accountId: 'acct-1', criteriaType: 'important' },
    trigger: { kind: 'daily', timeOfDay: '08:00', timezone: 'Europe/Berlin' },
    recipient: 'user-1@example.com',
  },
  { now: start, defaultMaxRetries: config.defaultMaxRetries },
);
await schedules.save({ ...digest, nextRunAt: computeNextRunAt(digest.trigger, start) });

const followUp = createScheduleEntry(
  {
    ...tenant,
    ownerId: 'acct-1',
    task: { kind: 'follow_up', emailId: 'email-42', followUpType: 'reminder' },
    trigger: { kind: 'once', at: '2026-03-10T10:00:00Z' },
    recipient: 'prospect@example.com',
  },
  { now: start, defaultMaxRetries: config.defaultMaxRetries },
);
await schedules.save({ ...followUp, nextRunAt: computeNextRunAt(followUp.trigger, start) });

// ─── Simulated day ────────────────────────────────────────────────────────────

for (let minutes = 0; minutes <= 190; minutes += 5) {
  const tick = new Date(start.getTime() + minutes * 60_000);
  console.log(tick.toISOString());
  await scheduler.runAll(tick);
}

const balance = await authority.getBalance(tenant);
console.log(`credits left: ${balance?.availableCredits ?? 0}`);
db.close();
