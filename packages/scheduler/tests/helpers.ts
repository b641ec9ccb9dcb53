// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { createLogger } from '@creditcore/ledger';
import type { TenantKey } from '@creditcore/ledger';
import type {
  AccountDirectory,
  ConnectedAccount,
  DigestRequest,
  EmailFetcher,
  FetchRequest,
  FetchedMessage,
  FollowUpRequest,
  MessageClassifier,
  MessageComposer,
  MessageDrafter,
  MessageSender,
  OutgoingMessage,
} from '../src/collaborators.js';
import { createScheduleEntry } from '../src/types.js';
import type { NewScheduleEntry, ScheduleEntry } from '../src/types.js';

export const silentLogger = createLogger({ level: 'silent' });

export const ALICE: TenantKey = { userId: 'user-alice', orgId: 'org-acme' };
export const BOB: TenantKey = { userId: 'user-bob', orgId: 'org-acme' };

export function digestEntry(overrides: Partial<NewScheduleEntry> = {}, now = '2026-03-01T00:00:00.000Z'): ScheduleEntry {
  return createScheduleEntry(
    {
      ...ALICE,
      ownerId: 'agent-1',
      task: { kind: 'digest', accountId: 'acct-alice', criteriaType: 'important' },
      trigger: { kind: 'daily', timeOfDay: '08:00', timezone: 'UTC' },
      recipient: 'alice@example.com',
      ...overrides,
    },
    { now: new Date(now), defaultMaxRetries: 3 },
  );
}

export function followUpEntry(
  overrides: Partial<NewScheduleEntry> = {},
  now = '2026-03-01T00:00:00.000Z',
): ScheduleEntry {
  return createScheduleEntry(
    {
      ...ALICE,
      ownerId: 'acct-alice',
      task: { kind: 'follow_up', emailId: 'email-1', followUpType: 'reminder' },
      trigger: { kind: 'once', at: '2026-03-10T09:00:00.000Z' },
      recipient: 'bob@example.com',
      ...overrides,
    },
    { now: new Date(now), defaultMaxRetries: 3 },
  );
}

export function account(accountId: string, tenant: TenantKey, lastFetchedAt: string | null = null): ConnectedAccount {
  return {
    accountId,
    ...tenant,
    emailAddress: `${accountId}@example.com`,
    credentials: { refreshToken: 'test-token' },
    lastFetchedAt,
  };
}

export function message(id: string, receivedAt = '2026-03-10T07:30:00.000Z'): FetchedMessage {
  return { id, from: 'sender@example.com', subject: `Subject ${id}`, snippet: 'Hello', receivedAt };
}

// ---------------------------------------------------------------------------
// Collaborator fakes
// ---------------------------------------------------------------------------

export class FakeAccountDirectory implements AccountDirectory {
  readonly accounts = new Map<string, ConnectedAccount>();
  readonly fetched: Array<{ accountId: string; at: string }> = [];

  constructor(accounts: ConnectedAccount[] = []) {
    for (const a of accounts) this.accounts.set(a.accountId, a);
  }

  async listConnectedAccounts(): Promise<readonly ConnectedAccount[]> {
    return [...this.accounts.values()];
  }

  async getAccount(accountId: string): Promise<ConnectedAccount | undefined> {
    return this.accounts.get(accountId);
  }

  async markFetched(accountId: string, at: string): Promise<void> {
    this.fetched.push({ accountId, at });
  }
}

export class FakeEmailFetcher implements EmailFetcher {
  readonly inbox = new Map<string, FetchedMessage[]>();
  readonly failing = new Set<string>();
  readonly requests: Array<{ accountId: string; request: FetchRequest }> = [];

  async fetchMessages(acct: ConnectedAccount, request: FetchRequest): Promise<readonly FetchedMessage[]> {
    this.requests.push({ accountId: acct.accountId, request });
    if (this.failing.has(acct.accountId)) throw new Error('invalid_grant');
    return (this.inbox.get(acct.accountId) ?? []).slice(0, request.limit);
  }
}

export class FakeClassifier implements MessageClassifier {
  readonly classified: string[] = [];
  /** Category per message id; anything else is 'important'. */
  readonly labels = new Map<string, string>();

  async classify(_account: ConnectedAccount, msg: FetchedMessage): Promise<string> {
    this.classified.push(msg.id);
    return this.labels.get(msg.id) ?? 'important';
  }
}

export class FakeDrafter implements MessageDrafter {
  readonly drafted: string[] = [];
  readonly lengths = new Map<string, number>();
  failure: Error | undefined;

  expectedLength(_account: ConnectedAccount, msg: FetchedMessage): number {
    return this.lengths.get(msg.id) ?? 200;
  }

  async draftReply(_account: ConnectedAccount, msg: FetchedMessage): Promise<void> {
    if (this.failure !== undefined) throw this.failure;
    this.drafted.push(msg.id);
  }
}

export class FakeComposer implements MessageComposer {
  async composeDigest(request: DigestRequest): Promise<OutgoingMessage> {
    return {
      to: request.recipient,
      subject: `Your ${request.criteriaType} digest`,
      body: request.messages.map((m) => m.subject).join('\n'),
    };
  }

  async composeFollowUp(request: FollowUpRequest): Promise<OutgoingMessage> {
    return {
      to: request.recipient,
      subject: `Following up (${request.followUpType})`,
      body: request.templateMessage ?? `Re: ${request.emailId}`,
    };
  }
}

export class RecordingSender implements MessageSender {
  readonly sent: OutgoingMessage[] = [];
  failure: Error | undefined;

  async send(msg: OutgoingMessage): Promise<void> {
    if (this.failure !== undefined) throw this.failure;
    this.sent.push(msg);
  }
}
