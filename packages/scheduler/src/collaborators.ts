// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Contracts the host application implements.  Mail transport, OAuth and
 * prompt construction live behind these; the scheduler only sequences them.
 */

import type { Timestamp } from '@creditcore/ledger';

export interface ConnectedAccount {
  readonly accountId: string;
  /** Billing tenant for work done on this account. */
  readonly userId: string;
  readonly orgId: string;
  readonly emailAddress: string;
  /** Opaque provider credentials.  Redacted from logs. */
  readonly credentials: Readonly<Record<string, unknown>>;
  readonly lastFetchedAt: Timestamp | null;
}

export interface AccountDirectory {
  listConnectedAccounts(): Promise<readonly ConnectedAccount[]>;
  getAccount(accountId: string): Promise<ConnectedAccount | undefined>;
  markFetched(accountId: string, at: Timestamp): Promise<void>;
}

export interface FetchedMessage {
  readonly id: string;
  readonly from: string;
  readonly subject: string;
  readonly snippet: string;
  readonly receivedAt: Timestamp;
}

export interface FetchRequest {
  /** Only messages received after this instant. */
  readonly since: Timestamp;
  readonly limit: number;
  /** Digest selection criteria, when fetching for a digest. */
  readonly criteriaType?: string;
  readonly signal?: AbortSignal;
}

export interface EmailFetcher {
  fetchMessages(account: ConnectedAccount, request: FetchRequest): Promise<readonly FetchedMessage[]>;
}

export interface MessageClassifier {
  /** Classifies and stores the result; the return value is the category label. */
  classify(account: ConnectedAccount, message: FetchedMessage): Promise<string>;
}

/**
 * Drafts replies for the user to review.  The draft charge depends on the
 * reply's length, so the length is estimated before drafting.
 */
export interface MessageDrafter {
  expectedLength(account: ConnectedAccount, message: FetchedMessage): number;
  /** Drafts and stores a reply to `message`. */
  draftReply(account: ConnectedAccount, message: FetchedMessage): Promise<void>;
}

export interface OutgoingMessage {
  readonly to: string;
  readonly subject: string;
  readonly body: string;
}

export interface DigestRequest {
  readonly recipient: string;
  readonly criteriaType: string;
  readonly account: ConnectedAccount;
  readonly messages: readonly FetchedMessage[];
}

export interface FollowUpRequest {
  readonly recipient: string;
  readonly emailId: string;
  readonly followUpType: string;
  readonly templateMessage?: string;
}

export interface MessageComposer {
  composeDigest(request: DigestRequest): Promise<OutgoingMessage>;
  composeFollowUp(request: FollowUpRequest): Promise<OutgoingMessage>;
}

export interface MessageSender {
  send(message: OutgoingMessage, signal?: AbortSignal): Promise<void>;
}
