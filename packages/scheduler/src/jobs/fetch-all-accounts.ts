// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ActionExecutionError, InsufficientCreditsError, componentLogger, selectDraftAction } from '@creditcore/ledger';
import type { ActionGate, Logger, TenantKey, Timestamp } from '@creditcore/ledger';
import type {
  AccountDirectory,
  ConnectedAccount,
  EmailFetcher,
  FetchedMessage,
  MessageClassifier,
  MessageDrafter,
} from '../collaborators.js';
import type { JobSummary, ScheduledJob } from './job.js';

export const FETCH_ALL_ACCOUNTS = 'fetch-all-accounts';

/** Classification label that earns a drafted reply. */
export const URGENT_CATEGORY = 'urgent';

export interface FetchAllAccountsJobOptions {
  accounts: AccountDirectory;
  fetcher: EmailFetcher;
  classifier: MessageClassifier;
  /** Drafts replies to urgent mail.  Without one, nothing is drafted. */
  drafter?: MessageDrafter;
  gate: ActionGate;
  cronExpression: string;
  /** Look-back for an account that has never been fetched. */
  lookbackMs: number;
  limit: number;
  logger?: Logger;
}

type Counters = {
  accounts: number;
  messages: number;
  classified: number;
  rejected: number;
  failed: number;
  fetchFailed: number;
  drafted: number;
  draftsRejected: number;
  draftsFailed: number;
};

type DraftResult = 'drafted' | 'rejected' | 'failed';

function tenantKeyOf(tenant: TenantKey): string {
  return `${tenant.userId}\u0000${tenant.orgId}`;
}

function byReceivedAt(a: FetchedMessage, b: FetchedMessage): number {
  return Date.parse(a.receivedAt) - Date.parse(b.receivedAt);
}

/**
 * Pulls new mail for every connected account, classifies each message through
 * the gate and drafts a reply to the urgent ones.
 *
 * A draft the tenant cannot afford is skipped and classification goes on.
 * Once a tenant cannot pay for a classification, its remaining messages on
 * any of its accounts are left for a later run: an account's fetch mark only
 * moves past the messages that were handled.  A fetch failure on one account
 * does not stop the others.
 */
export class FetchAllAccountsJob implements ScheduledJob {
  readonly name = FETCH_ALL_ACCOUNTS;
  readonly cronExpression: string;
  readonly #options: FetchAllAccountsJobOptions;
  readonly #logger: Logger;

  constructor(options: FetchAllAccountsJobOptions) {
    this.cronExpression = options.cronExpression;
    this.#options = options;
    this.#logger = componentLogger(FETCH_ALL_ACCOUNTS, options.logger);
  }

  async run(now: Date): Promise<JobSummary> {
    const { accounts, fetcher, limit } = this.#options;
    const summary: Counters = {
      accounts: 0,
      messages: 0,
      classified: 0,
      rejected: 0,
      failed: 0,
      fetchFailed: 0,
      drafted: 0,
      draftsRejected: 0,
      draftsFailed: 0,
    };
    const exhausted = new Set<string>();

    for (const account of await accounts.listConnectedAccounts()) {
      summary.accounts++;
      const since =
        account.lastFetchedAt ?? new Date(now.getTime() - this.#options.lookbackMs).toISOString();

      let messages: readonly FetchedMessage[];
      try {
        messages = await fetcher.fetchMessages(account, { since, limit });
      } catch (error: unknown) {
        summary.fetchFailed++;
        this.#logger.warn(
          { event: 'scheduler.fetch.failed', accountId: account.accountId, userId: account.userId, err: error },
          'email fetch failed',
        );
        continue;
      }
      summary.messages += messages.length;

      const tenant = { userId: account.userId, orgId: account.orgId };
      const key = tenantKeyOf(tenant);
      // A full page may have more mail behind it.
      let complete = messages.length < limit;
      let handledThrough: Timestamp | null = null;

      for (const message of [...messages].sort(byReceivedAt)) {
        if (exhausted.has(key)) {
          summary.rejected++;
          complete = false;
          continue;
        }

        let category: string;
        try {
          const outcome = await this.#options.gate.execute(
            { tenant, action: 'email_classification', metadata: { messageId: message.id }, at: now },
            () => this.#options.classifier.classify(account, message),
          );
          if (outcome.status === 'rejected') {
            exhausted.add(key);
            summary.rejected++;
            complete = false;
            continue;
          }
          summary.classified++;
          category = outcome.value;
        } catch (error: unknown) {
          if (!(error instanceof ActionExecutionError)) throw error;
          summary.failed++;
          handledThrough = message.receivedAt;
          continue;
        }
        handledThrough = message.receivedAt;

        if (category !== URGENT_CATEGORY || this.#options.drafter === undefined) continue;
        const drafted = await this.#draft(this.#options.drafter, account, message, now);
        if (drafted === 'drafted') summary.drafted++;
        else if (drafted === 'failed') summary.draftsFailed++;
        else summary.draftsRejected++;
      }

      const mark = complete ? now.toISOString() : handledThrough;
      if (mark !== null) await accounts.markFetched(account.accountId, mark);
    }

    if (exhausted.size > 0) {
      this.#logger.info(
        { event: 'scheduler.fetch.credits_exhausted', tenants: exhausted.size },
        'classification stopped for tenants without credits',
      );
    }
    return summary;
  }

  async #draft(
    drafter: MessageDrafter,
    account: ConnectedAccount,
    message: FetchedMessage,
    now: Date,
  ): Promise<DraftResult> {
    const action = selectDraftAction(drafter.expectedLength(account, message));
    try {
      await this.#options.gate.executeOrThrow(
        {
          tenant: { userId: account.userId, orgId: account.orgId },
          action,
          description: `Draft reply to ${message.id}`,
          metadata: { messageId: message.id },
          at: now,
        },
        () => drafter.draftReply(account, message),
      );
      return 'drafted';
    } catch (error: unknown) {
      if (error instanceof InsufficientCreditsError) return 'rejected';
      if (!(error instanceof ActionExecutionError)) throw error;
      this.#logger.warn(
        { event: 'scheduler.draft.failed', accountId: account.accountId, messageId: message.id, action, err: error },
        'reply draft failed',
      );
      return 'failed';
    }
  }
}
