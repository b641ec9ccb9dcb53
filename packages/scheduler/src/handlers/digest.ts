// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ActionKind } from '@creditcore/ledger';
import type { AccountDirectory, EmailFetcher, MessageComposer, MessageSender } from '../collaborators.js';
import { AccountNotFoundError } from '../errors.js';
import type { ScheduleEntry } from '../types.js';
import type { TaskContext, TaskHandler, TaskOf, TaskRunReport } from './handler.js';

export interface DigestTaskHandlerOptions {
  accounts: AccountDirectory;
  fetcher: EmailFetcher;
  composer: MessageComposer;
  sender: MessageSender;
  /** Messages summarised per digest. */
  messageLimit: number;
  /** Look-back for an entry that has never run. */
  lookbackMs: number;
}

/**
 * Sends the daily digest: messages received since the last successful run,
 * summarised and mailed to the entry's recipient.  An empty inbox is a
 * success that sends nothing.  Digests are not charged.
 */
export class DigestTaskHandler implements TaskHandler<'digest'> {
  readonly kind = 'digest';
  declare readonly action?: ActionKind;
  readonly #options: DigestTaskHandlerOptions;

  constructor(options: DigestTaskHandlerOptions) {
    this.#options = options;
  }

  async run(task: TaskOf<'digest'>, entry: ScheduleEntry, context: TaskContext): Promise<TaskRunReport> {
    const { accounts, fetcher, composer, sender } = this.#options;
    const account = await accounts.getAccount(task.accountId);
    if (account === undefined) throw new AccountNotFoundError(task.accountId);

    const since = entry.lastRunAt ?? new Date(context.now.getTime() - this.#options.lookbackMs).toISOString();
    const messages = await fetcher.fetchMessages(account, {
      since,
      limit: this.#options.messageLimit,
      criteriaType: task.criteriaType,
      signal: context.signal,
    });
    if (messages.length === 0) return { delivered: false, messages: 0 };

    const digest = await composer.composeDigest({
      recipient: entry.recipient,
      criteriaType: task.criteriaType,
      account,
      messages,
    });
    await sender.send(digest, context.signal);
    return { delivered: true, messages: messages.length };
  }
}
