// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ActionGate, CreditAuthority, Logger } from '@creditcore/ledger';
import type { AccountDirectory, EmailFetcher, MessageClassifier, MessageDrafter } from '../collaborators.js';
import type { SchedulerConfig } from '../config.js';
import type { ScheduleDispatcher } from '../dispatcher.js';
import { DISPATCH_DIGESTS, DispatchSchedulesJob, PROCESS_FOLLOW_UPS } from './dispatch-schedules.js';
import { FetchAllAccountsJob } from './fetch-all-accounts.js';
import type { ScheduledJob } from './job.js';
import { ResetMonthlyCreditsJob } from './reset-monthly-credits.js';

export type { JobSummary, ScheduledJob } from './job.js';
export { DISPATCH_DIGESTS, DispatchSchedulesJob, PROCESS_FOLLOW_UPS } from './dispatch-schedules.js';
export { FETCH_ALL_ACCOUNTS, FetchAllAccountsJob, URGENT_CATEGORY } from './fetch-all-accounts.js';
export type { FetchAllAccountsJobOptions } from './fetch-all-accounts.js';
export { RESET_MONTHLY_CREDITS, ResetMonthlyCreditsJob } from './reset-monthly-credits.js';

export interface StandardJobsOptions {
  config: SchedulerConfig;
  authority: CreditAuthority;
  gate: ActionGate;
  dispatcher: ScheduleDispatcher;
  accounts: AccountDirectory;
  fetcher: EmailFetcher;
  classifier: MessageClassifier;
  drafter?: MessageDrafter;
  logger?: Logger;
}

/** The four periodic jobs, on the cadences in `config`. */
export function createStandardJobs(options: StandardJobsOptions): ScheduledJob[] {
  const { config, logger } = options;
  return [
    new FetchAllAccountsJob({
      accounts: options.accounts,
      fetcher: options.fetcher,
      classifier: options.classifier,
      drafter: options.drafter,
      gate: options.gate,
      cronExpression: config.fetchCron,
      lookbackMs: config.fetchLookbackMs,
      limit: config.fetchLimit,
      logger,
    }),
    new DispatchSchedulesJob({
      name: DISPATCH_DIGESTS,
      kind: 'digest',
      cronExpression: config.digestCron,
      dispatcher: options.dispatcher,
    }),
    new DispatchSchedulesJob({
      name: PROCESS_FOLLOW_UPS,
      kind: 'follow_up',
      cronExpression: config.followUpCron,
      dispatcher: options.dispatcher,
    }),
    new ResetMonthlyCreditsJob({
      authority: options.authority,
      cronExpression: config.resetCron,
      logger,
    }),
  ];
}
