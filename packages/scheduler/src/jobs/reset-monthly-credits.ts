// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { componentLogger } from '@creditcore/ledger';
import type { CreditAuthority, Logger } from '@creditcore/ledger';
import type { JobSummary, ScheduledJob } from './job.js';

export const RESET_MONTHLY_CREDITS = 'reset-monthly-credits';

/**
 * Resets every balance whose `creditsResetAt` has passed to its tier's
 * allotment, as of the tick.  A failed reset leaves the row as it was; it is
 * still due on the next run, which retries it.
 */
export class ResetMonthlyCreditsJob implements ScheduledJob {
  readonly name = RESET_MONTHLY_CREDITS;
  readonly cronExpression: string;
  readonly #authority: CreditAuthority;
  readonly #logger: Logger;

  constructor(options: { authority: CreditAuthority; cronExpression: string; logger?: Logger }) {
    this.cronExpression = options.cronExpression;
    this.#authority = options.authority;
    this.#logger = componentLogger(RESET_MONTHLY_CREDITS, options.logger);
  }

  async run(now: Date): Promise<JobSummary> {
    const due = await this.#authority.listBalances({ resetDueBy: now.toISOString() });
    const summary = { due: due.length, reset: 0, failed: 0 };

    for (const balance of due) {
      const tenant = { userId: balance.userId, orgId: balance.orgId };
      try {
        await this.#authority.resetMonthly(tenant, balance.subscriptionTier, { at: now });
        summary.reset++;
      } catch (error: unknown) {
        summary.failed++;
        this.#logger.error(
          { event: 'scheduler.reset.failed', ...tenant, tier: balance.subscriptionTier, err: error },
          'monthly reset failed; will retry next run',
        );
      }
    }
    return summary;
  }
}
