// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { CreditAuthority } from './authority.js';
import { buildCostTable } from './costs.js';
import type { ActionKind, CostTable } from './costs.js';
import { ActionExecutionError, InsufficientCreditsError } from './errors.js';
import { componentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { TenantKey } from './types.js';

export interface ActionRequest {
  readonly tenant: TenantKey;
  readonly action: ActionKind;
  readonly description?: string;
  readonly metadata?: Record<string, unknown>;
  /** Charge time; scheduled work passes its tick. */
  readonly at?: Date;
}

export interface ActionCompleted<T> {
  readonly status: 'completed';
  readonly value: T;
  /** Credits charged for this action. */
  readonly creditsUsed: number;
  /** Balance right after the charge. */
  readonly availableCredits: number;
}

export interface ActionRejected {
  readonly status: 'rejected';
  readonly reason: 'insufficient_credits';
  readonly action: ActionKind;
  readonly creditsRequired: number;
  readonly availableCredits: number;
  readonly message: string;
}

export type ActionOutcome<T> = ActionCompleted<T> | ActionRejected;

export interface ActionGateOptions {
  authority: CreditAuthority;
  /** Cost table.  Defaults to the authority's configured costs. */
  costs?: CostTable;
  logger?: Logger;
}

/**
 * ActionGate charges credits before a unit of work is allowed to run.
 *
 * Order of operations:
 *   1. Look up the action's cost.
 *   2. tryDeduct().  A refusal returns `rejected` and the work never runs.
 *   3. Run the work.
 *
 * A failure in step 3 is rethrown as ActionExecutionError.  The charge is not
 * refunded: the ledger records what was attempted, and manual grants cover
 * the exceptional case.
 */
export class ActionGate {
  readonly #authority: CreditAuthority;
  readonly #costs: CostTable;
  readonly #logger: Logger;

  constructor(options: ActionGateOptions) {
    this.#authority = options.authority;
    this.#costs = options.costs ?? buildCostTable(options.authority.config.costs);
    this.#logger = componentLogger('action-gate', options.logger);
  }

  costOf(action: ActionKind): number {
    return this.#costs[action];
  }

  async execute<T>(request: ActionRequest, work: () => Promise<T>): Promise<ActionOutcome<T>> {
    const { tenant, action } = request;
    const cost = this.costOf(action);

    const charge = await this.#authority.tryDeduct(tenant, cost, action, {
      ...(request.description !== undefined && { description: request.description }),
      ...(request.metadata !== undefined && { metadata: request.metadata }),
      ...(request.at !== undefined && { at: request.at }),
    });

    if (!charge.ok) {
      return {
        status: 'rejected',
        reason: 'insufficient_credits',
        action,
        creditsRequired: cost,
        availableCredits: charge.available,
        message:
          `This action needs ${cost} credits but only ${charge.available} remain. ` +
          'Upgrade your plan or wait for the monthly reset.',
      };
    }

    const availableCredits = charge.balance.availableCredits;
    try {
      const value = await work();
      return { status: 'completed', value, creditsUsed: cost, availableCredits };
    } catch (error: unknown) {
      this.#logger.warn(
        {
          event: 'gate.action.failed',
          ...tenant,
          action,
          creditsUsed: cost,
          transactionId: charge.transaction.id,
          err: error,
        },
        'action failed after charge',
      );
      throw new ActionExecutionError(action, cost, availableCredits, error);
    }
  }

  /**
   * execute() for callers that treat a refused charge as an error.
   *
   * @throws InsufficientCreditsError when the charge is refused; the work never runs.
   */
  async executeOrThrow<T>(request: ActionRequest, work: () => Promise<T>): Promise<ActionCompleted<T>> {
    const outcome = await this.execute(request, work);
    if (outcome.status === 'rejected') {
      throw new InsufficientCreditsError(request.tenant, outcome.creditsRequired, outcome.availableCredits);
    }
    return outcome;
  }
}
