// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { addMonths, nextResetAfter } from './calendar.js';
import { parseLedgerConfig } from './config.js';
import type { LedgerConfig } from './config.js';
import { BalanceNotFoundError, LedgerWriteConflictError, TierResetError } from './errors.js';
import {
  EVENT_CREDITED,
  EVENT_DEBITED,
  EVENT_LOW_BALANCE,
  EVENT_REJECTED,
  EVENT_RESET,
  LedgerEventEmitter,
} from './events.js';
import { KeyedMutex } from './keyed-mutex.js';
import { componentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { reconcileBalance } from './reconcile.js';
import type { ReconciliationReport } from './reconcile.js';
import type { LedgerStore } from './storage/adapter.js';
import type { LedgerTracer, SpanAttributes } from './telemetry/otel.js';
import { TierPolicy, isSubscriptionTier } from './tiers.js';
import { LEDGER_ACTION } from './types.js';
import type {
  BalanceFilter,
  CreditBalance,
  CreditTransaction,
  DeductResult,
  LedgerDelta,
  LedgerMutation,
  MutationOptions,
  SubscriptionTier,
  TenantKey,
  TransactionFilter,
} from './types.js';

export interface CreditAuthorityOptions {
  store: LedgerStore;
  /** Raw LedgerConfig; validated with LedgerConfigSchema. */
  config?: unknown;
  /** Overrides the policy built from `config.tiers`. */
  tierPolicy?: TierPolicy;
  events?: LedgerEventEmitter;
  logger?: Logger;
  tracer?: LedgerTracer;
  /** Clock.  Defaults to the system clock. */
  now?: () => Date;
  /** Back-off between conflict retries.  Defaults to setTimeout. */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function assertCreditAmount(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}.`);
  }
}

function requireTier(tier: string): SubscriptionTier {
  if (!isSubscriptionTier(tier)) {
    throw new RangeError(`Unknown subscription tier "${tier}".`);
  }
  return tier;
}

/**
 * CreditAuthority is the only component that changes credit balances.
 *
 * Every operation becomes one LedgerDelta applied by the store in a single
 * atomic step, so a balance and its transaction log never diverge.  With
 * `serializePerTenant` on, operations for the same tenant also queue behind
 * an in-process mutex; the store's conditional writes keep separate
 * processes correct on their own.
 *
 * Public API:
 *   tryDeduct()     conditional debit, never overdraws
 *   grant()         add credits on top of the current cycle
 *   resetMonthly()  overwrite with the tier allotment and advance the anchor
 *   onboard()       create a balance with the tier allotment (idempotent)
 *   changeTier()    relabel the tier; the allotment follows at the next reset
 */
export class CreditAuthority {
  readonly #store: LedgerStore;
  readonly #config: LedgerConfig;
  readonly #tiers: TierPolicy;
  readonly #events: LedgerEventEmitter;
  readonly #logger: Logger;
  readonly #tracer: LedgerTracer | undefined;
  readonly #now: () => Date;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #mutex = new KeyedMutex();

  constructor(options: CreditAuthorityOptions) {
    this.#store = options.store;
    this.#config = parseLedgerConfig(options.config ?? {});
    this.#tiers = options.tierPolicy ?? new TierPolicy(this.#config.tiers);
    this.#events = options.events ?? new LedgerEventEmitter();
    this.#logger = componentLogger('credit-authority', options.logger);
    this.#tracer = options.tracer;
    this.#now = options.now ?? (() => new Date());
    this.#sleep = options.sleep ?? defaultSleep;
  }

  get events(): LedgerEventEmitter {
    return this.#events;
  }

  get tierPolicy(): TierPolicy {
    return this.#tiers;
  }

  get config(): LedgerConfig {
    return this.#config;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * Debits `cost` credits when the tenant can cover them.
   *
   * A refusal writes nothing and returns `ok: false` with the available
   * amount; it is a normal outcome, not an error.
   */
  async tryDeduct(
    tenant: TenantKey,
    cost: number,
    actionType: string,
    options: MutationOptions = {},
  ): Promise<DeductResult> {
    assertCreditAmount('cost', cost);

    return this.#traced(
      'deduct',
      tenant,
      { 'creditcore.action': actionType, 'creditcore.cost': cost },
      async (): Promise<DeductResult> => {
        const timestamp = (options.at ?? this.#now()).toISOString();
        const mutation = await this.#exclusive(tenant, () =>
          this.#apply({
            kind: 'debit',
            tenant,
            amount: cost,
            actionType,
            description: options.description ?? null,
            metadata: options.metadata ?? null,
            timestamp,
          }),
        );

        if (!mutation.applied) {
          const available = mutation.balance?.availableCredits ?? 0;
          this.#logger.info(
            { event: 'ledger.reject', ...tenant, actionType, requested: cost, available },
            'debit refused: insufficient credits',
          );
          this.#events.emit(EVENT_REJECTED, {
            ...tenant,
            actionType,
            requested: cost,
            available,
            timestamp,
          });
          return { ok: false, reason: 'insufficient_credits', requested: cost, available };
        }

        const { balance, transaction } = mutation;
        this.#logger.debug(
          { event: 'ledger.debit', ...tenant, actionType, amount: cost, available: balance.availableCredits },
          'credits debited',
        );
        this.#events.emit(EVENT_DEBITED, {
          ...tenant,
          actionType,
          amount: cost,
          availableCredits: balance.availableCredits,
          transactionId: transaction.id,
          timestamp,
        });
        this.#checkLowBalance(balance, cost, timestamp);
        return { ok: true, balance, transaction };
      },
      (result) =>
        result.ok
          ? { 'creditcore.applied': true, 'creditcore.available': result.balance.availableCredits }
          : { 'creditcore.applied': false, 'creditcore.available': result.available },
    );
  }

  /**
   * Adds `amount` credits to the current cycle.
   *
   * A tenant without a balance gets one on the free tier, entering the
   * monthly cycle one month from now.
   */
  async grant(tenant: TenantKey, amount: number, description: string): Promise<CreditBalance> {
    assertCreditAmount('amount', amount);

    return this.#traced('grant', tenant, { 'creditcore.amount': amount }, async () => {
      const now = this.#now();
      const timestamp = now.toISOString();
      const mutation = await this.#exclusive(tenant, () =>
        this.#apply({
          kind: 'credit',
          tenant,
          amount,
          actionType: LEDGER_ACTION.GRANT,
          description,
          metadata: null,
          timestamp,
          defaultTier: 'free',
          defaultResetAt: addMonths(now, 1).toISOString(),
        }),
      );
      if (!mutation.applied) throw new BalanceNotFoundError(tenant);

      this.#logger.info(
        { event: 'ledger.grant', ...tenant, amount, available: mutation.balance.availableCredits },
        'credits granted',
      );
      this.#events.emit(EVENT_CREDITED, {
        ...tenant,
        amount,
        availableCredits: mutation.balance.availableCredits,
        transactionId: mutation.transaction.id,
        timestamp,
      });
      return mutation.balance;
    });
  }

  /**
   * Overwrites the balance with the tier's monthly allotment.
   *
   * Unspent credits are forfeited.  `creditsResetAt` moves one calendar month
   * past its previous value (further only when that is still in the past).
   * The write is guarded by the previous anchor, so two racing resets apply
   * once; the loser returns the winner's balance.  `options.at` is the
   * reset time, for callers that run on their own clock.
   *
   * @throws BalanceNotFoundError when the tenant has no balance.
   * @throws TierResetError when the write fails; the row is left untouched.
   */
  async resetMonthly(
    tenant: TenantKey,
    tierName: string,
    options: Pick<MutationOptions, 'at'> = {},
  ): Promise<CreditBalance> {
    const tier = requireTier(tierName);
    const allotment = this.#tiers.monthlyCredits(tier);

    return this.#traced('reset', tenant, { 'creditcore.tier': tier }, () =>
      this.#exclusive(tenant, async () => {
        const current = await this.#store.getBalance(tenant);
        if (current === undefined) throw new BalanceNotFoundError(tenant);

        const now = options.at ?? this.#now();
        const timestamp = now.toISOString();
        const previousAnchor = current.creditsResetAt === null ? null : new Date(current.creditsResetAt);
        const nextResetAt = nextResetAfter(previousAnchor, now).toISOString();

        let mutation: LedgerMutation;
        try {
          mutation = await this.#apply({
            kind: 'reset',
            mode: 'reset',
            tenant,
            tier,
            allotment,
            nextResetAt,
            expectedResetAt: current.creditsResetAt,
            actionType: LEDGER_ACTION.MONTHLY_RESET,
            description: `Monthly reset to ${allotment} credits (${tier})`,
            metadata: { tier },
            timestamp,
          });
        } catch (error: unknown) {
          this.#logger.error({ event: 'ledger.reset.failed', ...tenant, err: error }, 'monthly reset failed');
          throw new TierResetError(tenant, error);
        }

        if (!mutation.applied) {
          if (mutation.balance === undefined) throw new BalanceNotFoundError(tenant);
          this.#logger.info(
            { event: 'ledger.reset.skipped', ...tenant, creditsResetAt: mutation.balance.creditsResetAt },
            'monthly reset already applied by another writer',
          );
          return mutation.balance;
        }

        const forfeitedValue = mutation.transaction.metadata?.['forfeited'];
        const forfeited = typeof forfeitedValue === 'number' ? forfeitedValue : current.availableCredits;
        this.#logger.info(
          { event: 'ledger.reset', ...tenant, tier, allotment, forfeited, nextResetAt },
          'monthly credits reset',
        );
        this.#events.emit(EVENT_RESET, {
          ...tenant,
          mode: 'reset',
          tier,
          totalCredits: allotment,
          forfeited,
          nextResetAt,
          timestamp,
        });
        return mutation.balance;
      }),
    );
  }

  /** Creates the tenant's balance with the tier allotment.  Returns the existing row unchanged when present. */
  async onboard(tenant: TenantKey, tierName: string): Promise<CreditBalance> {
    const tier = requireTier(tierName);
    const allotment = this.#tiers.monthlyCredits(tier);

    return this.#traced('onboard', tenant, { 'creditcore.tier': tier }, async () => {
      const now = this.#now();
      const timestamp = now.toISOString();
      const nextResetAt = addMonths(now, 1).toISOString();
      const mutation = await this.#exclusive(tenant, () =>
        this.#apply({
          kind: 'reset',
          mode: 'onboard',
          tenant,
          tier,
          allotment,
          nextResetAt,
          actionType: LEDGER_ACTION.ONBOARDING,
          description: `Initial ${tier} allotment`,
          metadata: { tier },
          timestamp,
        }),
      );

      if (!mutation.applied) {
        if (mutation.balance === undefined) throw new BalanceNotFoundError(tenant);
        return mutation.balance;
      }

      this.#logger.info({ event: 'ledger.onboard', ...tenant, tier, allotment }, 'tenant onboarded');
      this.#events.emit(EVENT_RESET, {
        ...tenant,
        mode: 'onboard',
        tier,
        totalCredits: allotment,
        forfeited: 0,
        nextResetAt,
        timestamp,
      });
      return mutation.balance;
    });
  }

  /**
   * Records a new subscription tier.  Credits are not touched; the next
   * monthly reset grants the new tier's allotment.
   */
  async changeTier(tenant: TenantKey, tierName: string): Promise<CreditBalance> {
    const tier = requireTier(tierName);

    return this.#exclusive(tenant, async () => {
      const current = await this.#store.getBalance(tenant);
      if (current === undefined) throw new BalanceNotFoundError(tenant);
      if (current.subscriptionTier === tier) return current;

      const mutation = await this.#apply({
        kind: 'tier',
        tenant,
        tier,
        actionType: LEDGER_ACTION.TIER_CHANGE,
        description: `Tier changed from ${current.subscriptionTier} to ${tier}`,
        metadata: { previousTier: current.subscriptionTier, tier },
        timestamp: this.#now().toISOString(),
      });
      if (!mutation.applied) throw new BalanceNotFoundError(tenant);

      this.#logger.info(
        { event: 'ledger.tier_change', ...tenant, from: current.subscriptionTier, to: tier },
        'subscription tier changed',
      );
      return mutation.balance;
    });
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  getBalance(tenant: TenantKey): Promise<CreditBalance | undefined> {
    return this.#store.getBalance(tenant);
  }

  listBalances(filter?: BalanceFilter): Promise<readonly CreditBalance[]> {
    return this.#store.listBalances(filter);
  }

  listTransactions(
    tenant: TenantKey,
    filter: Omit<TransactionFilter, 'userId' | 'orgId'> = {},
  ): Promise<readonly CreditTransaction[]> {
    return this.#store.listTransactions({ ...filter, userId: tenant.userId, orgId: tenant.orgId });
  }

  /** Replays the tenant's log since its latest baseline and compares it with the balance row. */
  async reconcile(tenant: TenantKey): Promise<ReconciliationReport> {
    const balance = await this.#store.getBalance(tenant);
    if (balance === undefined) throw new BalanceNotFoundError(tenant);
    const transactions = await this.#store.listTransactions({ userId: tenant.userId, orgId: tenant.orgId });
    const report = reconcileBalance(balance, transactions);
    if (!report.consistent) {
      this.#logger.warn(
        { event: 'ledger.reconcile.mismatch', ...tenant, expected: report.expected, actual: report.actual },
        'balance does not match transaction log',
      );
    }
    return report;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  #exclusive<T>(tenant: TenantKey, fn: () => Promise<T>): Promise<T> {
    if (!this.#config.serializePerTenant) return fn();
    return this.#mutex.runExclusive(`${tenant.userId}\u0000${tenant.orgId}`, fn);
  }

  async #apply(delta: LedgerDelta): Promise<LedgerMutation> {
    const delays = this.#config.writeRetryDelaysMs;
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.#store.applyDelta(delta);
      } catch (error: unknown) {
        if (!(error instanceof LedgerWriteConflictError) || attempt >= delays.length) throw error;
        const delayMs = delays[attempt] ?? 0;
        this.#logger.warn(
          { event: 'ledger.write_conflict', ...delta.tenant, kind: delta.kind, attempt: attempt + 1, delayMs },
          'ledger write conflict, retrying',
        );
        await this.#sleep(delayMs);
      }
    }
  }

  #checkLowBalance(balance: CreditBalance, debited: number, timestamp: string): void {
    if (balance.totalCredits <= 0) return;
    const threshold = (balance.totalCredits * this.#config.lowBalancePercent) / 100;
    const before = balance.availableCredits + debited;
    if (before > threshold && balance.availableCredits <= threshold) {
      this.#logger.warn(
        { event: 'ledger.low_balance', userId: balance.userId, orgId: balance.orgId, available: balance.availableCredits },
        'credit balance low',
      );
      this.#events.emit(EVENT_LOW_BALANCE, {
        userId: balance.userId,
        orgId: balance.orgId,
        availableCredits: balance.availableCredits,
        totalCredits: balance.totalCredits,
        percentRemaining: (balance.availableCredits * 100) / balance.totalCredits,
        timestamp,
      });
    }
  }

  #traced<T>(
    operation: string,
    tenant: TenantKey,
    attributes: SpanAttributes,
    run: () => Promise<T>,
    describe?: (result: T) => SpanAttributes,
  ): Promise<T> {
    if (this.#tracer === undefined) return run();
    return this.#tracer.traceOperation(
      operation,
      { 'creditcore.user_id': tenant.userId, 'creditcore.org_id': tenant.orgId, ...attributes },
      run,
      describe,
    );
  }
}
