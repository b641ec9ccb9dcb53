// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @creditcore/ledger
 *
 * Per-tenant credit ledger with atomic deduction, the charge-before-execute
 * Action Gate and the subscription tier table.
 */

export type {
  BalanceFilter,
  CreditBalance,
  CreditDelta,
  CreditTransaction,
  DebitDelta,
  DeductResult,
  LedgerDelta,
  LedgerMutation,
  MutationOptions,
  ResetDelta,
  SubscriptionTier,
  TenantKey,
  TierDelta,
  Timestamp,
  TransactionFilter,
} from './types.js';
export { BASELINE_ACTIONS, LEDGER_ACTION, SUBSCRIPTION_TIERS } from './types.js';

export {
  ActionExecutionError,
  BalanceNotFoundError,
  CreditCoreError,
  InsufficientCreditsError,
  InvalidConfigError,
  LedgerWriteConflictError,
  TierResetError,
} from './errors.js';

export {
  LedgerConfigSchema,
  LogLevelSchema,
  ledgerConfigFromEnv,
  parseLedgerConfig,
  parseWithSchema,
} from './config.js';
export type { LedgerConfig, LogLevel } from './config.js';

export { componentLogger, createLogger, getLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export {
  EVENT_CREDITED,
  EVENT_DEBITED,
  EVENT_LOW_BALANCE,
  EVENT_REJECTED,
  EVENT_RESET,
  LedgerEventEmitter,
  TypedEventEmitter,
} from './events.js';
export type {
  EventListener,
  LedgerCreditedEventPayload,
  LedgerDebitedEventPayload,
  LedgerEventName,
  LedgerEventPayloadMap,
  LedgerLowBalanceEventPayload,
  LedgerRejectedEventPayload,
  LedgerResetEventPayload,
} from './events.js';

export { DEFAULT_TIER_LIMITS, TierPolicy, isSubscriptionTier } from './tiers.js';
export type { TierLimits } from './tiers.js';

export {
  ACTION_KINDS,
  DEFAULT_ACTION_COSTS,
  LONG_DRAFT_THRESHOLD_CHARS,
  buildCostTable,
  isActionKind,
  selectDraftAction,
  selectResearchAction,
} from './costs.js';
export type { ActionKind, CostTable } from './costs.js';

export { addMonths, nextResetAfter } from './calendar.js';
export { KeyedMutex } from './keyed-mutex.js';

export { CreditAuthority } from './authority.js';
export type { CreditAuthorityOptions } from './authority.js';

export { ActionGate } from './gate.js';
export type { ActionCompleted, ActionGateOptions, ActionOutcome, ActionRejected, ActionRequest } from './gate.js';

export { reconcileBalance } from './reconcile.js';
export type { CreditTotals, ReconciliationReport } from './reconcile.js';

export * from './storage/index.js';
export * from './telemetry/index.js';
