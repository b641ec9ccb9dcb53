// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { SubscriptionTier, Timestamp } from './types.js';

// ---------------------------------------------------------------------------
// TypedEventEmitter
// ---------------------------------------------------------------------------

/** Listener for one event of a payload map. */
export type EventListener<P> = (payload: P) => void;

interface ListenerEntry<P> {
  readonly listener: EventListener<P>;
  readonly once: boolean;
}

type ListenerRegistry<M> = { [E in keyof M]?: Array<ListenerEntry<M[E]>> };

/**
 * Typed publish-subscribe emitter.  `M` maps event names to payload types.
 *
 * Listeners run synchronously in registration order.  A listener that throws
 * propagates to the emitter's caller, so keep listeners cheap and total.
 */
export class TypedEventEmitter<M extends object> {
  #listeners: ListenerRegistry<M> = {};

  /** Registers a persistent listener. */
  on<E extends keyof M>(event: E, listener: EventListener<M[E]>): this {
    this.#add(event, { listener, once: false });
    return this;
  }

  /** Registers a listener that is removed after its first call. */
  once<E extends keyof M>(event: E, listener: EventListener<M[E]>): this {
    this.#add(event, { listener, once: true });
    return this;
  }

  /** Removes the first registration of `listener` for `event`. */
  off<E extends keyof M>(event: E, listener: EventListener<M[E]>): this {
    const entries = this.#listeners[event];
    if (entries === undefined) return this;

    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) entries.splice(index, 1);
    if (entries.length === 0) delete this.#listeners[event];
    return this;
  }

  /**
   * Invokes every listener for `event`.
   *
   * Once-listeners are removed before any listener runs, so a listener that
   * re-emits the same event cannot fire them twice.
   *
   * @returns true when at least one listener ran.
   */
  emit<E extends keyof M>(event: E, payload: M[E]): boolean {
    const entries = this.#listeners[event];
    if (entries === undefined || entries.length === 0) return false;

    const snapshot = [...entries];
    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length === 0) {
      delete this.#listeners[event];
    } else if (remaining.length !== entries.length) {
      this.#listeners[event] = remaining;
    }

    for (const { listener } of snapshot) {
      listener(payload);
    }
    return true;
  }

  /** Removes all listeners for `event`, or for every event when omitted. */
  removeAllListeners(event?: keyof M): this {
    if (event === undefined) {
      this.#listeners = {};
    } else {
      delete this.#listeners[event];
    }
    return this;
  }

  listenerCount(event: keyof M): number {
    return this.#listeners[event]?.length ?? 0;
  }

  #add<E extends keyof M>(event: E, entry: ListenerEntry<M[E]>): void {
    const entries = this.#listeners[event];
    if (entries === undefined) {
      this.#listeners[event] = [entry];
    } else {
      entries.push(entry);
    }
  }
}

// ---------------------------------------------------------------------------
// Ledger events
// ---------------------------------------------------------------------------

/** Emitted after a debit was applied. */
export const EVENT_DEBITED = 'ledger:debited' as const;

/** Emitted when a debit was refused for insufficient credits. */
export const EVENT_REJECTED = 'ledger:rejected' as const;

/** Emitted after a grant was applied. */
export const EVENT_CREDITED = 'ledger:credited' as const;

/** Emitted after a monthly reset or an onboarding wrote a fresh allotment. */
export const EVENT_RESET = 'ledger:reset' as const;

/** Emitted when a debit takes available credits to or below the low-balance threshold. */
export const EVENT_LOW_BALANCE = 'ledger:low_balance' as const;

export interface LedgerDebitedEventPayload {
  readonly userId: string;
  readonly orgId: string;
  readonly actionType: string;
  readonly amount: number;
  readonly availableCredits: number;
  readonly transactionId: string;
  readonly timestamp: Timestamp;
}

export interface LedgerRejectedEventPayload {
  readonly userId: string;
  readonly orgId: string;
  readonly actionType: string;
  readonly requested: number;
  readonly available: number;
  readonly timestamp: Timestamp;
}

export interface LedgerCreditedEventPayload {
  readonly userId: string;
  readonly orgId: string;
  readonly amount: number;
  readonly availableCredits: number;
  readonly transactionId: string;
  readonly timestamp: Timestamp;
}

export interface LedgerResetEventPayload {
  readonly userId: string;
  readonly orgId: string;
  readonly mode: 'reset' | 'onboard';
  readonly tier: SubscriptionTier;
  readonly totalCredits: number;
  /** Unspent credits discarded by the reset.  Zero for onboarding. */
  readonly forfeited: number;
  readonly nextResetAt: Timestamp;
  readonly timestamp: Timestamp;
}

export interface LedgerLowBalanceEventPayload {
  readonly userId: string;
  readonly orgId: string;
  readonly availableCredits: number;
  readonly totalCredits: number;
  /** Remaining share of the cycle total, 0-100. */
  readonly percentRemaining: number;
  readonly timestamp: Timestamp;
}

export interface LedgerEventPayloadMap {
  [EVENT_DEBITED]: LedgerDebitedEventPayload;
  [EVENT_REJECTED]: LedgerRejectedEventPayload;
  [EVENT_CREDITED]: LedgerCreditedEventPayload;
  [EVENT_RESET]: LedgerResetEventPayload;
  [EVENT_LOW_BALANCE]: LedgerLowBalanceEventPayload;
}

export type LedgerEventName = keyof LedgerEventPayloadMap;

export class LedgerEventEmitter extends TypedEventEmitter<LedgerEventPayloadMap> {}
