// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { createLogger } from '../src/logger.js';
import type { LedgerDelta, TenantKey } from '../src/types.js';

export const silentLogger = createLogger({ level: 'silent' });

export const ALICE: TenantKey = { userId: 'user-alice', orgId: 'org-acme' };
export const BOB: TenantKey = { userId: 'user-bob', orgId: 'org-acme' };

/** Settable clock for components that take `now`. */
export class TestClock {
  #current: Date;

  constructor(iso: string) {
    this.#current = new Date(iso);
  }

  now = (): Date => new Date(this.#current.getTime());

  set(iso: string): void {
    this.#current = new Date(iso);
  }

  advance(ms: number): void {
    this.#current = new Date(this.#current.getTime() + ms);
  }
}

export function debit(tenant: TenantKey, amount: number, timestamp = '2026-03-10T12:00:00.000Z'): LedgerDelta {
  return {
    kind: 'debit',
    tenant,
    amount,
    actionType: 'email_classification',
    description: null,
    metadata: null,
    timestamp,
  };
}

export function credit(tenant: TenantKey, amount: number, timestamp = '2026-03-10T12:00:00.000Z'): LedgerDelta {
  return {
    kind: 'credit',
    tenant,
    amount,
    actionType: 'credit_added',
    description: 'top-up',
    metadata: null,
    timestamp,
    defaultTier: 'free',
    defaultResetAt: '2026-04-10T12:00:00.000Z',
  };
}

export function onboardDelta(
  tenant: TenantKey,
  allotment: number,
  nextResetAt = '2026-04-01T00:00:00.000Z',
  timestamp = '2026-03-01T00:00:00.000Z',
): LedgerDelta {
  return {
    kind: 'reset',
    mode: 'onboard',
    tenant,
    tier: 'free',
    allotment,
    nextResetAt,
    actionType: 'tier_onboarding',
    description: null,
    metadata: { tier: 'free' },
    timestamp,
  };
}
