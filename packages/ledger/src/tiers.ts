// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SUBSCRIPTION_TIERS } from './types.js';
import type { SubscriptionTier } from './types.js';

/**
 * Allotments and plan limits for one subscription tier.  Only
 * `monthlyCredits` is applied here; the count limits are published for the
 * host application to enforce.
 */
export interface TierLimits {
  readonly monthlyCredits: number;
  readonly maxWorkflows: number;
  readonly maxFollowUps: number;
}

/** Built-in tier table. */
export const DEFAULT_TIER_LIMITS: Readonly<Record<SubscriptionTier, TierLimits>> = {
  free: { monthlyCredits: 400, maxWorkflows: 3, maxFollowUps: 10 },
  pro: { monthlyCredits: 5_000, maxWorkflows: 50, maxFollowUps: 100 },
  business: { monthlyCredits: 30_000, maxWorkflows: 500, maxFollowUps: 1_000 },
};

export function isSubscriptionTier(value: unknown): value is SubscriptionTier {
  return SUBSCRIPTION_TIERS.some((tier) => tier === value);
}

function mergeLimits(base: TierLimits, override: Partial<TierLimits> = {}): TierLimits {
  return {
    monthlyCredits: override.monthlyCredits ?? base.monthlyCredits,
    maxWorkflows: override.maxWorkflows ?? base.maxWorkflows,
    maxFollowUps: override.maxFollowUps ?? base.maxFollowUps,
  };
}

/**
 * TierPolicy is a static lookup from subscription tier to monthly allotment.
 *
 * Overrides are applied once at construction.  Nothing mutates the table
 * afterwards, so a changed allotment only reaches a tenant at its next reset.
 */
export class TierPolicy {
  readonly #limits: Readonly<Record<SubscriptionTier, TierLimits>>;

  constructor(overrides: Partial<Record<SubscriptionTier, Partial<TierLimits>>> = {}) {
    this.#limits = {
      free: mergeLimits(DEFAULT_TIER_LIMITS.free, overrides.free),
      pro: mergeLimits(DEFAULT_TIER_LIMITS.pro, overrides.pro),
      business: mergeLimits(DEFAULT_TIER_LIMITS.business, overrides.business),
    };
  }

  /**
   * Returns the full limits record for a tier.
   *
   * Throws RangeError for a value that is not a known tier, which guards
   * rows written by older schema versions.
   */
  tierLimits(tier: string): TierLimits {
    if (!isSubscriptionTier(tier)) {
      throw new RangeError(`Unknown subscription tier "${tier}".`);
    }
    return this.#limits[tier];
  }

  monthlyCredits(tier: string): number {
    return this.tierLimits(tier).monthlyCredits;
  }

  tiers(): readonly SubscriptionTier[] {
    return SUBSCRIPTION_TIERS;
  }
}
