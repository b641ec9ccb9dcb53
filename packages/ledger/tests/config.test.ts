// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, expect, it } from 'vitest';
import { ledgerConfigFromEnv, parseLedgerConfig } from '../src/config.js';
import { InvalidConfigError } from '../src/errors.js';

describe('parseLedgerConfig', () => {
  it('fills defaults for an empty config', () => {
    expect(parseLedgerConfig({})).toEqual({
      lowBalancePercent: 10,
      serializePerTenant: true,
      writeRetryDelaysMs: [10, 50, 200],
    });
  });

  it('accepts partial cost and tier overrides', () => {
    const config = parseLedgerConfig({
      costs: { email_draft_long: 8 },
      tiers: { pro: { monthlyCredits: 6_000 } },
    });
    expect(config.costs).toEqual({ email_draft_long: 8 });
    expect(config.tiers).toEqual({ pro: { monthlyCredits: 6_000 } });
  });

  it('lists every problem in InvalidConfigError.details', () => {
    let caught: unknown;
    try {
      parseLedgerConfig({ costs: { email_classification: 0, teleport: 3 }, lowBalancePercent: 150 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidConfigError);
    if (caught instanceof InvalidConfigError) {
      expect(caught.code).toBe('INVALID_CONFIG');
      expect(caught.details).toHaveLength(3);
      expect(caught.details.some((d) => d.startsWith('costs.email_classification:'))).toBe(true);
      expect(caught.details.some((d) => d.startsWith('lowBalancePercent:'))).toBe(true);
    }
  });
});

describe('ledgerConfigFromEnv', () => {
  it('maps CREDITCORE_* variables onto the config', () => {
    const config = ledgerConfigFromEnv({
      CREDITCORE_LOW_BALANCE_PERCENT: '20',
      CREDITCORE_SERIALIZE_PER_TENANT: 'false',
      CREDITCORE_COST_WORKFLOW_EXECUTION: '1',
      CREDITCORE_TIER_BUSINESS_CREDITS: '40000',
    });
    expect(config.lowBalancePercent).toBe(20);
    expect(config.serializePerTenant).toBe(false);
    expect(config.costs).toEqual({ workflow_execution: 1 });
    expect(config.tiers).toEqual({ business: { monthlyCredits: 40_000 } });
  });

  it('rejects a non-numeric cost', () => {
    expect(() => ledgerConfigFromEnv({ CREDITCORE_COST_FOLLOW_UP_SEND: 'cheap' })).toThrow(InvalidConfigError);
  });
});
