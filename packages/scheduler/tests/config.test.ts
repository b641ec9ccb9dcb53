// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { InvalidConfigError } from '@creditcore/ledger';
import { describe, expect, it } from 'vitest';
import { parseSchedulerConfig, schedulerConfigFromEnv } from '../src/config.js';
import { createScheduleEntry } from '../src/types.js';

describe('parseSchedulerConfig', () => {
  it('fills defaults for an empty config', () => {
    expect(parseSchedulerConfig({})).toEqual({
      dueWindowMs: 300_000,
      cooldownMs: 82_800_000,
      dispatchTimeoutMs: 1_500_000,
      staleClaimMs: 1_800_000,
      defaultMaxRetries: 3,
      fetchLookbackMs: 86_400_000,
      fetchLimit: 100,
      digestMessageLimit: 50,
      cronTimezone: 'UTC',
      fetchCron: '*/5 * * * *',
      digestCron: '*/5 * * * *',
      followUpCron: '0 * * * *',
      resetCron: '0 * * * *',
    });
  });

  it('rejects invalid cron expressions, time zones and durations', () => {
    let caught: unknown;
    try {
      parseSchedulerConfig({ resetCron: 'monthly', cronTimezone: 'Mars/Base', dueWindowMs: 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidConfigError);
    if (caught instanceof InvalidConfigError) {
      expect(caught.details).toEqual(
        expect.arrayContaining([
          'resetCron: Invalid cron expression',
          'cronTimezone: Unknown IANA time zone',
        ]),
      );
      expect(caught.details.some((d) => d.startsWith('dueWindowMs:'))).toBe(true);
    }
  });
});

describe('schedulerConfigFromEnv', () => {
  it('maps CREDITCORE_* variables', () => {
    const config = schedulerConfigFromEnv({
      CREDITCORE_DUE_WINDOW_MS: '600000',
      CREDITCORE_MAX_RETRIES: '5',
      CREDITCORE_CRON_TIMEZONE: 'Europe/Berlin',
      CREDITCORE_RESET_CRON: '0 0 1 * *',
    });
    expect(config).toMatchObject({
      dueWindowMs: 600_000,
      defaultMaxRetries: 5,
      cronTimezone: 'Europe/Berlin',
      resetCron: '0 0 1 * *',
      cooldownMs: 82_800_000,
    });
  });

  it('rejects a non-numeric duration', () => {
    expect(() => schedulerConfigFromEnv({ CREDITCORE_COOLDOWN_MS: 'a day' })).toThrow(InvalidConfigError);
  });
});

describe('createScheduleEntry', () => {
  const options = { now: new Date('2026-03-01T00:00:00Z'), defaultMaxRetries: 3 };

  it('builds a pending entry with defaults', () => {
    const entry = createScheduleEntry(
      {
        id: 'digest-1',
        userId: 'user-alice',
        orgId: 'org-acme',
        ownerId: 'agent-1',
        task: { kind: 'digest', accountId: 'acct-alice', criteriaType: 'all' },
        trigger: { kind: 'daily', timeOfDay: '07:30' },
        recipient: 'alice@example.com',
      },
      options,
    );
    expect(entry).toEqual({
      id: 'digest-1',
      userId: 'user-alice',
      orgId: 'org-acme',
      ownerId: 'agent-1',
      task: { kind: 'digest', accountId: 'acct-alice', criteriaType: 'all' },
      trigger: { kind: 'daily', timeOfDay: '07:30', timezone: 'UTC' },
      recipient: 'alice@example.com',
      isActive: true,
      status: 'pending',
      lastRunAt: null,
      nextRunAt: null,
      retryCount: 0,
      maxRetries: 3,
      claimedAt: null,
      completedAt: null,
      cancelledAt: null,
      cancellationReason: null,
      lastError: null,
      createdAt: '2026-03-01T00:00:00.000Z',
      updatedAt: '2026-03-01T00:00:00.000Z',
    });
  });

  it('generates an id when none is given', () => {
    const entry = createScheduleEntry(
      {
        userId: 'user-alice',
        orgId: 'org-acme',
        ownerId: 'acct-alice',
        task: { kind: 'follow_up', emailId: 'email-1', followUpType: 'reminder' },
        trigger: { kind: 'once', at: '2026-03-10T09:00:00.000Z' },
        recipient: 'bob@example.com',
      },
      options,
    );
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects a malformed time of day', () => {
    expect(() =>
      createScheduleEntry(
        {
          userId: 'user-alice',
          orgId: 'org-acme',
          ownerId: 'agent-1',
          task: { kind: 'digest', accountId: 'acct-alice', criteriaType: 'all' },
          trigger: { kind: 'daily', timeOfDay: '7:30' },
          recipient: 'alice@example.com',
        },
        options,
      ),
    ).toThrow(InvalidConfigError);
  });
});
