// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ScheduleDispatcher } from '../dispatcher.js';
import type { TaskKind } from '../types.js';
import type { JobSummary, ScheduledJob } from './job.js';

export const DISPATCH_DIGESTS = 'dispatch-digests';
export const PROCESS_FOLLOW_UPS = 'process-follow-ups';

/** Dispatches every due entry of one task kind. */
export class DispatchSchedulesJob implements ScheduledJob {
  readonly name: string;
  readonly cronExpression: string;
  readonly #dispatcher: ScheduleDispatcher;
  readonly #kind: TaskKind;

  constructor(options: { name: string; kind: TaskKind; cronExpression: string; dispatcher: ScheduleDispatcher }) {
    this.name = options.name;
    this.cronExpression = options.cronExpression;
    this.#kind = options.kind;
    this.#dispatcher = options.dispatcher;
  }

  run(now: Date): Promise<JobSummary> {
    return this.#dispatcher.dispatchDue(this.#kind, now);
  }
}
