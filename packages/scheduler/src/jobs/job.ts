// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type JobSummary = Readonly<Record<string, number>>;

/** A periodic job.  `run` takes the tick time and must not read the wall clock itself. */
export interface ScheduledJob {
  readonly name: string;
  readonly cronExpression: string;
  run(now: Date): Promise<JobSummary>;
}
