// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ActionKind } from '@creditcore/ledger';
import type { ScheduleEntry, ScheduleTask, TaskKind } from '../types.js';

export interface TaskContext {
  /** Tick time the dispatch runs for. */
  readonly now: Date;
  /** Aborted when the dispatch timeout fires. */
  readonly signal: AbortSignal;
}

export interface TaskRunReport {
  /** Whether a message went out. */
  readonly delivered: boolean;
  /** Messages the task looked at. */
  readonly messages: number;
}

export type TaskOf<K extends TaskKind> = Extract<ScheduleTask, { kind: K }>;

/**
 * Runs one kind of scheduled task.  A handler that declares `action` is
 * charged through the Action Gate before it runs; one without runs free.
 * Throwing marks the dispatch failed.
 */
export interface TaskHandler<K extends TaskKind> {
  readonly kind: K;
  readonly action?: ActionKind;
  run(task: TaskOf<K>, entry: ScheduleEntry, context: TaskContext): Promise<TaskRunReport>;
}

export interface TaskHandlers {
  readonly digest: TaskHandler<'digest'>;
  readonly follow_up: TaskHandler<'follow_up'>;
}
