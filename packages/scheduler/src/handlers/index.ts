// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { TaskContext, TaskHandler, TaskHandlers, TaskOf, TaskRunReport } from './handler.js';
export { DigestTaskHandler } from './digest.js';
export type { DigestTaskHandlerOptions } from './digest.js';
export { FollowUpTaskHandler } from './follow-up.js';
export type { FollowUpTaskHandlerOptions } from './follow-up.js';
