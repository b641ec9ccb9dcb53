// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { FailureUpdate, ScheduleStore, SuccessUpdate } from './adapter.js';
export { RETRIES_EXHAUSTED } from './adapter.js';
export { MemoryScheduleStore } from './memory.js';
export { SQLiteScheduleStore } from './sqlite.js';
export type { SQLiteScheduleStoreConfig } from './sqlite.js';
