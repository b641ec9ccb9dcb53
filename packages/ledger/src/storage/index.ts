// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { LedgerStore } from './adapter.js';
export { MemoryLedgerStore } from './memory.js';
export { SQLiteLedgerStore } from './sqlite.js';
export type { SQLiteLedgerStoreConfig } from './sqlite.js';
export { PostgresLedgerStore } from './postgres.js';
export type { PostgresClientLike, PostgresLedgerStoreConfig } from './postgres.js';
