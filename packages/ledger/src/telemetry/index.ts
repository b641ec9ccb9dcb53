// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { LedgerTracer, tracerFromGlobal } from './otel.js';
export type {
  LedgerTracerConfig,
  OTelSpanLike,
  OTelTracerLike,
  SpanAttributes,
  SpanAttributeValue,
} from './otel.js';
