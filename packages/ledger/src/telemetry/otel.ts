// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SpanStatusCode, trace } from '@opentelemetry/api';

export type SpanAttributeValue = string | number | boolean;
export type SpanAttributes = Record<string, SpanAttributeValue>;

/**
 * Minimal span contract.  Spans from `@opentelemetry/api` tracers satisfy it,
 * and tests can record calls with a plain object.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: SpanAttributeValue): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: SpanAttributes): this;
  end(): void;
}

export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: SpanAttributes }): OTelSpanLike;
}

export interface LedgerTracerConfig {
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans.  Defaults to "creditcore". */
  serviceName?: string;
}

/**
 * LedgerTracer wraps ledger operations in spans.
 *
 * Span names are `creditcore.ledger.<operation>`.  Attributes describing the
 * outcome (applied, rejected, balances) are added by the `describe` callback
 * once the operation settles.
 *
 * ```typescript
 * const authority = new CreditAuthority({
 *   store,
 *   tracer: new LedgerTracer({ tracer: tracerFromGlobal() }),
 * });
 * ```
 */
export class LedgerTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: LedgerTracerConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'creditcore';
  }

  async traceOperation<T>(
    operation: string,
    attributes: SpanAttributes,
    run: () => Promise<T>,
    describe?: (result: T) => SpanAttributes,
  ): Promise<T> {
    const span = this.#tracer.startSpan(`creditcore.ledger.${operation}`, {
      attributes: {
        'service.name': this.#serviceName,
        'creditcore.operation': operation,
        ...attributes,
      },
    });

    try {
      const result = await run();
      if (describe !== undefined) {
        for (const [key, value] of Object.entries(describe(result))) {
          span.setAttribute(key, value);
        }
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.addEvent('creditcore.error', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }
}

/** Tracer from the globally registered OpenTelemetry provider (a no-op when none is set). */
export function tracerFromGlobal(name = 'creditcore', version?: string): OTelTracerLike {
  return trace.getTracer(name, version);
}
