/**
 * OpenTelemetry Integration
 *
 * Spans for request dispatch through @opentelemetry/api. Without a
 * registered SDK, or with OTEL_ENABLED unset, spans are no-ops.
 *
 * @module
 */

import {
  trace,
  context,
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';
import { extractErrorMessage } from '../http/errors.ts';

export const TRACER_NAME = 'brisk';

/**
 * Check if tracing is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

let tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  tracer ??= trace.getTracer(TRACER_NAME);
  return tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Attributes describing one dispatched request
 */
export function requestAttributes(method: string, route: string, target: string): Attributes {
  return {
    'http.method': method,
    'http.route': route,
    'http.target': target,
  };
}

/**
 * Run fn inside a new active span, ended when fn settles. A failure is
 * recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    return fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  const spanOptions = { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes };

  return getOTELTracer().startActiveSpan(name, spanOptions, context.active(), async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : extractErrorMessage(error));
      span.setStatus({ code: SpanStatusCode.ERROR, message: extractErrorMessage(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
