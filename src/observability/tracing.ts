/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for DEP API requests and session handshakes. No-op unless the host
 * application registers a tracer provider and sets OTEL_ENABLED=1.
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';

const TRACER_NAME = 'dep-client';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for a DEP API request
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  depName: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`DEP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'dep.name': depName,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for a session handshake
 */
export async function withSessionSpan<T>(
  depName: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('DEP session', fn, {
    'dep.name': depName,
  });
}
