/**
 * OpenTelemetry helpers shared by services and workers.
 */

import {
  isSpanContextValid,
  trace,
  context as otelContext,
  SpanStatusCode,
  type Attributes,
  type Span,
} from '@opentelemetry/api';

export const TRACER_NAME = 'shopsense';

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
}>;

/** Ids of the active span; both undefined outside a sampled or propagated trace. */
export function getTraceContext(): TraceContext {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return { traceId: undefined, spanId: undefined };
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

/**
 * Runs `fn` inside a new active span. Errors are recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = trace.getTracer(TRACER_NAME).startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    span.recordException(error instanceof Error ? error : String(error));
    throw error;
  } finally {
    span.end();
  }
}

export function setRequestIdAttribute(requestId: string): void {
  trace.getActiveSpan()?.setAttribute('http.request_id', requestId);
}
