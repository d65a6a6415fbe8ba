/**
 * Tracing helpers over the OpenTelemetry API.
 *
 * No SDK is started by the CLI, so spans are no-ops unless the host process
 * registers a tracer provider (e.g. via `node --import` of an OTel bootstrap).
 */
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'ecsrun';

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Wrap an async function in an OTel span.
 * Records errors on the span and sets its status before rethrowing.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
