import pino from 'pino';
import { trace } from '@opentelemetry/api';

// stdout belongs to container output; diagnostics go to stderr.
export const logger = pino(
  {
    name: 'ecsrun',
    level: process.env.LOG_LEVEL ?? 'info',
    mixin() {
      const span = trace.getActiveSpan();
      if (!span) return {};
      const ctx = span.spanContext();
      return {
        traceId: ctx.traceId,
        spanId: ctx.spanId,
      };
    },
  },
  pino.destination(2),
);
