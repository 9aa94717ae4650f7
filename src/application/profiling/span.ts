/**
 * spanline - Child Spans
 */

import { TraceScope } from '../../domain/context';
import { newSpanId, newTraceId } from '../../infrastructure/runtime';

/**
 * Ids of a span opened by {@link withSpan}.
 */
export interface SpanInfo {
  readonly traceId: string;
  readonly spanId: string;
  /** Span that was active when this one was opened */
  readonly parentSpanId?: string;
}

export interface SpanOptions {
  /** Trace to open the span in; defaults to the current trace, or a new one */
  traceId?: string;
}

/**
 * Run `callback` in a new child span. The previous ids are back in place
 * once the callback returns, throws or its promise settles.
 *
 * @example
 * ```typescript
 * await withSpan(async (span) => {
 *   emitter.emitLog('info', 'loading', { parent: span.parentSpanId ?? null });
 *   await load();
 * });
 * ```
 */
export function withSpan<R>(
  callback: (span: SpanInfo) => R,
  options: SpanOptions = {},
): R {
  const parent = TraceScope.currentFrame();
  const span: SpanInfo = {
    traceId: options.traceId ?? parent.traceId ?? newTraceId(),
    spanId: newSpanId(),
    ...(parent.spanId !== undefined && { parentSpanId: parent.spanId }),
  };

  return TraceScope.run({ traceId: span.traceId, spanId: span.spanId }, () =>
    callback(span),
  );
}
