/**
 * spanline - Exceptions
 *
 * Error types raised by the pipeline. Only misconfiguration ever reaches a
 * caller as a thrown exception; sink failures are caught by the collector and
 * surfaced through its logger and `onSinkError` callback.
 */

/**
 * Stable error codes carried by every {@link SpanlineException}.
 */
export type SpanlineErrorCode =
  | 'CONFIGURATION_INVALID'
  | 'SINK_WRITE_FAILED'
  | 'SINK_TIMEOUT';

/**
 * Base exception class
 */
export class SpanlineException extends Error {
  constructor(
    public readonly code: SpanlineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SpanlineException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid construction parameters (non-positive capacities, out-of-range
 * rates, ...). Thrown from constructors, never at runtime.
 *
 * @example
 * ```typescript
 * try {
 *   new AsyncCollector(sink, { queueSize: 0 });
 * } catch (error) {
 *   if (error instanceof ConfigurationException) {
 *     console.error(error.errors); // { queueSize: ['Number must be greater than 0'] }
 *   }
 * }
 * ```
 */
export class ConfigurationException extends SpanlineException {
  constructor(
    message: string = 'Invalid configuration',
    public readonly errors: Record<string, string[]> = {},
  ) {
    super('CONFIGURATION_INVALID', message, { errors });
    this.name = 'ConfigurationException';
  }
}

/**
 * A sink rejected or threw while writing a batch. The batch is dropped.
 */
export class SinkWriteException extends SpanlineException {
  constructor(
    public readonly sinkName: string,
    public readonly batchSize: number,
    cause: unknown,
  ) {
    super(
      'SINK_WRITE_FAILED',
      `Sink "${sinkName}" failed to write a batch of ${batchSize}: ${describeCause(cause)}`,
      { sinkName, batchSize },
      { cause },
    );
    this.name = 'SinkWriteException';
  }
}

/**
 * A sink did not settle within the collector's write timeout.
 */
export class SinkTimeoutException extends SpanlineException {
  constructor(
    public readonly sinkName: string,
    public readonly timeoutMs: number,
  ) {
    super(
      'SINK_TIMEOUT',
      `Sink "${sinkName}" did not complete a write within ${timeoutMs}ms`,
      { sinkName, timeoutMs },
    );
    this.name = 'SinkTimeoutException';
  }
}

/**
 * Normalize any thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
