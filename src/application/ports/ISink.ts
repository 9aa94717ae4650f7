/**
 * spanline - Sink Port
 *
 * A sink is the destination of collector batches: a file, the console, a
 * network exporter, or a plain callback.
 */

/**
 * ISink - batch consumer contract
 *
 * @template T - Item type (usually `TelemetryEvent`)
 *
 * @remarks
 * - `write` receives each batch exactly once, in enqueue order. The array
 *   belongs to the sink from that point on.
 * - A failure is signalled by throwing or rejecting. The collector drops the
 *   batch and carries on; there is no retry.
 * - `write` must settle in bounded time. The collector treats a write that
 *   outlives its `writeTimeoutMs` as failed.
 *
 * @example
 * ```typescript
 * class HttpSink implements ISink<TelemetryEvent> {
 *   readonly name = 'http';
 *
 *   async write(batch: readonly TelemetryEvent[]): Promise<void> {
 *     const res = await fetch(url, { method: 'POST', body: JSON.stringify(batch) });
 *     if (!res.ok) throw new Error(`HTTP ${res.status}`);
 *   }
 * }
 * ```
 */
export interface ISink<T> {
  /** Name used in logs and errors */
  readonly name: string;

  write(batch: readonly T[]): void | Promise<void>;

  /** Release resources; called once by the collector after its final drain */
  close?(): void | Promise<void>;
}

/**
 * A bare function accepted wherever a sink is expected.
 */
export type SinkFunction<T> = (batch: readonly T[]) => void | Promise<void>;

/**
 * Normalize a sink or sink function into an {@link ISink}.
 */
export function toSink<T>(
  sink: ISink<T> | SinkFunction<T>,
  name: string = 'callback',
): ISink<T> {
  if (typeof sink === 'function') {
    return { name, write: sink };
  }
  return sink;
}
