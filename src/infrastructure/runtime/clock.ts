/**
 * spanline - Clock
 *
 * Epoch-anchored monotonic nanosecond timestamps. The wall clock is read once
 * at load; after that time advances with `process.hrtime`, so timestamps
 * never go backwards when the system clock is adjusted.
 *
 * Values are plain numbers. Near the current epoch a double resolves about
 * 256 ns, so callers must not rely on sub-microsecond precision.
 */

/**
 * Source of nanosecond timestamps. Injected where tests need a fake clock.
 */
export type Clock = () => number;

const NS_PER_MS = 1_000_000;

const EPOCH_ANCHOR_NS =
  BigInt(Date.now()) * BigInt(NS_PER_MS) - process.hrtime.bigint();

/**
 * Current time in nanoseconds since the Unix epoch.
 */
export const nowNs: Clock = () =>
  Number(EPOCH_ANCHOR_NS + process.hrtime.bigint());

/**
 * Nanoseconds elapsed since `startNs` (never negative).
 */
export function elapsedNs(startNs: number, clock: Clock = nowNs): number {
  return Math.max(0, clock() - startNs);
}

export function nsToMs(ns: number): number {
  return ns / NS_PER_MS;
}

export function msToNs(ms: number): number {
  return ms * NS_PER_MS;
}
