/**
 * @fileoverview StatsStore - rolling-window latency and error statistics
 *
 * @packageDocumentation
 * @module spanline/application/stats
 *
 * The window is a ring of `windowMs / bucketMs` time buckets. A bucket
 * is tagged with the epoch (bucket number since the Unix epoch) it was
 * created for; a slot holding an older epoch is stale and gets replaced the
 * next time that slot is written. Reads only look at buckets whose epoch
 * falls inside the trailing window, so expired samples never leak into a
 * summary even if their slot has not been reused yet.
 *
 * `record()` and `summary()` are synchronous, so a summary never observes a
 * half-applied record.
 */

import { nowNs, nsToMs, Clock } from '../../infrastructure/runtime';
import {
  parseOptions,
  StatsSettings,
  StatsSettingsInput,
  statsOptionsSchema,
} from '../../infrastructure/config';
import { ErrorItem, ErrorRing } from './ErrorRing';
import { LatencyHistogram } from './LatencyHistogram';

export interface StatsStoreOptions extends StatsSettingsInput {
  /** Nanosecond clock; defaults to {@link nowNs} */
  clock?: Clock;
}

/**
 * Error to record; `timestampNs` defaults to the store's clock.
 */
export type ErrorItemInput = Omit<ErrorItem, 'timestampNs'> & {
  timestampNs?: number;
};

/**
 * Aggregate over the trailing window. Durations are in nanoseconds.
 */
export interface StatsSummary {
  windowMs: number;
  count: number;
  errors: number;
  /** errors / count, 0 for an empty window */
  errorRate: number;
  /** Requests per second averaged over the whole window */
  rps: number;
  meanNs: number;
  minNs: number;
  maxNs: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
  /** Sample count per bucket for the latest buckets, oldest first */
  sparkline: number[];
}

interface TimeBucket {
  readonly epoch: number;
  count: number;
  errors: number;
  sumNs: number;
  minNs: number;
  maxNs: number;
  readonly histogram: LatencyHistogram;
}

function createBucket(epoch: number): TimeBucket {
  return {
    epoch,
    count: 0,
    errors: 0,
    sumNs: 0,
    minNs: Infinity,
    maxNs: -Infinity,
    histogram: new LatencyHistogram(),
  };
}

/**
 * Rolling-window statistics store.
 *
 * @example
 * ```typescript
 * const stats = new StatsStore({ windowMs: 60_000 });
 *
 * const start = nowNs();
 * try {
 *   await handle(req);
 *   stats.record(elapsedNs(start));
 * } catch (error) {
 *   stats.record(elapsedNs(start), true);
 *   stats.recordError({ route: req.url, status: 500, errorKind: 'Error', errorDetail: String(error) });
 * }
 *
 * stats.summary(); // { count, errorRate, p50, p99, ... }
 * ```
 */
export class StatsStore {
  readonly settings: Readonly<StatsSettings>;

  private readonly clock: Clock;
  private readonly slots: Array<TimeBucket | undefined>;
  private readonly errors: ErrorRing;

  constructor(options: StatsStoreOptions = {}) {
    this.settings = Object.freeze(parseOptions(statsOptionsSchema, options, 'stats'));
    this.clock = options.clock ?? nowNs;
    this.slots = new Array<TimeBucket | undefined>(
      this.settings.windowMs / this.settings.bucketMs,
    );
    this.errors = new ErrorRing(this.settings.errorCapacity);
  }

  /** Number of buckets in the window */
  get bucketCount(): number {
    return this.slots.length;
  }

  /**
   * Add one sample to the current bucket. Non-finite durations are ignored;
   * negative ones count as 0.
   */
  record(durationNs: number, error: boolean = false): void {
    if (!Number.isFinite(durationNs)) {
      return;
    }

    const epoch = this.currentEpoch();
    const slot = this.slotOf(epoch);
    let bucket = this.slots[slot];
    if (!bucket || bucket.epoch !== epoch) {
      bucket = createBucket(epoch);
      this.slots[slot] = bucket;
    }

    const value = Math.max(0, durationNs);
    bucket.count++;
    bucket.sumNs += value;
    if (value < bucket.minNs) bucket.minNs = value;
    if (value > bucket.maxNs) bucket.maxNs = value;
    if (error) bucket.errors++;
    bucket.histogram.record(value);
  }

  summary(): StatsSummary {
    const nowEpoch = this.currentEpoch();
    const oldest = nowEpoch - this.slots.length + 1;
    const merged = new LatencyHistogram();
    let count = 0;
    let errors = 0;
    let sumNs = 0;
    let minNs = Infinity;
    let maxNs = -Infinity;

    this.slots.forEach((bucket, slot) => {
      if (!bucket) {
        return;
      }
      if (bucket.epoch < oldest) {
        this.slots[slot] = undefined;
        return;
      }
      if (bucket.epoch > nowEpoch) {
        return;
      }

      count += bucket.count;
      errors += bucket.errors;
      sumNs += bucket.sumNs;
      minNs = Math.min(minNs, bucket.minNs);
      maxNs = Math.max(maxNs, bucket.maxNs);
      merged.merge(bucket.histogram);
    });

    const [p50, p90, p95, p99] = merged.percentiles([0.5, 0.9, 0.95, 0.99]);

    return {
      windowMs: this.settings.windowMs,
      count,
      errors,
      errorRate: count === 0 ? 0 : errors / count,
      rps: count / (this.settings.windowMs / 1000),
      meanNs: count === 0 ? 0 : sumNs / count,
      minNs: count === 0 ? 0 : minNs,
      maxNs: count === 0 ? 0 : maxNs,
      p50: p50 ?? 0,
      p90: p90 ?? 0,
      p95: p95 ?? 0,
      p99: p99 ?? 0,
      sparkline: this.sparkline(nowEpoch),
    };
  }

  recordError(item: ErrorItemInput): void {
    this.errors.push({
      ...item,
      timestampNs: item.timestampNs ?? this.clock(),
    });
  }

  /**
   * Recorded errors, most recent first.
   */
  recentErrors(limit?: number): ErrorItem[] {
    return this.errors.recent(limit);
  }

  reset(): void {
    this.slots.fill(undefined);
    this.errors.clear();
  }

  private sparkline(nowEpoch: number): number[] {
    const length = Math.min(this.settings.sparklineBuckets, this.slots.length);
    const counts: number[] = [];
    for (let epoch = nowEpoch - length + 1; epoch <= nowEpoch; epoch++) {
      const bucket = this.slots[this.slotOf(epoch)];
      counts.push(bucket && bucket.epoch === epoch ? bucket.count : 0);
    }
    return counts;
  }

  private currentEpoch(): number {
    return Math.floor(nsToMs(this.clock()) / this.settings.bucketMs);
  }

  private slotOf(epoch: number): number {
    const size = this.slots.length;
    return ((epoch % size) + size) % size;
  }
}
