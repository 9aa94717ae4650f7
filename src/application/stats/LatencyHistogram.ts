/**
 * spanline - Latency Histogram
 *
 * Sparse log-linear histogram of nanosecond durations. Values below 128 get
 * one bucket each. Every power-of-two range above that is split into 64
 * equal sub-buckets, and a value is reported as the midpoint of its
 * sub-bucket, so a reported percentile is within 1/128 of the recorded value.
 */

const LINEAR_LIMIT = 128;
const SUB_BUCKET_BITS = 6;
const SUB_BUCKETS = 1 << SUB_BUCKET_BITS;

function bitLength(value: number): number {
  let bits = Math.floor(Math.log2(value)) + 1;
  // log2 rounds near exact powers of two
  if (2 ** (bits - 1) > value) bits--;
  if (2 ** bits <= value) bits++;
  return bits;
}

/**
 * Bucket holding `value` (a non-negative integer).
 */
export function bucketIndex(value: number): number {
  if (value < LINEAR_LIMIT) {
    return value;
  }
  const shift = bitLength(value) - (SUB_BUCKET_BITS + 1);
  const mantissa = Math.floor(value / 2 ** shift);
  return LINEAR_LIMIT + (shift - 1) * SUB_BUCKETS + (mantissa - SUB_BUCKETS);
}

/**
 * Value reported for a bucket: exact below 128, sub-bucket midpoint above.
 */
export function bucketValue(index: number): number {
  if (index < LINEAR_LIMIT) {
    return index;
  }
  const offset = index - LINEAR_LIMIT;
  const shift = Math.floor(offset / SUB_BUCKETS) + 1;
  const mantissa = SUB_BUCKETS + (offset % SUB_BUCKETS);
  return mantissa * 2 ** shift + 2 ** (shift - 1);
}

/**
 * Latency histogram with nearest-rank percentiles.
 *
 * @example
 * ```typescript
 * const histogram = new LatencyHistogram();
 * for (let ns = 1; ns <= 100; ns++) histogram.record(ns);
 * histogram.percentile(0.5);  // 50
 * ```
 */
export class LatencyHistogram {
  private readonly counts = new Map<number, number>();
  private _count = 0;
  private _min = Infinity;
  private _max = -Infinity;

  get count(): number {
    return this._count;
  }

  /** Smallest recorded value, 0 when empty */
  get min(): number {
    return this._count === 0 ? 0 : this._min;
  }

  /** Largest recorded value, 0 when empty */
  get max(): number {
    return this._count === 0 ? 0 : this._max;
  }

  /**
   * Add one value; negatives count as 0, fractions are truncated.
   */
  record(valueNs: number): void {
    const value = Math.max(0, Math.floor(valueNs));
    const index = bucketIndex(value);
    this.counts.set(index, (this.counts.get(index) ?? 0) + 1);
    this._count++;
    if (value < this._min) this._min = value;
    if (value > this._max) this._max = value;
  }

  merge(other: LatencyHistogram): void {
    for (const [index, count] of other.counts) {
      this.counts.set(index, (this.counts.get(index) ?? 0) + count);
    }
    this._count += other._count;
    this._min = Math.min(this._min, other._min);
    this._max = Math.max(this._max, other._max);
  }

  /**
   * Nearest-rank percentile for `q` in [0, 1]; 0 when empty.
   */
  percentile(q: number): number {
    const [value] = this.percentiles([q]);
    return value ?? 0;
  }

  /**
   * Several percentiles in one pass over the buckets. Results follow the
   * order of `qs`.
   */
  percentiles(qs: readonly number[]): number[] {
    if (this._count === 0) {
      return qs.map(() => 0);
    }

    const ranks = qs.map((q) => {
      const clamped = Math.min(1, Math.max(0, q));
      return Math.max(1, Math.ceil(clamped * this._count - 1e-9));
    });
    const results = new Array<number>(qs.length).fill(this.max);
    const resolved = new Array<boolean>(qs.length).fill(false);

    const indices = Array.from(this.counts.keys()).sort((a, b) => a - b);
    let seen = 0;
    for (const index of indices) {
      seen += this.counts.get(index) ?? 0;
      ranks.forEach((rank, i) => {
        if (!resolved[i] && seen >= rank) {
          resolved[i] = true;
          results[i] = this.clampToRange(bucketValue(index));
        }
      });
    }

    return results;
  }

  reset(): void {
    this.counts.clear();
    this._count = 0;
    this._min = Infinity;
    this._max = -Infinity;
  }

  private clampToRange(value: number): number {
    return Math.min(this._max, Math.max(this._min, value));
  }
}
