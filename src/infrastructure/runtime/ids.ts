/**
 * spanline - ID Generation
 *
 * Span ids are 64-bit values rendered as 16 lowercase hex digits; trace ids
 * are 128-bit values rendered as 32. Neither is ever all zeros.
 *
 * Generation uses splitmix64, a fast non-cryptographic PRNG. Its state is
 * module-local, and every worker thread loads its own copy of the module, so
 * each thread has an independent generator and no synchronization is needed.
 * The seed comes from `crypto.randomBytes` at load time. splitmix64 walks a
 * full-period counter through a bijective mixer, so a generator cannot repeat
 * a value before 2^64 draws.
 */

import { randomBytes } from 'crypto';

const MASK_64 = (BigInt(1) << BigInt(64)) - BigInt(1);
const GOLDEN_GAMMA = BigInt('0x9e3779b97f4a7c15');
const MIX_1 = BigInt('0xbf58476d1ce4e5b9');
const MIX_2 = BigInt('0x94d049bb133111eb');
const ZERO = BigInt(0);

const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/;
const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/;

let state = randomBytes(8).readBigUInt64BE(0);

function nextUint64(): bigint {
  state = (state + GOLDEN_GAMMA) & MASK_64;
  let z = state;
  z = ((z ^ (z >> BigInt(30))) * MIX_1) & MASK_64;
  z = ((z ^ (z >> BigInt(27))) * MIX_2) & MASK_64;
  return z ^ (z >> BigInt(31));
}

function nextNonZero(): bigint {
  let value = nextUint64();
  while (value === ZERO) {
    value = nextUint64();
  }
  return value;
}

function toHex64(value: bigint): string {
  return value.toString(16).padStart(16, '0');
}

/**
 * Generate a span id.
 *
 * @example
 * ```typescript
 * newSpanId(); // '9f3c04b1d27a6e58'
 * ```
 */
export function newSpanId(): string {
  return toHex64(nextNonZero());
}

/**
 * Generate a trace id. The high half is never zero, so neither is the id.
 */
export function newTraceId(): string {
  return toHex64(nextNonZero()) + toHex64(nextUint64());
}

/**
 * Reseed this thread's generator. Intended for deterministic tests.
 */
export function seedIdGenerator(seed: bigint): void {
  state = seed & MASK_64;
}

export function isValidSpanId(id: string): boolean {
  return SPAN_ID_PATTERN.test(id) && !/^0+$/.test(id);
}

export function isValidTraceId(id: string): boolean {
  return TRACE_ID_PATTERN.test(id) && !/^0+$/.test(id);
}
