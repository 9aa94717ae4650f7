/**
 * @fileoverview Shared test utilities
 */

import { Writable } from 'stream';
import { Clock } from '../src/infrastructure/runtime';

/**
 * Wait for a condition to be true with timeout
 *
 * @throws Error if timeout is reached
 *
 * @example
 * ```typescript
 * await waitFor(() => delivered.length === 3, 2000);
 * ```
 */
export async function waitFor(
  condition: () => boolean,
  timeout: number = 5000,
  interval: number = 5,
): Promise<void> {
  const startTime = Date.now();
  while (!condition()) {
    if (Date.now() - startTime > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await sleep(interval);
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Manually advanced nanosecond clock.
 */
export class FakeClock {
  constructor(private ns: number = 0) {}

  readonly now: Clock = () => this.ns;

  setMs(ms: number): void {
    this.ns = ms * 1_000_000;
  }

  advanceMs(ms: number): void {
    this.ns += ms * 1_000_000;
  }
}

/**
 * Writable that keeps everything written to it.
 */
export class MemoryStream extends Writable {
  readonly chunks: string[] = [];

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}
