/**
 * @fileoverview AsyncCollector - non-blocking batching front of a sink
 *
 * @packageDocumentation
 * @module spanline/application/collector
 *
 * Producers call `enqueue()`, which never waits: the item goes into a bounded
 * drop-oldest queue and control returns immediately. A background flush loop
 * hands the queue to the sink in batches:
 *
 * - as soon as `batchMax` items are waiting, or
 * - once `flushIntervalMs` has passed since the first item of a partial batch
 *   was enqueued, or
 * - on `flush()` / `close()`.
 *
 * Only one sink write is in flight at a time, so the sink sees batches in
 * enqueue order. A failing sink loses the batch it was given and nothing
 * else; the loop keeps running.
 */

import { performance } from 'perf_hooks';
import {
  SinkTimeoutException,
  SinkWriteException,
  SpanlineException,
  toError,
} from '../../domain/exceptions';
import {
  CollectorSettings,
  CollectorSettingsInput,
  collectorOptionsSchema,
  parseOptions,
} from '../../infrastructure/config';
import { BackgroundServiceBase } from '../host/background';
import { createLogger, ILogger } from '../host/logger';
import { ISink, SinkFunction, toSink } from '../ports';
import { BoundedQueue } from './BoundedQueue';

/**
 * Called with the failure and the batch that was dropped because of it.
 */
export type SinkErrorHandler<T> = (
  error: SpanlineException,
  batch: readonly T[],
) => void;

export interface CollectorOptions<T> extends CollectorSettingsInput {
  logger?: ILogger;
  onSinkError?: SinkErrorHandler<T>;
}

/**
 * Collector health counters.
 */
export interface CollectorStats {
  /** Items accepted by `enqueue()` */
  enqueued: number;
  /** Items handed to a sink write that succeeded */
  delivered: number;
  /** Items evicted by drop-oldest overflow */
  dropped: number;
  /** `enqueue()` calls ignored because the collector was closing */
  rejectedAfterClose: number;
  /** Sink writes that threw, rejected or timed out */
  failedBatches: number;
  /** Items lost in failed writes */
  lostToSinkFailure: number;
  /** Items currently waiting */
  queueDepth: number;
  capacity: number;
}

/**
 * Bounded, batching, non-blocking collector in front of one sink.
 *
 * @template T - Item type
 *
 * @example
 * ```typescript
 * const collector = new AsyncCollector<TelemetryEvent>(
 *   new JsonlFileSink({ directory: './telemetry' }),
 *   { queueSize: 4096, batchMax: 256, flushIntervalMs: 200 },
 * );
 *
 * collector.enqueue(event);   // returns immediately
 * await collector.close();    // everything queued so far reaches the sink
 * ```
 */
export class AsyncCollector<T extends NonNullable<unknown>> extends BackgroundServiceBase {
  readonly name: string;
  readonly settings: Readonly<CollectorSettings>;

  private readonly sink: ISink<T>;
  private readonly queue: BoundedQueue<T>;
  private readonly batchThreshold: number;
  private readonly onSinkError?: SinkErrorHandler<T>;
  private readonly counters = {
    enqueued: 0,
    delivered: 0,
    dropped: 0,
    rejectedAfterClose: 0,
    failedBatches: 0,
    lostToSinkFailure: 0,
  };

  /** When the oldest item of the pending partial batch was enqueued */
  private batchOpenedAt: number | null = null;
  private overflowing = false;
  private closed = false;
  private closing: Promise<void> | null = null;
  private writeTail: Promise<void> = Promise.resolve();
  /** Settles with the sink's current write, including one that timed out */
  private inFlight: Promise<void> | null = null;
  private readonly exitHook = (): void => {
    void this.close();
  };

  constructor(sink: ISink<T> | SinkFunction<T>, options: CollectorOptions<T> = {}) {
    const settings = parseOptions(collectorOptionsSchema, options, 'collector');
    const logger = (options.logger ?? createLogger()).child({ component: settings.name });
    super(logger);

    this.name = settings.name;
    this.settings = Object.freeze(settings);
    this.sink = toSink(sink);
    this.queue = new BoundedQueue<T>(settings.queueSize);
    this.batchThreshold = Math.min(settings.batchMax, settings.queueSize);
    this.onSinkError = options.onSinkError;

    if (settings.flushOnExit) {
      process.once('beforeExit', this.exitHook);
    }

    void this.start();
  }

  /**
   * Queue an item. Never blocks and never throws.
   *
   * A full queue evicts its oldest item. After `close()` has been called the
   * item is ignored.
   */
  enqueue(item: T): void {
    if (this.closed) {
      this.counters.rejectedAfterClose++;
      return;
    }

    this.counters.enqueued++;
    if (this.queue.push(item)) {
      this.counters.dropped++;
      if (!this.overflowing) {
        this.overflowing = true;
        this.logger.debug('Queue full, evicting oldest items', {
          capacity: this.queue.capacity,
        });
      }
    }

    this.batchOpenedAt ??= performance.now();
    if (this.queue.size >= this.batchThreshold) {
      this.wake();
    }
  }

  /**
   * Deliver everything queued right now, in batches of at most `batchMax`.
   */
  flush(): Promise<void> {
    return this.exclusive(() => this.drain());
  }

  /**
   * Stop the flush loop, deliver every remaining item, then close the sink.
   * Calling it again returns the same promise.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  isClosed(): boolean {
    return this.closed;
  }

  stats(): CollectorStats {
    return {
      ...this.counters,
      queueDepth: this.queue.size,
      capacity: this.queue.capacity,
    };
  }

  protected async executeAsync(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.delay(this.nextWaitMs(), signal);
      if (signal.aborted) {
        break;
      }
      await this.exclusive(() => this.deliverReady());
    }
  }

  private nextWaitMs(): number {
    if (this.queue.size >= this.batchThreshold) {
      return 0;
    }
    if (this.batchOpenedAt === null) {
      return this.settings.flushIntervalMs;
    }
    const due = this.batchOpenedAt + this.settings.flushIntervalMs;
    return Math.max(0, due - performance.now());
  }

  /**
   * Full batches first, then the partial batch if its deadline has passed.
   */
  private async deliverReady(): Promise<void> {
    while (this.queue.size >= this.batchThreshold) {
      await this.write(this.takeBatch());
    }

    const openedAt = this.batchOpenedAt;
    if (
      !this.queue.isEmpty() &&
      openedAt !== null &&
      performance.now() >= openedAt + this.settings.flushIntervalMs
    ) {
      await this.write(this.takeBatch());
    }
  }

  private async drain(): Promise<void> {
    while (!this.queue.isEmpty()) {
      await this.write(this.takeBatch());
    }
  }

  private takeBatch(): T[] {
    const batch = this.queue.take(this.settings.batchMax);
    this.overflowing = false;
    // Leftovers start a new partial batch with its own deadline.
    this.batchOpenedAt = this.queue.isEmpty() ? null : performance.now();
    return batch;
  }

  /**
   * Run `task` after every earlier write task has settled.
   */
  private exclusive(task: () => Promise<void>): Promise<void> {
    const next = this.writeTail.then(task);
    this.writeTail = next;
    return next;
  }

  /**
   * Hand one batch to the sink. A write that timed out still holds the sink:
   * the next batch waits for it (bounded by `writeTimeoutMs`) and is dropped
   * as timed out if it has not settled by then.
   */
  private async write(batch: T[]): Promise<void> {
    if (batch.length === 0) {
      return;
    }

    try {
      if (this.inFlight) {
        await this.withinTimeout(this.inFlight);
      }

      const attempt = Promise.resolve().then(() => this.sink.write(batch));
      const settled = attempt.then(
        () => undefined,
        () => undefined,
      );
      this.inFlight = settled;
      void settled.then(() => {
        if (this.inFlight === settled) {
          this.inFlight = null;
        }
      });

      await this.withinTimeout(attempt);
      this.counters.delivered += batch.length;
    } catch (error) {
      this.handleSinkFailure(error, batch);
    }
  }

  private async withinTimeout<R>(promise: Promise<R>): Promise<R> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      const handle = setTimeout(
        () => reject(new SinkTimeoutException(this.sink.name, this.settings.writeTimeoutMs)),
        this.settings.writeTimeoutMs,
      );
      handle.unref();
      timer = handle;
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private handleSinkFailure(error: unknown, batch: readonly T[]): void {
    const failure =
      error instanceof SinkTimeoutException
        ? error
        : new SinkWriteException(this.sink.name, batch.length, error);

    this.counters.failedBatches++;
    this.counters.lostToSinkFailure += batch.length;
    this.logger.warn('Sink write failed, batch dropped', {
      sink: this.sink.name,
      batchSize: batch.length,
      code: failure.code,
      error: failure.message,
    });

    if (!this.onSinkError) {
      return;
    }
    try {
      this.onSinkError(failure, batch);
    } catch (callbackError) {
      this.logger.error('onSinkError callback threw', {
        error: toError(callbackError).message,
      });
    }
  }

  private async shutdown(): Promise<void> {
    this.closed = true;
    process.removeListener('beforeExit', this.exitHook);

    await this.stop();
    await this.flush();

    if (this.inFlight) {
      try {
        await this.withinTimeout(this.inFlight);
      } catch (error) {
        this.logger.warn('Closing sink with a write still pending', {
          sink: this.sink.name,
          error: toError(error).message,
        });
      }
    }

    try {
      await this.sink.close?.();
    } catch (error) {
      this.logger.warn('Sink close failed', {
        sink: this.sink.name,
        error: toError(error).message,
      });
    }

    this.logger.debug('Collector closed', { ...this.stats() });
  }
}
