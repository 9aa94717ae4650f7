/**
 * spanline - Telemetry Pipeline Host
 *
 * Owns the collectors, the stats store and the emitter, and manages their
 * lifecycle as one unit.
 */

import { TelemetryEvent } from '../../domain/events';
import {
  CollectorSettingsInput,
  loadConfigFromEnv,
  SamplingSettingsInput,
  StatsSettingsInput,
} from '../../infrastructure/config';
import { JsonlFileSink } from '../../infrastructure/sinks';
import { AsyncCollector, CollectorStats, SinkErrorHandler } from '../collector';
import { Emitter } from '../emitter';
import { ISink, SinkFunction, toSink } from '../ports';
import { SamplingPolicy } from '../sampling';
import { StatsStore } from '../stats';
import { createLogger, ILogger } from './logger';

/**
 * Pipeline configuration options
 */
export interface PipelineOptions {
  /** Pipeline name */
  name?: string;

  /** Defaults for every collector added with `addSink` */
  collector?: CollectorSettingsInput;

  stats?: StatsSettingsInput;

  /** Request sampling for `emitter.emitRequest`; everything is kept when omitted */
  sampling?: SamplingSettingsInput;

  /** Stop on SIGTERM/SIGINT and exit the process */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds */
  shutdownTimeout?: number;

  /** Reported sink failures of every collector */
  onSinkError?: SinkErrorHandler<TelemetryEvent>;

  logger?: ILogger;
}

/**
 * Pipeline status
 */
export type PipelineStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/**
 * Snapshot for dashboards and health endpoints
 */
export interface PipelineHealth {
  name: string;
  status: PipelineStatus;
  collectors: Record<string, CollectorStats>;
}

/**
 * TelemetryPipeline - default pipeline host
 *
 * Events emitted through `emitter` go to every sink added with `addSink`,
 * each behind its own collector.
 *
 * @example
 * ```typescript
 * const pipeline = new TelemetryPipeline({
 *   name: 'checkout-api',
 *   gracefulShutdown: true,
 *   sampling: { sampleRate: 0.25, excludeRoutes: ['/health'] },
 * });
 *
 * pipeline
 *   .addSink(new JsonlFileSink({ directory: './telemetry' }))
 *   .addSink(new ConsoleSink(), { batchMax: 16 });
 *
 * await pipeline.start();
 * pipeline.emitter.emitRequest('/orders', 201, elapsedNs(start));
 * await pipeline.stop();
 * ```
 */
export class TelemetryPipeline {
  readonly name: string;
  readonly stats: StatsStore;
  readonly emitter: Emitter;

  private _status: PipelineStatus = 'stopped';
  private readonly collectors: AsyncCollector<TelemetryEvent>[] = [];
  private readonly logger: ILogger;
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  constructor(private readonly options: PipelineOptions = {}) {
    this.name = options.name ?? 'spanline';
    this.logger = (options.logger ?? createLogger()).child({ pipeline: this.name });
    this.stats = new StatsStore(options.stats);
    this.emitter = new Emitter(
      { enqueue: (event) => this.dispatch(event) },
      options.sampling ? { sampler: new SamplingPolicy(options.sampling) } : {},
    );
  }

  /**
   * Build a pipeline from `SPANLINE_*` environment variables. A file sink is
   * added when `SPANLINE_LOG_DIR` is set.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: Omit<PipelineOptions, 'collector' | 'stats' | 'sampling'> = {},
  ): TelemetryPipeline {
    const config = loadConfigFromEnv(env);
    const logger =
      options.logger ?? createLogger({ name: options.name, level: config.logLevel });

    const pipeline = new TelemetryPipeline({
      ...options,
      logger,
      collector: config.collector,
      stats: config.stats,
      sampling: config.sampling,
    });

    if (config.fileSink) {
      pipeline.addSink(new JsonlFileSink({ ...config.fileSink, logger }));
    }
    return pipeline;
  }

  get status(): PipelineStatus {
    return this._status;
  }

  /**
   * Add a sink behind a new collector. `options` override the pipeline's
   * collector defaults; the collector is named after the sink unless a name
   * is given.
   */
  addSink(
    sink: ISink<TelemetryEvent> | SinkFunction<TelemetryEvent>,
    options: CollectorSettingsInput = {},
  ): this {
    if (this._status !== 'stopped' && this._status !== 'running') {
      throw new Error(`Cannot add a sink while pipeline is ${this._status}`);
    }

    const normalized = toSink(sink, `sink-${this.collectors.length + 1}`);
    this.collectors.push(
      new AsyncCollector<TelemetryEvent>(normalized, {
        ...this.options.collector,
        ...options,
        name: options.name ?? normalized.name,
        logger: this.logger,
        ...(this.options.onSinkError && { onSinkError: this.options.onSinkError }),
      }),
    );
    return this;
  }

  getCollectors(): AsyncCollector<TelemetryEvent>[] {
    return [...this.collectors];
  }

  health(): PipelineHealth {
    const collectors: Record<string, CollectorStats> = {};
    for (const collector of this.collectors) {
      collectors[collector.name] = collector.stats();
    }
    return { name: this.name, status: this._status, collectors };
  }

  async start(): Promise<void> {
    if (this._status !== 'stopped') {
      throw new Error(`Cannot start pipeline in ${this._status} state`);
    }

    this._status = 'starting';
    this.logger.info(`Starting pipeline: ${this.name}`);

    if (this.options.gracefulShutdown) {
      this.setupGracefulShutdown();
    }

    await Promise.all(this.collectors.map((collector) => collector.start()));

    this._status = 'running';
    this.logger.info(`Pipeline ${this.name} started`, {
      sinks: this.collectors.map((collector) => collector.name),
    });
  }

  /**
   * Close every collector, delivering what they still hold. Gives up after
   * `shutdownTimeout` (default 30 s) and moves to `error`.
   *
   * Collectors flush from the moment they are added, so a pipeline that was
   * never started is closed the same way.
   */
  async stop(): Promise<void> {
    if (this._status === 'starting' || this._status === 'stopping') {
      return;
    }
    if (
      this._status !== 'running' &&
      this.collectors.every((collector) => collector.isClosed())
    ) {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping pipeline: ${this.name}`);
    this.removeGracefulShutdown();

    const timeout = this.options.shutdownTimeout ?? 30000;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        Promise.all(this.collectors.map((collector) => collector.close())),
        new Promise<void>((_, reject) => {
          const handle = setTimeout(() => reject(new Error('Shutdown timeout')), timeout);
          handle.unref();
          timer = handle;
        }),
      ]);

      this._status = 'stopped';
      this.logger.info(`Pipeline ${this.name} stopped`);
    } catch (error) {
      this.logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      this._status = 'error';
    } finally {
      clearTimeout(timer);
    }
  }

  private dispatch(event: TelemetryEvent): void {
    for (const collector of this.collectors) {
      collector.enqueue(event);
    }
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      this.logger.info(`Received ${signal}, flushing telemetry`);
      await this.stop();
      process.exit(0);
    };

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      const handler = (): void => {
        void shutdown(signal);
      };
      this.signalHandlers.set(signal, handler);
      process.once(signal, handler);
    }
  }

  private removeGracefulShutdown(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers.clear();
  }
}
