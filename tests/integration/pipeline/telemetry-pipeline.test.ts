/**
 * @file TelemetryPipeline Integration Tests
 * @description Lifecycle, fan-out to sinks, environment bootstrap
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  SinkErrorHandler,
  TelemetryEvent,
  TelemetryPipeline,
  TraceScope,
} from '../../../src/index';

function collecting(): { events: TelemetryEvent[]; write: (batch: readonly TelemetryEvent[]) => void } {
  const events: TelemetryEvent[] = [];
  return { events, write: (batch) => void events.push(...batch) };
}

describe('TelemetryPipeline', () => {
  const pipelines: TelemetryPipeline[] = [];

  function track(pipeline: TelemetryPipeline): TelemetryPipeline {
    pipelines.push(pipeline);
    return pipeline;
  }

  afterEach(async () => {
    await Promise.all(pipelines.map((pipeline) => pipeline.stop()));
    pipelines.length = 0;
  });

  // ===== TEST GROUP 1: Lifecycle =====

  describe('lifecycle', () => {
    it('should move through stopped, running and stopped', async () => {
      const pipeline = track(new TelemetryPipeline({ name: 'orders' }));
      expect(pipeline.status).toBe('stopped');

      await pipeline.start();
      expect(pipeline.status).toBe('running');

      await pipeline.stop();
      expect(pipeline.status).toBe('stopped');
    });

    it('should refuse to start twice', async () => {
      const pipeline = track(new TelemetryPipeline());
      await pipeline.start();

      await expect(pipeline.start()).rejects.toThrow('Cannot start pipeline in running state');
    });

    it('should deliver pending events on stop', async () => {
      const sink = collecting();
      const pipeline = track(
        new TelemetryPipeline({ collector: { flushIntervalMs: 60_000 } }).addSink(sink.write),
      );
      await pipeline.start();

      TraceScope.run({ traceId: 'trace-1', spanId: 'span-1' }, () => {
        pipeline.emitter.emitRequest('/orders', 201, 5000);
        pipeline.emitter.emitLog('info', 'order stored');
      });
      await pipeline.stop();

      expect(sink.events.map((event) => event.kind)).toEqual(['request', 'custom']);
      expect(sink.events.every((event) => event.traceId === 'trace-1')).toBe(true);
    });

    it('should deliver and close collectors of a pipeline that was never started', async () => {
      const sink = collecting();
      const pipeline = track(
        new TelemetryPipeline({ collector: { flushIntervalMs: 60_000 } }).addSink(sink.write),
      );
      pipeline.emitter.emitLog('info', 'queued before start');

      await pipeline.stop();

      const [collector] = pipeline.getCollectors();
      expect(sink.events).toHaveLength(1);
      expect(collector.stats().delivered).toBe(1);
      expect(collector.isRunning()).toBe(false);
      expect(collector.isClosed()).toBe(true);
      expect(pipeline.status).toBe('stopped');
    });

    it('should do nothing when a pipeline without sinks is stopped', async () => {
      const pipeline = track(new TelemetryPipeline());

      await pipeline.stop();

      expect(pipeline.status).toBe('stopped');
    });

    it('should end in error when shutdown exceeds its timeout', async () => {
      const pipeline = track(
        new TelemetryPipeline({
          shutdownTimeout: 30,
          collector: { writeTimeoutMs: 60_000 },
        }).addSink(() => new Promise<void>(() => undefined)),
      );
      await pipeline.start();
      pipeline.emitter.emitLog('info', 'stuck');

      await pipeline.stop();

      expect(pipeline.status).toBe('error');
    });

    it('should install signal handlers only while running with gracefulShutdown', async () => {
      const before = process.listenerCount('SIGTERM');
      const pipeline = track(new TelemetryPipeline({ gracefulShutdown: true }));

      await pipeline.start();
      expect(process.listenerCount('SIGTERM')).toBe(before + 1);

      await pipeline.stop();
      expect(process.listenerCount('SIGTERM')).toBe(before);
    });
  });

  // ===== TEST GROUP 2: Sinks =====

  describe('sinks', () => {
    it('should fan every event out to each sink', async () => {
      const first = collecting();
      const second = collecting();
      const pipeline = track(
        new TelemetryPipeline().addSink(first.write).addSink(second.write, { batchMax: 1 }),
      );
      await pipeline.start();

      pipeline.emitter.emitFunction('load', 10);
      pipeline.emitter.emitFunction('save', 20);
      await pipeline.stop();

      expect(first.events).toHaveLength(2);
      expect(second.events).toEqual(first.events);
    });

    it('should report collector health by sink name', async () => {
      const pipeline = track(
        new TelemetryPipeline({ name: 'health' })
          .addSink(() => undefined)
          .addSink({ name: 'archive', write: () => undefined }),
      );
      await pipeline.start();
      pipeline.emitter.emitLog('debug', 'ping');

      const health = pipeline.health();
      expect(health.name).toBe('health');
      expect(health.status).toBe('running');
      expect(Object.keys(health.collectors)).toEqual(['sink-1', 'archive']);
      expect(health.collectors.archive.enqueued).toBe(1);
    });

    it('should pass sink failures to onSinkError', async () => {
      const onSinkError = jest.fn<SinkErrorHandler<TelemetryEvent>>();
      const pipeline = track(
        new TelemetryPipeline({ onSinkError }).addSink({
          name: 'broken',
          write: () => {
            throw new Error('unavailable');
          },
        }),
      );
      await pipeline.start();
      pipeline.emitter.emitLog('error', 'boom');
      await pipeline.stop();

      expect(onSinkError).toHaveBeenCalledTimes(1);
      expect(onSinkError.mock.calls[0][0].message).toBe(
        'Sink "broken" failed to write a batch of 1: unavailable',
      );
    });

    it('should count events emitted after stop as rejected', async () => {
      const pipeline = track(new TelemetryPipeline().addSink(() => undefined));
      await pipeline.start();
      await pipeline.stop();

      pipeline.emitter.emitLog('info', 'late');

      expect(pipeline.health().collectors['sink-1'].rejectedAfterClose).toBe(1);
    });
  });

  // ===== TEST GROUP 3: Environment bootstrap =====

  describe('fromEnv()', () => {
    it('should add a file sink and apply sampling from the environment', async () => {
      const directory = await mkdtemp(join(tmpdir(), 'spanline-pipeline-'));
      try {
        const pipeline = track(
          TelemetryPipeline.fromEnv({
            SPANLINE_LOG_DIR: directory,
            SPANLINE_SAMPLE_RATE: '0',
            SPANLINE_LOG_LEVEL: 'silent',
          }),
        );
        await pipeline.start();

        expect(pipeline.emitter.emitRequest('/skipped', 200, 1)).toBeUndefined();
        pipeline.emitter.emitLog('info', 'kept');
        await pipeline.stop();

        const names = await readdir(directory);
        expect(names).toHaveLength(1);
        expect(names[0]).toMatch(/^spanline-\d{8}-\d{6}-0001\.jsonl$/);
        expect(pipeline.health().collectors['jsonl-file'].delivered).toBe(1);
      } finally {
        await rm(directory, { recursive: true, force: true });
      }
    });

    it('should size the stats window from the environment', () => {
      const pipeline = TelemetryPipeline.fromEnv({ SPANLINE_WINDOW_MS: '60000' });
      expect(pipeline.stats.settings.windowMs).toBe(60_000);
      expect(pipeline.getCollectors()).toHaveLength(0);
    });
  });
});
