/**
 * spanline - Basic Example
 *
 * Demonstrates the core pipeline concepts:
 * - TelemetryPipeline as the entry point
 * - Trace scopes and child spans
 * - Profiled functions feeding the rolling stats
 * - Console and JSONL file sinks
 *
 * Run with `SPANLINE_LOG_LEVEL=warn` to quiet the pipeline's own logging.
 */

import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConsoleSink,
  JsonlFileSink,
  TelemetryPipeline,
  TraceScope,
  elapsedNs,
  newSpanId,
  newTraceId,
  nowNs,
  nsToMs,
  profile,
} from '../src/index';

// ==================== Pipeline ====================

const pipeline = new TelemetryPipeline({
  name: 'example-api',
  sampling: { sampleRate: 0.5, excludeRoutes: ['/health'] },
  stats: { windowMs: 10_000, bucketMs: 1000 },
});

const directory = join(tmpdir(), 'spanline-example');

pipeline
  .addSink(new ConsoleSink(), { batchMax: 8, flushIntervalMs: 100 })
  .addSink(new JsonlFileSink({ directory, rotateBytes: 64 * 1024 }));

// ==================== Application code ====================

const loadUser = profile(
  pipeline.emitter,
  'loadUser',
  async (id: number): Promise<{ id: number; name: string }> => {
    await new Promise((resolve) => setTimeout(resolve, 5 + (id % 7)));
    if (id % 10 === 0) {
      throw new RangeError(`user ${id} not found`);
    }
    return { id, name: `user-${id}` };
  },
  { stats: pipeline.stats },
);

async function handleRequest(id: number): Promise<void> {
  const start = nowNs();
  let status = 200;

  try {
    await loadUser(id);
  } catch (error) {
    status = 404;
    pipeline.stats.recordError({
      route: '/users/:id',
      status,
      errorKind: error instanceof Error ? error.constructor.name : typeof error,
      errorDetail: error instanceof Error ? error.message : String(error),
    });
  }

  pipeline.emitter.emitRequest('/users/:id', status, elapsedNs(start), { userId: id });
}

// ==================== Main ====================

async function main(): Promise<void> {
  await pipeline.start();

  for (let id = 1; id <= 20; id++) {
    await TraceScope.run({ traceId: newTraceId(), spanId: newSpanId() }, () =>
      handleRequest(id),
    );
  }

  pipeline.emitter.emitRequest('/health', 200, 1000);
  pipeline.emitter.emitLog('info', 'batch of requests served', { requests: 20 });

  const summary = pipeline.stats.summary();
  console.log('\n📊 Latency over the last window');
  console.log(`   count: ${summary.count}  rps: ${summary.rps.toFixed(2)}`);
  console.log(
    `   p50: ${nsToMs(summary.p50).toFixed(2)}ms  p99: ${nsToMs(summary.p99).toFixed(2)}ms`,
  );
  console.log(`   sparkline: ${summary.sparkline.join(' ')}`);
  console.log(`   recent errors: ${pipeline.stats.recentErrors(3).length}`);

  await pipeline.stop();

  console.log('\n🩺 Collector health', pipeline.health().collectors);
  console.log(`\n📁 Files written under ${directory}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
