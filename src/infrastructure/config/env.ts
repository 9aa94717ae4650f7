/**
 * spanline - Environment Configuration
 *
 * Reads `SPANLINE_*` variables into partial settings. Variables that are not
 * set are left out, so component defaults still apply.
 *
 * | Variable | Setting |
 * |---|---|
 * | `SPANLINE_QUEUE_SIZE` | `collector.queueSize` |
 * | `SPANLINE_BATCH_MAX` | `collector.batchMax` |
 * | `SPANLINE_FLUSH_INTERVAL_MS` | `collector.flushIntervalMs` |
 * | `SPANLINE_WINDOW_MS` | `stats.windowMs` |
 * | `SPANLINE_BUCKET_MS` | `stats.bucketMs` |
 * | `SPANLINE_ERROR_CAPACITY` | `stats.errorCapacity` |
 * | `SPANLINE_LOG_DIR` | `fileSink.directory` |
 * | `SPANLINE_ROTATE_BYTES` | `fileSink.rotateBytes` |
 * | `SPANLINE_ROTATE_SECS` | `fileSink.rotateSecs` |
 * | `SPANLINE_SAMPLE_RATE` | `sampling.sampleRate` |
 * | `SPANLINE_LOG_LEVEL` | `logLevel` |
 */

import { z } from 'zod';
import type {
  CollectorSettingsInput,
  FileSinkSettingsInput,
  SamplingSettingsInput,
  StatsSettingsInput,
} from './schemas';
import { parseOptions } from './schemas';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envNumber = z.preprocess(
  (value) => (value === undefined || value === '' ? undefined : Number(value)),
  z.number().optional(),
);

const envString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  SPANLINE_QUEUE_SIZE: envNumber,
  SPANLINE_BATCH_MAX: envNumber,
  SPANLINE_FLUSH_INTERVAL_MS: envNumber,
  SPANLINE_WINDOW_MS: envNumber,
  SPANLINE_BUCKET_MS: envNumber,
  SPANLINE_ERROR_CAPACITY: envNumber,
  SPANLINE_LOG_DIR: envString,
  SPANLINE_ROTATE_BYTES: envNumber,
  SPANLINE_ROTATE_SECS: envNumber,
  SPANLINE_SAMPLE_RATE: envNumber,
  SPANLINE_LOG_LEVEL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(LOG_LEVELS).optional(),
  ),
});

/**
 * Settings gathered from the environment.
 */
export interface PipelineConfig {
  collector: CollectorSettingsInput;
  stats: StatsSettingsInput;
  /** Present only when `SPANLINE_LOG_DIR` is set */
  fileSink?: FileSinkSettingsInput;
  sampling: SamplingSettingsInput;
  logLevel?: LogLevel;
}

/**
 * Load pipeline settings from environment variables.
 *
 * Values are only type-checked here; range checks happen when the settings
 * reach a component constructor.
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv();
 * const collector = new AsyncCollector(sink, config.collector);
 * ```
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const vars = parseOptions(envSchema, env, 'environment');

  const config: PipelineConfig = {
    collector: {
      ...(vars.SPANLINE_QUEUE_SIZE !== undefined && {
        queueSize: vars.SPANLINE_QUEUE_SIZE,
      }),
      ...(vars.SPANLINE_BATCH_MAX !== undefined && {
        batchMax: vars.SPANLINE_BATCH_MAX,
      }),
      ...(vars.SPANLINE_FLUSH_INTERVAL_MS !== undefined && {
        flushIntervalMs: vars.SPANLINE_FLUSH_INTERVAL_MS,
      }),
    },
    stats: {
      ...(vars.SPANLINE_WINDOW_MS !== undefined && {
        windowMs: vars.SPANLINE_WINDOW_MS,
      }),
      ...(vars.SPANLINE_BUCKET_MS !== undefined && {
        bucketMs: vars.SPANLINE_BUCKET_MS,
      }),
      ...(vars.SPANLINE_ERROR_CAPACITY !== undefined && {
        errorCapacity: vars.SPANLINE_ERROR_CAPACITY,
      }),
    },
    sampling: {
      ...(vars.SPANLINE_SAMPLE_RATE !== undefined && {
        sampleRate: vars.SPANLINE_SAMPLE_RATE,
      }),
    },
  };

  if (vars.SPANLINE_LOG_DIR !== undefined) {
    config.fileSink = {
      directory: vars.SPANLINE_LOG_DIR,
      ...(vars.SPANLINE_ROTATE_BYTES !== undefined && {
        rotateBytes: vars.SPANLINE_ROTATE_BYTES,
      }),
      ...(vars.SPANLINE_ROTATE_SECS !== undefined && {
        rotateSecs: vars.SPANLINE_ROTATE_SECS,
      }),
    };
  }

  if (vars.SPANLINE_LOG_LEVEL !== undefined) {
    config.logLevel = vars.SPANLINE_LOG_LEVEL;
  }

  return config;
}
