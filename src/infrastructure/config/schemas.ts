/**
 * spanline - Configuration Schemas
 *
 * One zod schema per configuration surface. Every constructor that accepts
 * settings validates them here, so misconfiguration is rejected at
 * construction time with a {@link ConfigurationException}.
 */

import { z } from 'zod';
import { ConfigurationException } from '../../domain/exceptions';

const positiveInt = z.number().int().positive();
const rate = z.number().min(0).max(1);
const routeMatcher = z.union([z.string().min(1), z.instanceof(RegExp)]);

/** Longest delay a Node timer honours; larger values fire after 1 ms */
const MAX_TIMER_MS = 2_147_483_647;
const timerMs = z.number().positive().finite().max(MAX_TIMER_MS);

/**
 * Async collector settings.
 */
export const collectorOptionsSchema = z.object({
  /** Queue capacity N; the oldest event is evicted beyond it */
  queueSize: positiveInt.default(2048),
  /** Largest batch handed to the sink */
  batchMax: positiveInt.default(128),
  /** Longest time an event waits in a partial batch */
  flushIntervalMs: timerMs.default(100),
  /** A sink write still pending after this long counts as failed */
  writeTimeoutMs: timerMs.default(10_000),
  /** Close the collector on the process `beforeExit` event */
  flushOnExit: z.boolean().default(false),
  name: z.string().min(1).default('collector'),
});

/**
 * Rolling-window statistics settings.
 */
export const statsOptionsSchema = z
  .object({
    /** Trailing window length (default 15 minutes) */
    windowMs: positiveInt.default(15 * 60 * 1000),
    /** Width of one time bucket; windowMs must be a multiple of it */
    bucketMs: positiveInt.default(1000),
    /** Capacity of the recent-errors ring */
    errorCapacity: positiveInt.default(100),
    /** Number of trailing buckets reported in the summary sparkline */
    sparklineBuckets: positiveInt.default(60),
  })
  .superRefine((value, ctx) => {
    if (value.windowMs < value.bucketMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'windowMs must be at least bucketMs',
        path: ['windowMs'],
      });
    } else if (value.windowMs % value.bucketMs !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'windowMs must be a whole number of buckets',
        path: ['windowMs'],
      });
    }
  });

/**
 * Rotating JSONL file sink settings.
 */
export const fileSinkOptionsSchema = z.object({
  directory: z.string().min(1),
  prefix: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'prefix may only contain letters, digits, ".", "_" and "-"')
    .default('spanline'),
  /** Rotate once the current file holds at least this many bytes */
  rotateBytes: positiveInt.default(10 * 1024 * 1024),
  /** Rotate once the current file has been open this long */
  rotateSecs: z.number().positive().default(3600),
});

/**
 * Console sink settings.
 */
export const consoleSinkOptionsSchema = z.object({
  pretty: z.boolean().default(false),
  name: z.string().min(1).default('console'),
});

/**
 * Request sampling settings.
 */
export const samplingOptionsSchema = z.object({
  /** Fraction of requests kept (0 drops all, 1 keeps all) */
  sampleRate: rate.default(1),
  /** Routes never sampled: string prefixes or regular expressions */
  excludeRoutes: z.array(routeMatcher).default([]),
  /** Per-route rates; the first matching override wins */
  routeOverrides: z
    .array(z.object({ match: routeMatcher, rate }))
    .default([]),
  /** Keep every request with a 5xx status regardless of rate */
  alwaysSampleErrors: z.boolean().default(true),
  /** Seed for a deterministic generator; random when omitted */
  seed: z.number().int().optional(),
});

export type CollectorSettings = z.output<typeof collectorOptionsSchema>;
export type CollectorSettingsInput = z.input<typeof collectorOptionsSchema>;
export type StatsSettings = z.output<typeof statsOptionsSchema>;
export type StatsSettingsInput = z.input<typeof statsOptionsSchema>;
export type FileSinkSettings = z.output<typeof fileSinkOptionsSchema>;
export type FileSinkSettingsInput = z.input<typeof fileSinkOptionsSchema>;
export type ConsoleSinkSettings = z.output<typeof consoleSinkOptionsSchema>;
export type ConsoleSinkSettingsInput = z.input<typeof consoleSinkOptionsSchema>;
export type SamplingSettings = z.output<typeof samplingOptionsSchema>;
export type SamplingSettingsInput = z.input<typeof samplingOptionsSchema>;

/**
 * Validate `input` against `schema`, throwing a ConfigurationException that
 * lists every failing field.
 *
 * @example
 * ```typescript
 * const settings = parseOptions(collectorOptionsSchema, { queueSize: 0 }, 'collector');
 * // throws ConfigurationException { errors: { queueSize: [...] } }
 * ```
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  scope: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const errors: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : scope;
    (errors[key] ??= []).push(issue.message);
  }

  throw new ConfigurationException(`Invalid ${scope} configuration`, errors);
}
