/**
 * spanline - Console Sink
 *
 * Human-readable event output, one line per event:
 *
 * ```
 * 2024-01-01T12:00:00.000Z request [4bf92f35.../00f067aa...] route=/users status=200 durationNs=1250000
 * ```
 */

import { createLogger, ILogger } from '../../application/host/logger';
import { ISink } from '../../application/ports';
import { Scalar, TelemetryEvent } from '../../domain/events';
import {
  ConsoleSinkSettings,
  ConsoleSinkSettingsInput,
  consoleSinkOptionsSchema,
  parseOptions,
} from '../config';

export interface ConsoleSinkOptions extends ConsoleSinkSettingsInput {
  /** Output stream (default `process.stdout`) */
  stream?: NodeJS.WritableStream;
  logger?: ILogger;
}

function formatValue(value: Scalar): string {
  if (typeof value === 'string') {
    return value === '' || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  return String(value);
}

/**
 * Render one event as a single line (no trailing newline).
 */
export function formatEventLine(event: TelemetryEvent): string {
  const time = new Date(Math.floor(event.timestampNs / 1_000_000)).toISOString();
  const ids = `[${event.traceId ?? '-'}/${event.spanId ?? '-'}]`;
  const fields = Object.entries(event.fields).map(
    ([key, value]) => `${key}=${formatValue(value)}`,
  );
  return [time, event.kind, ids, ...fields].join(' ');
}

/**
 * Console sink.
 *
 * @example
 * ```typescript
 * const collector = new AsyncCollector(new ConsoleSink({ pretty: true }));
 * ```
 */
export class ConsoleSink implements ISink<TelemetryEvent> {
  readonly name: string;
  readonly settings: Readonly<ConsoleSinkSettings>;
  private readonly stream: NodeJS.WritableStream;
  private readonly logger: ILogger;

  /** A failed write also emits `error`; the write itself already rejects */
  private readonly onStreamError = (error: Error): void => {
    this.logger.warn('Console stream error', { sink: this.name, error: error.message });
  };

  constructor(options: ConsoleSinkOptions = {}) {
    this.settings = Object.freeze(parseOptions(consoleSinkOptionsSchema, options, 'consoleSink'));
    this.name = this.settings.name;
    this.logger = (options.logger ?? createLogger()).child({ component: this.name });
    this.stream = options.stream ?? process.stdout;
    this.stream.on('error', this.onStreamError);
  }

  /**
   * Detach from the stream. The stream itself is left open.
   */
  close(): void {
    this.stream.removeListener('error', this.onStreamError);
  }

  write(batch: readonly TelemetryEvent[]): Promise<void> {
    const output = batch
      .map((event) =>
        this.settings.pretty ? JSON.stringify(event, null, 2) : formatEventLine(event),
      )
      .map((text) => `${text}\n`)
      .join('');

    return new Promise((resolve, reject) => {
      this.stream.write(output, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
