/**
 * @fileoverview JsonlFileSink - rotating newline-delimited JSON files
 *
 * @packageDocumentation
 * @module spanline/infrastructure/sinks
 *
 * ## File layout
 *
 * Files are named `<prefix>-YYYYMMDD-HHMMSS-<seq>.jsonl` (UTC open time,
 * 4-digit sequence). The file being written carries a `.part` suffix; it is
 * renamed to its final name when it is rotated or when the sink closes, so a
 * reader that only picks up `*.jsonl` never sees a half-written file.
 *
 * A file rotates once it holds at least `rotateBytes` bytes, or when a write
 * arrives more than `rotateSecs` after the file was opened. A line is never
 * split across files.
 */

import { FileHandle, mkdir, open, rename } from 'fs/promises';
import { join } from 'path';
import { ILogger, createLogger } from '../../application/host/logger';
import { ISink } from '../../application/ports';
import { TelemetryEvent } from '../../domain/events';
import {
  FileSinkSettings,
  FileSinkSettingsInput,
  fileSinkOptionsSchema,
  parseOptions,
} from '../config';

export interface JsonlFileSinkOptions extends FileSinkSettingsInput {
  logger?: ILogger;
  /** Wall clock in milliseconds; names files and times rotation */
  clock?: () => number;
}

interface OpenFile {
  readonly handle: FileHandle;
  readonly partPath: string;
  readonly finalPath: string;
  readonly openedAtMs: number;
  bytes: number;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function timestampTag(ms: number): string {
  const date = new Date(ms);
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Rotating JSONL file sink.
 *
 * @example
 * ```typescript
 * const sink = new JsonlFileSink({ directory: './telemetry', rotateBytes: 5_000_000 });
 * const collector = new AsyncCollector(sink);
 *
 * // ...
 * await collector.close();
 * sink.files(); // ['./telemetry/spanline-20240101-120000-0001.jsonl', ...]
 * ```
 */
export class JsonlFileSink<T = TelemetryEvent> implements ISink<T> {
  readonly name = 'jsonl-file';
  readonly settings: Readonly<FileSinkSettings>;

  private readonly logger: ILogger;
  private readonly clock: () => number;
  private readonly finalized: string[] = [];
  private current: OpenFile | null = null;
  private sequence = 0;
  private directoryReady = false;

  constructor(options: JsonlFileSinkOptions) {
    this.settings = Object.freeze(parseOptions(fileSinkOptionsSchema, options, 'fileSink'));
    this.logger = (options.logger ?? createLogger()).child({ component: this.name });
    this.clock = options.clock ?? Date.now;
  }

  async write(batch: readonly T[]): Promise<void> {
    let file = await this.currentFile();
    let chunk: string[] = [];
    let chunkBytes = 0;

    for (const item of batch) {
      const line = `${JSON.stringify(item)}\n`;
      chunk.push(line);
      chunkBytes += Buffer.byteLength(line);

      if (file.bytes + chunkBytes >= this.settings.rotateBytes) {
        await this.append(file, chunk.join(''), chunkBytes);
        await this.finalize();
        file = await this.currentFile();
        chunk = [];
        chunkBytes = 0;
      }
    }

    if (chunk.length > 0) {
      await this.append(file, chunk.join(''), chunkBytes);
    }
  }

  /**
   * Finalize the current file. The sink may be written to again afterwards,
   * which opens a new file.
   */
  async close(): Promise<void> {
    await this.finalize();
  }

  /**
   * Finalized files written by this sink, oldest first.
   */
  files(): readonly string[] {
    return [...this.finalized];
  }

  private async currentFile(): Promise<OpenFile> {
    const now = this.clock();
    if (this.current && now - this.current.openedAtMs >= this.settings.rotateSecs * 1000) {
      await this.finalize();
    }
    if (this.current) {
      return this.current;
    }

    if (!this.directoryReady) {
      await mkdir(this.settings.directory, { recursive: true });
      this.directoryReady = true;
    }

    this.sequence++;
    const finalPath = join(
      this.settings.directory,
      `${this.settings.prefix}-${timestampTag(now)}-${pad(this.sequence, 4)}.jsonl`,
    );
    const partPath = `${finalPath}.part`;
    const handle = await open(partPath, 'a');

    this.current = { handle, partPath, finalPath, openedAtMs: now, bytes: 0 };
    return this.current;
  }

  private async append(file: OpenFile, data: string, bytes: number): Promise<void> {
    await file.handle.write(data);
    file.bytes += bytes;
  }

  private async finalize(): Promise<void> {
    const file = this.current;
    if (!file) {
      return;
    }
    this.current = null;

    await file.handle.close();
    await rename(file.partPath, file.finalPath);
    this.finalized.push(file.finalPath);
    this.logger.debug('Finalized telemetry file', {
      path: file.finalPath,
      bytes: file.bytes,
    });
  }
}
