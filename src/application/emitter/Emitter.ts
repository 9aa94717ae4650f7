/**
 * spanline - Emitter
 *
 * Stamps events with the active trace/span ids and the clock, then hands
 * them to a collector.
 */

import { TraceScope } from '../../domain/context';
import {
  createEvent,
  EventKind,
  Scalar,
  TelemetryEvent,
} from '../../domain/events';
import { Clock, nowNs } from '../../infrastructure/runtime';
import { SamplingPolicy } from '../sampling';

/**
 * Anything events can be enqueued on; {@link AsyncCollector} is the usual one.
 */
export interface EventQueue {
  enqueue(event: TelemetryEvent): void;
}

export interface EmitterOptions {
  /** Consulted by `emitRequest`; every request is kept when omitted */
  sampler?: SamplingPolicy;
  clock?: Clock;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Event factory bound to one queue.
 *
 * @example
 * ```typescript
 * const emitter = new Emitter(collector);
 *
 * emitter.emitRequest('/users', 200, elapsedNs(start), { method: 'GET' });
 * emitter.emitLog('info', 'cache warmed', { entries: 1200 });
 * ```
 */
export class Emitter {
  private readonly sampler?: SamplingPolicy;
  private readonly clock: Clock;

  constructor(
    private readonly queue: EventQueue,
    options: EmitterOptions = {},
  ) {
    this.sampler = options.sampler;
    this.clock = options.clock ?? nowNs;
  }

  /**
   * Build an event from the current context and enqueue it. Ids that are
   * not set in the current scope are left out of the event.
   */
  stamp(kind: EventKind, fields: Record<string, Scalar> = {}): TelemetryEvent {
    const frame = TraceScope.currentFrame();
    const event = createEvent(kind, this.clock(), fields, frame.traceId, frame.spanId);
    this.queue.enqueue(event);
    return event;
  }

  /**
   * Emit a `request` event, subject to the sampler.
   *
   * @returns the event, or `undefined` when the request was not sampled
   */
  emitRequest(
    route: string,
    status: number,
    durationNs: number,
    fields: Record<string, Scalar> = {},
  ): TelemetryEvent | undefined {
    const decision = this.sampler?.shouldSample({ route, status });
    if (decision && !decision.sampled) {
      return undefined;
    }

    return this.stamp('request', {
      ...fields,
      route,
      status,
      durationNs,
      ...(decision && decision.rate < 1 && { sampleRate: decision.rate }),
    });
  }

  /**
   * Emit a `function` timing event.
   */
  emitFunction(
    name: string,
    durationNs: number,
    error: boolean = false,
    fields: Record<string, Scalar> = {},
  ): TelemetryEvent {
    return this.stamp('function', { ...fields, fn: name, durationNs, error });
  }

  /**
   * Emit a log line as a `custom` event.
   */
  emitLog(
    level: LogLevelName,
    message: string,
    attributes: Record<string, Scalar> = {},
  ): TelemetryEvent {
    return this.stamp('custom', { ...attributes, level, message });
  }
}
