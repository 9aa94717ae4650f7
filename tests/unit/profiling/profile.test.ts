/**
 * @file Profiling Unit Tests
 * @description profile() wrapper and withSpan() child spans
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { Emitter } from '../../../src/application/emitter';
import { profile, withSpan } from '../../../src/application/profiling';
import { StatsStore } from '../../../src/application/stats';
import { TraceScope } from '../../../src/domain/context';
import { TelemetryEvent } from '../../../src/domain/events';
import { isValidSpanId, isValidTraceId } from '../../../src/infrastructure/runtime';
import { sleep, waitFor } from '../../helpers';

class QuotaExceededError extends Error {}

describe('withSpan()', () => {
  it('should open a root span with fresh ids outside a trace', () => {
    const span = withSpan((info) => {
      expect(TraceScope.currentTraceId()).toBe(info.traceId);
      expect(TraceScope.currentSpanId()).toBe(info.spanId);
      return info;
    });

    expect(isValidTraceId(span.traceId)).toBe(true);
    expect(isValidSpanId(span.spanId)).toBe(true);
    expect(span.parentSpanId).toBeUndefined();
    expect(TraceScope.hasFrame()).toBe(false);
  });

  it('should inherit the trace and record the parent span', () => {
    TraceScope.run({ traceId: 'trace-parent', spanId: 'span-parent' }, () => {
      withSpan((info) => {
        expect(info.traceId).toBe('trace-parent');
        expect(info.parentSpanId).toBe('span-parent');
        expect(info.spanId).not.toBe('span-parent');
      });

      expect(TraceScope.currentSpanId()).toBe('span-parent');
    });
  });

  it('should honour an explicit trace id', () => {
    withSpan((info) => expect(info.traceId).toBe('trace-explicit'), { traceId: 'trace-explicit' });
  });
});

describe('profile()', () => {
  let events: TelemetryEvent[];
  let emitter: Emitter;

  beforeEach(() => {
    events = [];
    emitter = new Emitter({ enqueue: (event) => events.push(event) });
  });

  it('should time a synchronous call inside a child span', () => {
    const add = profile(emitter, 'add', (a: number, b: number) => a + b);

    const result = TraceScope.run({ traceId: 'trace-1', spanId: 'span-root' }, () => add(2, 3));

    expect(result).toBe(5);
    expect(events).toHaveLength(1);

    const [event] = events;
    expect(event.kind).toBe('function');
    expect(event.traceId).toBe('trace-1');
    expect(event.spanId).not.toBe('span-root');
    expect(event.fields).toMatchObject({ fn: 'add', error: false, parentSpanId: 'span-root' });
    expect(typeof event.fields.durationNs).toBe('number');
  });

  it('should rethrow the original error and report its type', () => {
    const failure = new QuotaExceededError('quota');
    const fail = profile(emitter, 'fail', (): number => {
      throw failure;
    });

    let caught: unknown;
    try {
      fail();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBe(failure);
    expect(events[0].fields).toMatchObject({
      fn: 'fail',
      error: true,
      exceptionType: 'QuotaExceededError',
    });
  });

  it('should emit once an async call settles', async () => {
    const slow = profile(emitter, 'slow', async (ms: number) => {
      await sleep(ms);
      return 'done';
    });

    const pending = slow(10);
    expect(events).toHaveLength(0);

    await expect(pending).resolves.toBe('done');
    await waitFor(() => events.length === 1, 1000);
    expect(events[0].fields).toMatchObject({ fn: 'slow', error: false });
    expect(Number(events[0].fields.durationNs)).toBeGreaterThan(0);
  });

  it('should return the rejected promise unchanged', async () => {
    const broken = profile(emitter, 'broken', async () => {
      throw new TypeError('bad input');
    });

    await expect(broken()).rejects.toThrow('bad input');
    await waitFor(() => events.length === 1, 1000);
    expect(events[0].fields).toMatchObject({ error: true, exceptionType: 'TypeError' });
  });

  it('should keep the receiver', () => {
    const counter = {
      count: 10,
      next: profile(emitter, 'next', function (this: { count: number }) {
        this.count++;
        return this.count;
      }),
    };

    expect(counter.next()).toBe(11);
  });

  it('should record into a stats store when given one', () => {
    const stats = new StatsStore();
    const work = profile(emitter, 'work', () => 'ok', { stats, fields: { service: 'billing' } });

    work();
    work();

    expect(stats.summary().count).toBe(2);
    expect(events[0].fields.service).toBe('billing');
  });
});
