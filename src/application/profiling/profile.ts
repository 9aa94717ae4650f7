/**
 * spanline - Function Profiling
 *
 * Wraps a function so every call is timed in its own child span and reported
 * as a `function` event.
 */

import { Scalar } from '../../domain/events';
import { elapsedNs, nowNs } from '../../infrastructure/runtime';
import { Emitter } from '../emitter';
import { StatsStore } from '../stats';
import { withSpan } from './span';

export interface ProfileOptions {
  /** Also record each call's duration and outcome here */
  stats?: StatsStore;
  /** Extra fields added to every emitted event */
  fields?: Record<string, Scalar>;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function exceptionType(error: unknown): string {
  if (error instanceof Error) {
    return error.constructor.name;
  }
  return typeof error;
}

/**
 * Profile `fn` under `name`.
 *
 * The returned function has the same signature and returns exactly what `fn`
 * returns: the same value, the same promise, or the same thrown error. For
 * async functions the event is emitted once the promise settles.
 *
 * @example
 * ```typescript
 * const fetchUser = profile(emitter, 'fetchUser', async (id: string) => db.users.find(id));
 *
 * await fetchUser('42');
 * // emits { kind: 'function', fields: { fn: 'fetchUser', durationNs, error: false, parentSpanId } }
 * ```
 */
export function profile<A extends unknown[], R>(
  emitter: Emitter,
  name: string,
  fn: (...args: A) => R,
  options: ProfileOptions = {},
): (...args: A) => R {
  return function profiled(this: unknown, ...args: A): R {
    return withSpan((span) => {
      const start = nowNs();

      const finish = (failed: boolean, error?: unknown): void => {
        const durationNs = elapsedNs(start);
        emitter.emitFunction(name, durationNs, failed, {
          ...options.fields,
          ...(span.parentSpanId !== undefined && { parentSpanId: span.parentSpanId }),
          ...(failed && { exceptionType: exceptionType(error) }),
        });
        options.stats?.record(durationNs, failed);
      };

      let result: R;
      try {
        result = fn.apply(this, args);
      } catch (error) {
        finish(true, error);
        throw error;
      }

      if (isPromiseLike(result)) {
        void result.then(
          () => finish(false),
          (error: unknown) => finish(true, error),
        );
      } else {
        finish(false);
      }
      return result;
    });
  };
}
