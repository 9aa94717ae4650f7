/**
 * @fileoverview TraceScope - AsyncLocalStorage-based trace propagation
 *
 * @packageDocumentation
 * @module spanline/domain/context
 *
 * ## How the frame travels
 *
 * One `AsyncLocalStorage<TraceFrame>` holds the frame for the current unit of
 * work. Node copies the store reference into every async resource created
 * while a scope is active (promises, timers, I/O callbacks), so code that runs
 * later in the same call chain reads the same frame:
 *
 * ```typescript
 * await TraceScope.run({ traceId: 'trace-a' }, async () => {
 *   await db.query();                 // still 'trace-a'
 *   setTimeout(() => log(), 10);      // still 'trace-a'
 * });
 * TraceScope.currentTraceId();        // back to what it was before
 * ```
 *
 * The store is a slot per unit of work holding the current frame. `run()`
 * and `fork()` open a new slot seeded with a snapshot, so a child keeps the
 * frame it was started with even if the parent activates something else
 * afterwards. Frames themselves are immutable.
 *
 * ## Two ways to activate
 *
 * - `run(frame, fn)` scopes the frame to a callback. Restoration is done by
 *   Node when the callback's scope ends, whatever the exit path.
 * - `activate(frame)` returns a handle and swaps the frame held by the
 *   current slot. Everything sharing the slot, including a caller awaiting
 *   the activating function, sees the change and sees it undone on
 *   `release()`. Start concurrent units with `fork()` (or `run()`) so each
 *   gets its own slot.
 *
 * Reads are a single `getStore()` lookup and allocate nothing.
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import { ITraceScope, TraceActivation, TraceFrame } from './ITraceFrame';

const EMPTY_FRAME: TraceFrame = Object.freeze({});

/**
 * Per-unit holder of the active frame.
 *
 * @internal
 */
interface FrameSlot {
  frame: TraceFrame;
}

/**
 * Build a frozen frame, omitting unset fields.
 */
function createFrame(traceId?: string, spanId?: string): TraceFrame {
  const frame: { traceId?: string; spanId?: string } = {};
  if (traceId !== undefined) frame.traceId = traceId;
  if (spanId !== undefined) frame.spanId = spanId;
  return Object.freeze(frame);
}

/**
 * Layer `overlay` over `base`: set fields of `overlay` win.
 */
function mergeFrames(base: TraceFrame, overlay: TraceFrame): TraceFrame {
  return createFrame(
    overlay.traceId ?? base.traceId,
    overlay.spanId ?? base.spanId,
  );
}

/**
 * Handle for one `activate()` call.
 *
 * @internal
 */
class FrameActivation implements TraceActivation {
  private _released = false;

  constructor(
    private readonly slot: FrameSlot,
    private readonly previous: TraceFrame,
    readonly fields: ReadonlyArray<keyof TraceFrame>,
  ) {}

  get released(): boolean {
    return this._released;
  }

  release(): void {
    if (this._released) {
      return;
    }
    this._released = true;

    if (this.fields.length === 0) {
      return;
    }

    const current = this.slot.frame;
    const restoreTrace = this.fields.includes('traceId');
    const restoreSpan = this.fields.includes('spanId');

    this.slot.frame = createFrame(
      restoreTrace ? this.previous.traceId : current.traceId,
      restoreSpan ? this.previous.spanId : current.spanId,
    );
  }
}

/**
 * TraceScope - static access to the active trace frame.
 *
 * @example Request boundary
 * ```typescript
 * server.on('request', (req, res) => {
 *   TraceScope.run({ traceId: newTraceId(), spanId: newSpanId() }, () => {
 *     handle(req, res); // every emitted event carries these ids
 *   });
 * });
 * ```
 *
 * @example Handle form inside forked units
 * ```typescript
 * await Promise.all(
 *   jobs.map((job) =>
 *     TraceScope.fork(async () => {
 *       const activation = TraceScope.activate({ spanId: newSpanId() });
 *       try {
 *         await job.run();
 *       } finally {
 *         activation.release();
 *       }
 *     }),
 *   ),
 * );
 * ```
 */
export class TraceScope {
  /**
   * Single storage shared by every scope. Each unit of work gets its own slot
   * in it, so no lock is ever taken.
   */
  private static als = new AsyncLocalStorage<FrameSlot>();

  private constructor() {}

  static currentTraceId(): string | undefined {
    return TraceScope.als.getStore()?.frame.traceId;
  }

  static currentSpanId(): string | undefined {
    return TraceScope.als.getStore()?.frame.spanId;
  }

  static currentFrame(): TraceFrame {
    return TraceScope.als.getStore()?.frame ?? EMPTY_FRAME;
  }

  /**
   * Whether any scope is active for the current unit of work.
   */
  static hasFrame(): boolean {
    return TraceScope.als.getStore() !== undefined;
  }

  static run<R>(frame: TraceFrame, callback: () => R): R {
    return TraceScope.als.run(
      { frame: mergeFrames(TraceScope.currentFrame(), frame) },
      callback,
    );
  }

  static fork<R>(callback: () => R): R {
    return TraceScope.als.run({ frame: TraceScope.currentFrame() }, callback);
  }

  static activate(frame: TraceFrame): TraceActivation {
    const fields: Array<keyof TraceFrame> = [];
    if (frame.traceId !== undefined) fields.push('traceId');
    if (frame.spanId !== undefined) fields.push('spanId');

    if (fields.length === 0) {
      return new FrameActivation({ frame: EMPTY_FRAME }, EMPTY_FRAME, fields);
    }

    let slot = TraceScope.als.getStore();
    if (!slot) {
      // Outside any scope: open a slot for the rest of this execution.
      slot = { frame: EMPTY_FRAME };
      TraceScope.als.enterWith(slot);
    }

    const previous = slot.frame;
    slot.frame = mergeFrames(previous, frame);
    return new FrameActivation(slot, previous, fields);
  }
}

/**
 * {@link TraceScope} typed as the {@link ITraceScope} port.
 */
export const traceScope: ITraceScope = TraceScope;

/**
 * Shorthand for `TraceScope.currentTraceId()`.
 */
export function currentTraceId(): string | undefined {
  return TraceScope.currentTraceId();
}

/**
 * Shorthand for `TraceScope.currentSpanId()`.
 */
export function currentSpanId(): string | undefined {
  return TraceScope.currentSpanId();
}
