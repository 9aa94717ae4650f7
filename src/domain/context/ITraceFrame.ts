/**
 * @fileoverview Trace Frame - contracts for in-process trace propagation
 *
 * @packageDocumentation
 * @module spanline/domain/context
 *
 * A trace frame is the pair of identifiers every emitted event is stamped
 * with. Frames live in async-local storage. Each unit of concurrent work
 * (an async call chain started with `run` or `fork`) sees its own frame and
 * starts from a snapshot of its parent's. Siblings never see each other's
 * changes; plain awaited calls share their caller's unit.
 *
 * ```
 * fork ─┬─ unit A  { traceId: 'tA' } ── await ── still 'tA'
 *       └─ unit B  { traceId: 'tB' } ── await ── still 'tB'
 * ```
 */

/**
 * Identifiers carried by the active scope.
 *
 * @remarks
 * Frames are immutable. A field that is `undefined` means "not set"; it is a
 * valid value and never an error.
 */
export interface TraceFrame {
  /** Trace identifier (32 hex digits when generated by spanline) */
  readonly traceId?: string;

  /** Span identifier (16 hex digits when generated by spanline) */
  readonly spanId?: string;
}

/**
 * Handle returned by {@link ITraceScope.activate}.
 *
 * @example
 * ```typescript
 * const activation = TraceScope.activate({ spanId: newSpanId() });
 * try {
 *   doWork();
 * } finally {
 *   activation.release();
 * }
 * ```
 */
export interface TraceActivation {
  /** Fields this activation set (and will restore on release) */
  readonly fields: ReadonlyArray<keyof TraceFrame>;

  /** Whether `release()` has already run */
  readonly released: boolean;

  /**
   * Restore the fields this activation set to the values they had before it.
   * Fields it did not set are left as they are. Calling it again is a no-op.
   */
  release(): void;
}

/**
 * Trace scope operations.
 *
 * Implemented statically by `TraceScope`; described as an interface so hosts
 * can substitute a fake in their own tests.
 */
export interface ITraceScope {
  /** Active trace id, or `undefined` when none is set */
  currentTraceId(): string | undefined;

  /** Active span id, or `undefined` when none is set */
  currentSpanId(): string | undefined;

  /** Active frame (an empty frame when no scope is active) */
  currentFrame(): TraceFrame;

  /**
   * Run `callback` with `frame` layered over the enclosing frame. Fields left
   * unset in `frame` keep the enclosing values. The enclosing frame is back in
   * place once `callback` returns, throws, or its promise settles.
   */
  run<R>(frame: TraceFrame, callback: () => R): R;

  /**
   * Start a child unit of work holding a snapshot of the current frame.
   * Activations made inside it never reach the caller or its siblings.
   */
  fork<R>(callback: () => R): R;

  /**
   * Set the given fields on the current unit of work until the returned
   * handle is released.
   */
  activate(frame: TraceFrame): TraceActivation;
}
