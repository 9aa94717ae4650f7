/**
 * @fileoverview Telemetry Event - the unit that flows through the collector
 *
 * @packageDocumentation
 * @module spanline/domain/events
 *
 * Only the metadata (timestamp, trace id, span id, kind) is interpreted by
 * the pipeline. `fields` is an opaque payload handed to sinks as-is.
 */

/**
 * Category of an event.
 *
 * - **function**: timing of an instrumented function call
 * - **request**: timing/outcome of a request handled by the host
 * - **custom**: anything else (log lines, business events)
 */
export type EventKind = 'function' | 'request' | 'custom';

/**
 * Values allowed in an event payload.
 */
export type Scalar = string | number | boolean | null;

/**
 * Event payload.
 */
export type EventFields = Readonly<Record<string, Scalar>>;

/**
 * Immutable telemetry event.
 *
 * @example
 * ```typescript
 * const event: TelemetryEvent = {
 *   timestampNs: 1_700_000_000_000_000_000,
 *   traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
 *   spanId: '00f067aa0ba902b7',
 *   kind: 'request',
 *   fields: { route: '/users', status: 200, durationNs: 1_250_000 },
 * };
 * ```
 */
export interface TelemetryEvent {
  /** Nanoseconds since the Unix epoch (monotonic within the process) */
  readonly timestampNs: number;

  /** Trace id active when the event was stamped */
  readonly traceId?: string;

  /** Span id active when the event was stamped */
  readonly spanId?: string;

  readonly kind: EventKind;

  readonly fields: EventFields;
}

const EVENT_KINDS: ReadonlySet<string> = new Set<EventKind>([
  'function',
  'request',
  'custom',
]);

/**
 * Type guard for {@link EventKind}.
 */
export function isEventKind(value: unknown): value is EventKind {
  return typeof value === 'string' && EVENT_KINDS.has(value);
}

/**
 * Build a frozen event. Unset ids are omitted rather than stored as
 * `undefined`, so serialized events carry only the keys that were set.
 */
export function createEvent(
  kind: EventKind,
  timestampNs: number,
  fields: Record<string, Scalar>,
  traceId?: string,
  spanId?: string,
): TelemetryEvent {
  const event: TelemetryEvent = {
    timestampNs,
    ...(traceId !== undefined && { traceId }),
    ...(spanId !== undefined && { spanId }),
    kind,
    fields: Object.freeze({ ...fields }),
  };

  return Object.freeze(event);
}
