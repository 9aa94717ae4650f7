/**
 * spanline - Event Module
 */

export type {
  EventKind,
  Scalar,
  EventFields,
  TelemetryEvent,
} from './TelemetryEvent';
export { createEvent, isEventKind } from './TelemetryEvent';
