/**
 * spanline - Context Module
 *
 * Async-safe trace/span propagation
 */

export type {
  TraceFrame,
  TraceActivation,
  ITraceScope,
} from './ITraceFrame';
export {
  TraceScope,
  traceScope,
  currentTraceId,
  currentSpanId,
} from './TraceScope';
