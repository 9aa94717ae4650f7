/**
 * spanline - Runtime Primitives
 *
 * Clock and identifier generation.
 */

export { nowNs, elapsedNs, nsToMs, msToNs } from './clock';
export type { Clock } from './clock';
export {
  newSpanId,
  newTraceId,
  seedIdGenerator,
  isValidSpanId,
  isValidTraceId,
} from './ids';
