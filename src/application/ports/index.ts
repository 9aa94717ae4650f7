/**
 * spanline - Ports
 *
 * Contracts implemented by infrastructure adapters.
 */

export type { ISink, SinkFunction } from './ISink';
export { toSink } from './ISink';
