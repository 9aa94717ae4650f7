/**
 * spanline - Collector Module
 */

export { BoundedQueue } from './BoundedQueue';
export { AsyncCollector } from './AsyncCollector';
export type {
  CollectorOptions,
  CollectorStats,
  SinkErrorHandler,
} from './AsyncCollector';
