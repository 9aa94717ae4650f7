/**
 * spanline - Stats Module
 */

export { StatsStore } from './StatsStore';
export type { StatsStoreOptions, StatsSummary, ErrorItemInput } from './StatsStore';
export { ErrorRing } from './ErrorRing';
export type { ErrorItem } from './ErrorRing';
export { LatencyHistogram, bucketIndex, bucketValue } from './LatencyHistogram';
