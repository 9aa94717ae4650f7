/**
 * spanline - Profiling Module
 */

export { profile } from './profile';
export type { ProfileOptions } from './profile';
export { withSpan } from './span';
export type { SpanInfo, SpanOptions } from './span';
