/**
 * spanline - Sampling Module
 */

export { SamplingPolicy } from './SamplingPolicy';
export type { SamplingDecision, SamplingContext } from './SamplingPolicy';
