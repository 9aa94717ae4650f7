/**
 * spanline - Sinks
 */

export { JsonlFileSink } from './JsonlFileSink';
export type { JsonlFileSinkOptions } from './JsonlFileSink';
export { ConsoleSink, formatEventLine } from './ConsoleSink';
export type { ConsoleSinkOptions } from './ConsoleSink';
