/**
 * spanline - Emitter Module
 */

export { Emitter } from './Emitter';
export type { EmitterOptions, EventQueue, LogLevelName } from './Emitter';
