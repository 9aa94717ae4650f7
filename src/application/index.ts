/**
 * @module spanline/application
 * @description Application layer exports
 */

// ============================================================================
// Ports
// ============================================================================

export * from './ports';

// ============================================================================
// Collector
// ============================================================================

export * from './collector';

// ============================================================================
// Emitter, Sampling & Profiling
// ============================================================================

export * from './emitter';
export * from './sampling';
export * from './profiling';

// ============================================================================
// Statistics
// ============================================================================

export * from './stats';

// ============================================================================
// Host, Background Services & Logging
// ============================================================================

export * from './host';
