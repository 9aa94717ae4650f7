/**
 * @module spanline/domain
 * @description Domain layer exports
 */

// ============================================================================
// Context Propagation
// ============================================================================

export * from './context';

// ============================================================================
// Telemetry Events
// ============================================================================

export * from './events';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
