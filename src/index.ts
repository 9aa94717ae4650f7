/**
 * @fileoverview spanline - in-process telemetry pipeline
 * @description
 * Application code emits structured events (log lines, request timings,
 * function timings) from any number of concurrent call sites. spanline
 * stamps them with the active trace/span ids, buffers them in a bounded
 * queue and hands them to sinks in batches without ever blocking the caller.
 * A rolling-window stats store keeps live latency and error figures.
 *
 * ## Architecture Layers
 *
 * - **domain**: trace context propagation, the event model, exceptions
 * - **application**: collector, emitter, stats, sampling, profiling, host
 * - **infrastructure**: clock, ids, configuration, sink adapters
 *
 * @packageDocumentation
 * @module spanline
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ==================== Version ====================
export const VERSION = '1.0.0';
