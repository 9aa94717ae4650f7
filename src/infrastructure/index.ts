/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations of external concerns:
 *
 * - **Runtime**: nanosecond clock and trace/span id generation
 * - **Config**: zod schemas and the `SPANLINE_*` environment loader
 * - **Sinks**: rotating JSONL files and console output
 *
 * @packageDocumentation
 * @module spanline/infrastructure
 */

// Clock & identifiers
export * from './runtime';

// Configuration
export * from './config';

// Sink adapters
export * from './sinks';
