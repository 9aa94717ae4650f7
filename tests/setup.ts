/**
 * @fileoverview Jest test setup
 *
 * Silences pipeline logging for every test file.
 */

export {};

process.env.SPANLINE_LOG_LEVEL = 'silent';
