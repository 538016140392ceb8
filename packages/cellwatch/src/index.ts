/**
 * cellwatch
 *
 * Reactive cells, wait-for-any aggregation, and the helpers that build on
 * them.
 *
 * This package re-exports everything from @cellwatch/core and
 * @cellwatch/helpers for convenience.
 */

// Re-export using the package names (resolved via package.json exports)
export * from '@cellwatch/core';
export * from '@cellwatch/helpers';
