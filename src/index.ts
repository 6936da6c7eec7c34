/**
 * Step Grid
 *
 * Lays out directed acyclic step graphs on a grid: every node gets a column
 * strictly right of its upstreams, concurrent branches stack into rows.
 */

export * from './types.js';
export * from './layout/index.js';
export * from './jobs/index.js';
