/**
 * @forkcov/types - Type definitions for the forkcov branch coverage engine
 */

// Decorated AST nodes
export * from './nodes.js';

// Branded ids
export type { NodeIndex, TrackerId } from './branded.js';
export { toNodeIndex, toTrackerId } from './branded.js';

// Counter store
export type * from './counters.js';

// Branch report
export type * from './report.js';
