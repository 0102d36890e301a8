/**
 * Lemma Dependency Graph
 *
 * A view over the dependency lists embedded in lemma records, with
 * closure queries in both directions.
 */

// Types
export * from './types.js';

// Index building
export {
  createDependencyIndex,
  buildDependencyIndex,
  getIndexStats,
  exportToDOT,
} from './builder.js';
export type { LemmaDependencyIndex } from './builder.js';

// Queries
export { collectReachable, adjacent, findCycles } from './queries.js';
export type { TraversalDirection } from './queries.js';

// Graph view
export { DependencyGraph } from './dependency-graph.js';
