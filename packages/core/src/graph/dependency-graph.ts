import { ConsistencyGuard } from '../guard/consistency-guard.js';
import {
  buildDependencyIndex,
  exportToDOT,
  getIndexStats,
  type LemmaDependencyIndex,
} from './builder.js';
import { adjacent, collectReachable, findCycles } from './queries.js';
import type { DependencyGraphStats, RecordSource, TraversalOptions } from './types.js';

/**
 * Dependency view over a record source.
 *
 * Owns no records. Edge mutations write through the source; queries run on
 * a graphology index that is rebuilt whenever the source revision moves, so
 * each traversal is O(V+E) after a mutation and cheap until the next one.
 */
export class DependencyGraph {
  private index: LemmaDependencyIndex | null = null;
  private indexRevision = -1;

  constructor(
    private readonly source: RecordSource,
    private readonly guard: ConsistencyGuard = new ConsistencyGuard(source),
  ) {}

  /**
   * Record that `from` depends on `to`. Re-adding an edge is a no-op.
   * Cycles are allowed.
   */
  addEdge(from: string, to: string): boolean {
    this.guard.assertEdge(from, to);

    const current = this.source.dependenciesOf(from) ?? [];
    if (current.includes(to)) return true;

    this.source.writeDependencies(from, [...current, to]);
    return true;
  }

  /**
   * Remove `from -> to`. False when `from` is unknown or the edge is absent;
   * dangling targets can be removed.
   */
  removeEdge(from: string, to: string): boolean {
    const current = this.source.dependenciesOf(from);
    if (current === undefined || !current.includes(to)) return false;

    this.source.writeDependencies(
      from,
      current.filter((id) => id !== to),
    );
    return true;
  }

  /**
   * Everything `id` depends on, directly or transitively
   */
  descendants(id: string, options: TraversalOptions = {}): string[] {
    this.guard.assertExists(id);
    return collectReachable(this.getIndex(), id, 'dependencies', options);
  }

  /**
   * Everything that depends on `id`, directly or transitively
   */
  ancestors(id: string): string[] {
    this.guard.assertExists(id);
    return collectReachable(this.getIndex(), id, 'dependents');
  }

  directDependencies(id: string, options: TraversalOptions = {}): string[] {
    this.guard.assertExists(id);
    return adjacent(this.getIndex(), id, 'dependencies', options);
  }

  directDependents(id: string): string[] {
    this.guard.assertExists(id);
    return adjacent(this.getIndex(), id, 'dependents');
  }

  findCycles(): string[][] {
    return findCycles(this.getIndex());
  }

  stats(): DependencyGraphStats {
    const index = this.getIndex();
    return getIndexStats(index, findCycles(index).length);
  }

  toDOT(): string {
    return exportToDOT(this.getIndex());
  }

  private getIndex(): LemmaDependencyIndex {
    if (this.index === null || this.indexRevision !== this.source.revision) {
      this.index = buildDependencyIndex(this.source);
      this.indexRevision = this.source.revision;
    }
    return this.index;
  }
}
