/**
 * Graph Builder
 *
 * Builds the in-memory dependency index from the records of a store.
 * Uses graphology for adjacency in both directions.
 */

import { DirectedGraph } from 'graphology';
import type {
  RecordSource,
  LemmaNodeAttributes,
  DependencyEdgeAttributes,
  DependencyGraphStats,
} from './types.js';

export type LemmaDependencyIndex = DirectedGraph<LemmaNodeAttributes, DependencyEdgeAttributes>;

// ============================================================================
// Index Creation
// ============================================================================

/**
 * Create an empty directed simple graph for lemma dependencies
 */
export function createDependencyIndex(): LemmaDependencyIndex {
  return new DirectedGraph<LemmaNodeAttributes, DependencyEdgeAttributes>({
    allowSelfLoops: false,
  });
}

/**
 * Build the index for the current state of a record source.
 *
 * Lemma nodes are added in record order, then edges record by record in
 * dependency order, so neighbour iteration is reproducible for identical
 * state. Targets that no longer exist become `missing` nodes.
 */
export function buildDependencyIndex(source: RecordSource): LemmaDependencyIndex {
  const graph = createDependencyIndex();
  const ids = source.ids();

  for (const id of ids) {
    graph.addNode(id, {
      kind: 'lemma',
      label: source.statementOf(id) ?? id,
    });
  }

  for (const id of ids) {
    for (const dependencyId of source.dependenciesOf(id) ?? []) {
      if (dependencyId === id) continue;

      if (!graph.hasNode(dependencyId)) {
        graph.addNode(dependencyId, { kind: 'missing', label: dependencyId });
      }

      if (!graph.hasDirectedEdge(id, dependencyId)) {
        graph.addDirectedEdge(id, dependencyId, {
          dangling: !source.has(dependencyId),
        });
      }
    }
  }

  return graph;
}

// ============================================================================
// Index Stats
// ============================================================================

export function getIndexStats(graph: LemmaDependencyIndex, cycleCount: number): DependencyGraphStats {
  let lemmaCount = 0;
  let rootCount = 0;
  let isolatedCount = 0;
  let danglingEdgeCount = 0;

  graph.forEachNode((node, attrs) => {
    if (attrs.kind !== 'lemma') return;
    lemmaCount++;
    if (graph.outDegree(node) === 0) {
      rootCount++;
      if (graph.inDegree(node) === 0) isolatedCount++;
    }
  });

  graph.forEachEdge((_edge, attrs) => {
    if (attrs.dangling) danglingEdgeCount++;
  });

  return {
    lemmaCount,
    edgeCount: graph.size,
    danglingEdgeCount,
    rootCount,
    isolatedCount,
    cyclic: cycleCount > 0,
    cycleCount,
  };
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Export the index to DOT format for visualization
 */
export function exportToDOT(graph: LemmaDependencyIndex, name = 'LemmaDependencies'): string {
  const lines: string[] = [`digraph ${name} {`];
  lines.push('  rankdir=BT;');
  lines.push('  node [shape=box];');
  lines.push('');

  graph.forEachNode((node, attrs) => {
    if (attrs.kind === 'missing') {
      lines.push(`  "${escapeDOT(node)}" [label="${escapeDOT(node)} (missing)" style=dashed];`);
      return;
    }
    const label = `${node}: ${truncate(attrs.label, 40)}`;
    lines.push(`  "${escapeDOT(node)}" [label="${escapeDOT(label)}"];`);
  });

  lines.push('');

  graph.forEachEdge((_edge, attrs, source, target) => {
    const style = attrs.dangling ? ' [style=dashed]' : '';
    lines.push(`  "${escapeDOT(source)}" -> "${escapeDOT(target)}"${style};`);
  });

  lines.push('}');
  return lines.join('\n');
}

function escapeDOT(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, ' ');
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max - 3) + '...' : value;
}
