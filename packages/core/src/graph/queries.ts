/**
 * Graph Queries
 *
 * Traversals over the dependency index. None of them assume the graph is
 * acyclic: every walk keeps a visited set.
 */

import type { LemmaDependencyIndex } from './builder.js';
import type { TraversalOptions } from './types.js';

export type TraversalDirection = 'dependencies' | 'dependents';

// ============================================================================
// Closure
// ============================================================================

/**
 * Transitive closure from `start`, excluding `start` itself.
 *
 * Iterative depth-first pre-order: a node is listed when first discovered
 * and its neighbours are explored in index order before its siblings.
 * `start` is marked visited up front so a cycle back to it is ignored.
 */
export function collectReachable(
  graph: LemmaDependencyIndex,
  start: string,
  direction: TraversalDirection,
  options: TraversalOptions = {},
): string[] {
  if (!graph.hasNode(start)) return [];

  const includeMissing = options.includeMissing ?? false;
  const neighbours = (node: string): string[] =>
    direction === 'dependencies' ? graph.outNeighbors(node) : graph.inNeighbors(node);

  const visited = new Set<string>([start]);
  const ordered: string[] = [];
  const stack = neighbours(start).reverse();

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (visited.has(node)) continue;
    visited.add(node);

    if (graph.getNodeAttribute(node, 'kind') === 'missing') {
      if (includeMissing) ordered.push(node);
      continue;
    }

    ordered.push(node);

    const next = neighbours(node);
    for (let i = next.length - 1; i >= 0; i--) {
      const candidate = next[i];
      if (candidate !== undefined && !visited.has(candidate)) {
        stack.push(candidate);
      }
    }
  }

  return ordered;
}

/**
 * One-step neighbours of a node
 */
export function adjacent(
  graph: LemmaDependencyIndex,
  node: string,
  direction: TraversalDirection,
  options: TraversalOptions = {},
): string[] {
  if (!graph.hasNode(node)) return [];
  const includeMissing = options.includeMissing ?? false;
  const result = direction === 'dependencies' ? graph.outNeighbors(node) : graph.inNeighbors(node);
  return includeMissing
    ? result
    : result.filter((id) => graph.getNodeAttribute(id, 'kind') === 'lemma');
}

// ============================================================================
// Cycles
// ============================================================================

/**
 * Strongly connected components with more than one member (Tarjan).
 * Members are sorted, and so is the list.
 * Walks an explicit frame stack rather than recursing.
 */
export function findCycles(graph: LemmaDependencyIndex): string[][] {
  let index = 0;
  const stack: string[] = [];
  const onStack = new Set<string>();
  const indexOf = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const components: string[][] = [];

  const enter = (node: string): SearchFrame => {
    indexOf.set(node, index);
    lowLink.set(node, index);
    index++;
    stack.push(node);
    onStack.add(node);
    return { node, neighbours: graph.outNeighbors(node), next: 0 };
  };

  graph.forEachNode((root) => {
    if (indexOf.has(root)) return;
    const frames: SearchFrame[] = [enter(root)];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame === undefined) break;

      const neighbour = frame.neighbours[frame.next];
      if (neighbour !== undefined) {
        frame.next++;
        const neighbourIndex = indexOf.get(neighbour);
        if (neighbourIndex === undefined) {
          frames.push(enter(neighbour));
        } else if (onStack.has(neighbour)) {
          lowLink.set(frame.node, Math.min(lowLink.get(frame.node) ?? neighbourIndex, neighbourIndex));
        }
        continue;
      }

      // All neighbours done: fold the low-link into the caller, then close the component
      frames.pop();
      const low = lowLink.get(frame.node) ?? 0;
      const parent = frames[frames.length - 1];
      if (parent !== undefined) {
        lowLink.set(parent.node, Math.min(lowLink.get(parent.node) ?? low, low));
      }

      if (low === indexOf.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);

        if (component.length > 1) {
          components.push(component.sort(compareIds));
        }
      }
    }
  });

  return components.sort((left, right) => compareIds(left.join('\u0000'), right.join('\u0000')));
}

interface SearchFrame {
  node: string;
  neighbours: string[];
  /** Position of the next neighbour to scan */
  next: number;
}

function compareIds(left: string, right: string): number {
  return left.localeCompare(right, undefined, { numeric: true });
}
