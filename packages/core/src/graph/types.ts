/**
 * Dependency Graph Types
 *
 * Node and edge attributes for the lemma dependency index, and the
 * read/write surface the graph needs from whoever owns the records.
 */

// ============================================================================
// Record access
// ============================================================================

/**
 * What the graph and the guard see of the record store.
 * The graph keeps no records; everything is read through here.
 */
export interface RecordSource {
  /** Bumped on every mutation; the graph index is keyed by it */
  readonly revision: number;
  has(id: string): boolean;
  /** Record ids in insertion order */
  ids(): string[];
  /** Outgoing edges of a record, undefined for unknown ids */
  dependenciesOf(id: string): readonly string[] | undefined;
  statementOf(id: string): string | undefined;
  /** Replace a record's dependency list and refresh its `modified` stamp */
  writeDependencies(id: string, dependencies: string[]): void;
}

// ============================================================================
// Graph attributes
// ============================================================================

export type LemmaNodeKind = 'lemma' | 'missing';

// Type aliases rather than interfaces so they satisfy graphology's Attributes
export type LemmaNodeAttributes = {
  kind: LemmaNodeKind;
  label: string;
};

export type DependencyEdgeAttributes = {
  /** Target no longer exists in the store */
  dangling: boolean;
};

// ============================================================================
// Query results
// ============================================================================

export interface TraversalOptions {
  /** List dangling targets where they are discovered */
  includeMissing?: boolean;
}

export interface DanglingReference {
  referencingId: string;
  missingId: string;
}

export interface DependencyGraphStats {
  lemmaCount: number;
  edgeCount: number;
  danglingEdgeCount: number;
  /** Lemmas without dependencies */
  rootCount: number;
  /** Lemmas with neither dependencies nor dependents */
  isolatedCount: number;
  cyclic: boolean;
  /** Strongly connected components with more than one lemma */
  cycleCount: number;
}
