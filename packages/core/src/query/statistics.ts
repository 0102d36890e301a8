import type { CollectionMetadata } from '../models/collection.js';
import { hasProof } from '../models/lemma.js';
import type { LemmaStore } from '../store/lemma-store.js';
import { listCategories, listTags } from './search.js';

export interface CollectionStatistics {
  totalLemmas: number;
  withProof: number;
  withoutProof: number;
  withDependencies: number;
  dependencyEdges: number;
  danglingReferences: number;
  cycles: number;
  categories: Record<string, number>;
  tags: Record<string, number>;
  metadata: CollectionMetadata;
}

export function collectionStatistics(store: LemmaStore): CollectionStatistics {
  const records = store.records();
  const withProof = records.filter(hasProof).length;
  const graphStats = store.graph.stats();

  return {
    totalLemmas: records.length,
    withProof,
    withoutProof: records.length - withProof,
    withDependencies: records.filter((record) => record.dependencies.length > 0).length,
    dependencyEdges: graphStats.edgeCount,
    danglingReferences: graphStats.danglingEdgeCount,
    cycles: graphStats.cycleCount,
    categories: Object.fromEntries(listCategories(store)),
    tags: Object.fromEntries(listTags(store)),
    metadata: store.getMetadata(),
  };
}
