// Re-export all models
export * from './models/index.js';

// Re-export errors
export * from './errors.js';

// Re-export the record store
export { LemmaStore } from './store/lemma-store.js';
export type { LemmaStoreOptions } from './store/lemma-store.js';

// Re-export graph
export * from './graph/index.js';

// Re-export consistency guard
export { ConsistencyGuard } from './guard/consistency-guard.js';

// Re-export queries
export {
  compileSearch,
  searchLemmas,
  findByTag,
  listCategories,
  listTags,
  UNCATEGORIZED,
} from './query/search.js';
export type { SearchCriteria } from './query/search.js';
export { collectionStatistics } from './query/statistics.js';
export type { CollectionStatistics } from './query/statistics.js';

// Re-export persistence
export {
  DEFAULT_COLLECTION_FILE,
  parseCollectionPayload,
  readCollectionFile,
  writeCollectionFile,
  loadStore,
  saveStore,
} from './persistence/collection-file.js';
export {
  ImportConflictPolicySchema,
  importCollection,
  importCollectionFile,
} from './persistence/import.js';
export type { ImportConflictPolicy, ImportOptions, ImportResult } from './persistence/import.js';

// Re-export export renderers
export {
  ExportFormatSchema,
  DEFAULT_EXPORT_TITLE,
  renderLemma,
  renderCollection,
} from './export/renderers.js';
export type { ExportFormat, CollectionRenderOptions } from './export/renderers.js';
