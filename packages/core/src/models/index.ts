// Lemma models
export {
  LemmaRecordSchema,
  NewLemmaSchema,
  LemmaPatchSchema,
  LEMMA_ID_PREFIX,
  INITIAL_ID_COUNTER,
  IMMUTABLE_FIELDS,
  createLemmaId,
  parseLemmaIdNumber,
  normalizeTag,
  normalizeTags,
  normalizeOptionalText,
  hasProof,
  cloneLemma,
} from './lemma.js';

export type { LemmaRecord, NewLemma, LemmaPatch, LemmaSummary } from './lemma.js';

// Collection payload models
export {
  CollectionMetadataSchema,
  StoredLemmaSchema,
  CollectionPayloadSchema,
  COLLECTION_FORMAT_VERSION,
  createCollectionMetadata,
} from './collection.js';

export type { CollectionMetadata, StoredLemma, CollectionPayload } from './collection.js';
