import { z } from 'zod';
import { INITIAL_ID_COUNTER } from './lemma.js';

export const COLLECTION_FORMAT_VERSION = '1.0.0';

export const CollectionMetadataSchema = z.object({
  created: z.string(),
  last_modified: z.string(),
  version: z.string().default(COLLECTION_FORMAT_VERSION),
});

// Older files store "" for absent optional fields
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim().length === 0 ? undefined : value));

export const StoredLemmaSchema = z.object({
  statement: z.string().refine((value) => value.trim().length > 0, 'statement must be non-empty'),
  proof: optionalText,
  tags: z.array(z.string()).default([]),
  category: optionalText,
  notes: optionalText,
  dependencies: z.array(z.string()).default([]),
  created: z.string(),
  modified: z.string(),
});

const RawCollectionSchema = z.object({
  metadata: CollectionMetadataSchema.optional(),
  id_counter: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional(),
  code_counter: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional(),
  records: z.record(StoredLemmaSchema).optional(),
  lemmas: z.record(StoredLemmaSchema).optional(),
});

/**
 * On-disk payload. Accepts the legacy `code_counter`/`lemmas` keys and
 * normalizes them to `id_counter`/`records`.
 */
export const CollectionPayloadSchema = RawCollectionSchema.transform((raw) => {
  const now = new Date().toISOString();
  return {
    metadata: raw.metadata ?? {
      created: now,
      last_modified: now,
      version: COLLECTION_FORMAT_VERSION,
    },
    id_counter: raw.id_counter ?? raw.code_counter ?? INITIAL_ID_COUNTER,
    records: raw.records ?? raw.lemmas ?? {},
  };
});

export type CollectionMetadata = z.infer<typeof CollectionMetadataSchema>;
export type StoredLemma = z.infer<typeof StoredLemmaSchema>;
export type CollectionPayload = z.output<typeof CollectionPayloadSchema>;

export function createCollectionMetadata(now: Date = new Date()): CollectionMetadata {
  const stamp = now.toISOString();
  return {
    created: stamp,
    last_modified: stamp,
    version: COLLECTION_FORMAT_VERSION,
  };
}
