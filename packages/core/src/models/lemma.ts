import { z } from 'zod';

export const LEMMA_ID_PREFIX = 'L';
export const INITIAL_ID_COUNTER = 1000;

// Stored record shape. Optional text fields are omitted when absent.
export const LemmaRecordSchema = z.object({
  id: z.string().min(1),
  statement: z.string().min(1),
  proof: z.string().optional(),
  tags: z.array(z.string()),
  category: z.string().optional(),
  notes: z.string().optional(),
  dependencies: z.array(z.string()),
  created: z.string(),
  modified: z.string(),
});

// Input accepted by LemmaStore.add
export const NewLemmaSchema = z.object({
  statement: z.string(),
  proof: z.string().optional(),
  tags: z.array(z.string()).optional(),
  category: z.string().optional(),
  notes: z.string().optional(),
});

// Partial update. `null` clears an optional field; unknown keys are refused.
export const LemmaPatchSchema = z
  .object({
    statement: z.string(),
    proof: z.string().nullable(),
    tags: z.array(z.string()),
    category: z.string().nullable(),
    notes: z.string().nullable(),
  })
  .partial()
  .strict();

export type LemmaRecord = z.infer<typeof LemmaRecordSchema>;
export type NewLemma = z.infer<typeof NewLemmaSchema>;
export type LemmaPatch = z.infer<typeof LemmaPatchSchema>;

export interface LemmaSummary {
  id: string;
  statement: string;
}

/**
 * Fields a patch may never carry
 */
export const IMMUTABLE_FIELDS = ['id', 'created', 'modified', 'dependencies'] as const;

export function createLemmaId(counter: number): string {
  return `${LEMMA_ID_PREFIX}${counter}`;
}

/**
 * Numeric part of an `L<n>` id, or null for ids from elsewhere and for
 * numbers past the safe integer range
 */
export function parseLemmaIdNumber(id: string): number | null {
  const match = /^L(\d+)$/.exec(id);
  if (!match || match[1] === undefined) return null;
  const numeric = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(numeric) ? numeric : null;
}

/**
 * Normalize a tag: trimmed, lower-cased, inner whitespace collapsed to '-'
 */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, '-');
}

/**
 * Normalize a tag list, dropping empties and later duplicates
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized.length === 0 || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }
  return result;
}

/**
 * Blank optional text counts as absent
 */
export function normalizeOptionalText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return value.trim().length === 0 ? undefined : value;
}

export function hasProof(record: LemmaRecord): boolean {
  return record.proof !== undefined;
}

export function cloneLemma(record: LemmaRecord): LemmaRecord {
  return {
    ...record,
    tags: [...record.tags],
    dependencies: [...record.dependencies],
  };
}
