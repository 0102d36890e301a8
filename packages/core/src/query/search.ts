import { PatternError } from '../errors.js';
import { hasProof, normalizeTag, normalizeTags, type LemmaRecord } from '../models/lemma.js';
import type { LemmaStore } from '../store/lemma-store.js';

export interface SearchCriteria {
  /** Substring, or a pattern when `regex` is set; matched against statement, proof and notes */
  text?: string;
  /** Every tag must be present */
  tags?: string[];
  category?: string;
  hasProof?: boolean;
  regex?: boolean;
}

export const UNCATEGORIZED = 'uncategorized';

type RecordPredicate = (record: LemmaRecord) => boolean;

/**
 * Compile the criteria into one predicate. Unsupplied filters are skipped.
 * Throws PatternError for an invalid regex.
 */
export function compileSearch(criteria: SearchCriteria): RecordPredicate {
  const predicates: RecordPredicate[] = [];

  if (criteria.category !== undefined) {
    const category = criteria.category;
    predicates.push((record) => record.category === category);
  }

  if (criteria.hasProof !== undefined) {
    const wanted = criteria.hasProof;
    predicates.push((record) => hasProof(record) === wanted);
  }

  if (criteria.tags !== undefined && criteria.tags.length > 0) {
    const required = normalizeTags(criteria.tags);
    predicates.push((record) => required.every((tag) => record.tags.includes(tag)));
  }

  if (criteria.text !== undefined && criteria.text.length > 0) {
    predicates.push(compileTextMatcher(criteria.text, criteria.regex ?? false));
  }

  return (record) => predicates.every((predicate) => predicate(record));
}

function compileTextMatcher(text: string, regex: boolean): RecordPredicate {
  let test: (value: string) => boolean;

  if (regex) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(text, 'i');
    } catch (err) {
      throw new PatternError(text, err);
    }
    test = (value) => pattern.test(value);
  } else {
    const needle = text.toLowerCase();
    test = (value) => value.toLowerCase().includes(needle);
  }

  return (record) =>
    [record.statement, record.proof, record.notes].some(
      (field) => field !== undefined && test(field),
    );
}

/**
 * Search the store. Read-only; results keep record order.
 */
export function searchLemmas(store: LemmaStore, criteria: SearchCriteria = {}): Map<string, LemmaRecord> {
  const matches = compileSearch(criteria);
  const results = new Map<string, LemmaRecord>();
  for (const record of store.records()) {
    if (matches(record)) results.set(record.id, record);
  }
  return results;
}

export function findByTag(store: LemmaStore, tag: string): Map<string, LemmaRecord> {
  return searchLemmas(store, { tags: [tag] });
}

/**
 * Lemma count per category, records without one under `uncategorized`
 */
export function listCategories(store: LemmaStore): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of store.records()) {
    const category = record.category ?? UNCATEGORIZED;
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return counts;
}

export function listTags(store: LemmaStore): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of store.records()) {
    for (const tag of record.tags) {
      const key = normalizeTag(tag);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return counts;
}
