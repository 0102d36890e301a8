import { z } from 'zod';
import { ImportConflictError, PersistenceError } from '../errors.js';
import type { CollectionPayload, StoredLemma } from '../models/collection.js';
import type { LemmaStore } from '../store/lemma-store.js';
import { readCollectionFile } from './collection-file.js';

export const ImportConflictPolicySchema = z.enum(['skip', 'reject', 'replace', 'renumber']);
export type ImportConflictPolicy = z.infer<typeof ImportConflictPolicySchema>;

export interface ImportOptions {
  /** What to do with an incoming id that already exists (default: skip) */
  onConflict?: ImportConflictPolicy;
}

export interface ImportResult {
  added: string[];
  replaced: string[];
  skipped: string[];
  /** Incoming id -> id it was stored under */
  renumbered: Record<string, string>;
}

/**
 * Merge a payload into the store. Existing lemmas are only overwritten
 * under the `replace` policy. Every check runs before the first write, so a
 * failed import leaves the store untouched.
 *
 * Ids of deleted lemmas are never reissued: an incoming id the store has
 * retired counts as a conflict. `skip` and `reject` treat it like any other;
 * `renumber` and `replace` store it under a fresh id, since there is nothing
 * to replace.
 */
export function importCollection(
  store: LemmaStore,
  payload: CollectionPayload,
  options: ImportOptions = {},
): ImportResult {
  const policy = options.onConflict ?? 'skip';
  const incoming = Object.entries(payload.records);

  for (const [id, stored] of incoming) {
    if (stored.dependencies.includes(id)) {
      throw new PersistenceError(`Cannot import '${id}': it lists itself as a dependency`);
    }
  }

  const conflicts = incoming
    .filter(([id]) => store.has(id) || store.isRetiredId(id))
    .map(([id]) => id);
  const conflictSet = new Set(conflicts);

  if (policy === 'reject' && conflicts.length > 0) {
    throw new ImportConflictError(conflicts);
  }

  const idMap = new Map<string, string>();
  const incomingIds = new Set(incoming.map(([id]) => id));
  for (const id of conflicts) {
    if (policy === 'renumber' || (policy === 'replace' && store.isRetiredId(id))) {
      idMap.set(id, store.reserveId(incomingIds));
    }
  }

  const result: ImportResult = { added: [], replaced: [], skipped: [], renumbered: {} };

  for (const [id, stored] of incoming) {
    const conflicting = conflictSet.has(id);
    const record = idMap.size > 0 ? rewriteDependencies(stored, idMap) : stored;

    const newId = idMap.get(id);
    if (newId !== undefined) {
      store.adopt(newId, record);
      result.renumbered[id] = newId;
    } else if (conflicting && policy === 'replace') {
      store.adopt(id, record, { replace: true });
      result.replaced.push(id);
    } else if (conflicting) {
      result.skipped.push(id);
    } else {
      store.adopt(id, record);
      result.added.push(id);
    }
  }

  return result;
}

/**
 * Read a collection file and merge it. A missing file is an error here.
 */
export async function importCollectionFile(
  store: LemmaStore,
  path: string,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const payload = await readCollectionFile(path);
  if (!payload) {
    throw new PersistenceError(`Import file not found: ${path}`, path);
  }
  return importCollection(store, payload, options);
}

function rewriteDependencies(stored: StoredLemma, idMap: Map<string, string>): StoredLemma {
  return {
    ...stored,
    dependencies: stored.dependencies.map((dependencyId) => idMap.get(dependencyId) ?? dependencyId),
  };
}
