import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { PersistenceError } from '../errors.js';
import { CollectionPayloadSchema, type CollectionPayload } from '../models/collection.js';
import { LemmaStore, type LemmaStoreOptions } from '../store/lemma-store.js';

export const DEFAULT_COLLECTION_FILE = 'lemmas.json';

/**
 * Validate an already-parsed payload
 */
export function parseCollectionPayload(raw: unknown, source?: string): CollectionPayload {
  try {
    return CollectionPayloadSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const validationError = fromZodError(err, {
        prefix: 'Invalid lemma collection',
        prefixSeparator: ': ',
      });
      const where = source ? ` in ${source}` : '';
      throw new PersistenceError(`${validationError.message}${where}`, source, err);
    }
    throw err;
  }
}

/**
 * Read and validate a collection file. Resolves to null when the file does
 * not exist; every other failure is a PersistenceError.
 */
export async function readCollectionFile(path: string): Promise<CollectionPayload | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new PersistenceError(`Failed to read ${path}: ${describeError(err)}`, path, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new PersistenceError(`Invalid JSON in ${path}: ${describeError(err)}`, path, err);
  }

  return parseCollectionPayload(raw, path);
}

export async function writeCollectionFile(path: string, payload: CollectionPayload): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(payload, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new PersistenceError(`Failed to write ${path}: ${describeError(err)}`, path, err);
  }
}

/**
 * Load a store from `path`, or an empty store when the file is absent
 */
export async function loadStore(path: string, options: LemmaStoreOptions = {}): Promise<LemmaStore> {
  const payload = await readCollectionFile(path);
  return payload ? LemmaStore.fromPayload(payload, options) : new LemmaStore(options);
}

/**
 * Write the store if it has unsaved changes. Resolves to whether it wrote.
 */
export async function saveStore(path: string, store: LemmaStore): Promise<boolean> {
  if (!store.isDirty) return false;
  await writeCollectionFile(path, store.toPayload());
  store.markClean();
  return true;
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
