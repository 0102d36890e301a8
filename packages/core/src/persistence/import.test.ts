import { describe, it, expect, vi, beforeEach } from 'vitest';
import { vol } from 'memfs';
import { ImportConflictError, PersistenceError } from '../errors.js';
import type { CollectionPayload, StoredLemma } from '../models/collection.js';
import { LemmaStore } from '../store/lemma-store.js';
import { importCollection, importCollectionFile } from './import.js';

vi.mock('fs/promises', async () => {
  const memfs = await import('memfs');
  return {
    ...memfs.fs.promises,
    default: memfs.fs.promises,
  };
});

function stored(statement: string, dependencies: string[] = []): StoredLemma {
  return {
    statement,
    tags: [],
    dependencies,
    created: '2023-06-01T00:00:00.000Z',
    modified: '2023-06-01T00:00:00.000Z',
  };
}

function payload(records: Record<string, StoredLemma>): CollectionPayload {
  return {
    metadata: {
      created: '2023-06-01T00:00:00.000Z',
      last_modified: '2023-06-01T00:00:00.000Z',
      version: '1.0.0',
    },
    id_counter: 2000,
    records,
  };
}

describe('importCollection', () => {
  let store: LemmaStore;

  beforeEach(() => {
    store = new LemmaStore();
    store.add({ statement: 'local A' });
    store.add({ statement: 'local B' });
  });

  const incoming = payload({
    L1001: stored('incoming B'),
    L1002: stored('incoming C', ['L1001']),
  });

  it('adds new records and skips conflicts by default', () => {
    const result = importCollection(store, incoming);

    expect(result).toEqual({ added: ['L1002'], replaced: [], skipped: ['L1001'], renumbered: {} });
    expect(store.require('L1001').statement).toBe('local B');
    expect(store.require('L1002').statement).toBe('incoming C');
    expect(store.require('L1002').created).toBe('2023-06-01T00:00:00.000Z');
  });

  it('replaces conflicts under the replace policy', () => {
    const result = importCollection(store, incoming, { onConflict: 'replace' });

    expect(result.replaced).toEqual(['L1001']);
    expect(result.added).toEqual(['L1002']);
    expect(store.require('L1001').statement).toBe('incoming B');
  });

  it('changes nothing under the reject policy', () => {
    const revision = store.revision;

    expect(() => importCollection(store, incoming, { onConflict: 'reject' })).toThrow(
      ImportConflictError,
    );
    expect(store.size).toBe(2);
    expect(store.revision).toBe(revision);
  });

  it('renumbers conflicts and rewrites references to them', () => {
    const result = importCollection(store, incoming, { onConflict: 'renumber' });

    expect(result.renumbered).toEqual({ L1001: 'L1003' });
    expect(result.added).toEqual(['L1002']);
    expect(store.require('L1001').statement).toBe('local B');
    expect(store.require('L1003').statement).toBe('incoming B');
    expect(store.require('L1002').dependencies).toEqual(['L1003']);
    expect(store.add({ statement: 'after import' })).toBe('L1004');
  });

  it('advances the counter past imported ids', () => {
    importCollection(store, payload({ L1500: stored('far ahead') }));

    expect(store.add({ statement: 'next' })).toBe('L1501');
  });

  it('refuses records that depend on themselves', () => {
    expect(() => importCollection(store, payload({ L1700: stored('loop', ['L1700']) }))).toThrow(
      "Cannot import 'L1700': it lists itself as a dependency",
    );
  });

  it('leaves the store untouched when a later record is invalid', () => {
    const revision = store.revision;

    expect(() =>
      importCollection(
        store,
        payload({
          L2000: stored('fine'),
          L2001: stored('loop', ['L2001']),
        }),
      ),
    ).toThrow(PersistenceError);
    expect(store.size).toBe(2);
    expect(store.has('L2000')).toBe(false);
    expect(store.revision).toBe(revision);
    expect(store.nextIdCounter).toBe(1002);
  });
});

describe('importCollection with deleted ids', () => {
  let store: LemmaStore;

  // L1001 depends on L1000, which is then deleted
  beforeEach(() => {
    store = new LemmaStore();
    const base = store.add({ statement: 'base' });
    const derived = store.add({ statement: 'derived' });
    store.addDependency(derived, base);
    store.delete(base);
  });

  const unrelated = payload({ L1000: stored('unrelated') });

  it('skips an id the store has retired', () => {
    const result = importCollection(store, unrelated);

    expect(result).toEqual({ added: [], replaced: [], skipped: ['L1000'], renumbered: {} });
    expect(store.has('L1000')).toBe(false);
    expect(store.findDangling()).toEqual([{ referencingId: 'L1001', missingId: 'L1000' }]);
  });

  it('rejects a retired id under the reject policy', () => {
    expect(() => importCollection(store, unrelated, { onConflict: 'reject' })).toThrow(
      ImportConflictError,
    );
    expect(store.has('L1000')).toBe(false);
  });

  it('gives a retired id a fresh one under renumber', () => {
    const result = importCollection(store, unrelated, { onConflict: 'renumber' });

    expect(result.renumbered).toEqual({ L1000: 'L1002' });
    expect(store.require('L1002').statement).toBe('unrelated');
    expect(store.findDangling()).toEqual([{ referencingId: 'L1001', missingId: 'L1000' }]);
  });

  it('gives a retired id a fresh one under replace', () => {
    const result = importCollection(store, unrelated, { onConflict: 'replace' });

    expect(result).toEqual({
      added: [],
      replaced: [],
      skipped: [],
      renumbered: { L1000: 'L1002' },
    });
    expect(store.has('L1000')).toBe(false);
  });
});

describe('importCollectionFile', () => {
  beforeEach(() => {
    vol.reset();
  });

  it('reads and merges a collection file', async () => {
    vol.fromJSON({
      '/incoming.json': JSON.stringify({ records: { L1000: stored('from file') } }),
    });
    const store = new LemmaStore();

    const result = await importCollectionFile(store, '/incoming.json');

    expect(result.added).toEqual(['L1000']);
    expect(store.require('L1000').statement).toBe('from file');
  });

  it('fails when the file is missing', async () => {
    const store = new LemmaStore();

    await expect(importCollectionFile(store, '/nowhere.json')).rejects.toThrow(PersistenceError);
  });
});
