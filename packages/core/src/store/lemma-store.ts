import {
  IMMUTABLE_FIELDS,
  INITIAL_ID_COUNTER,
  LemmaPatchSchema,
  cloneLemma,
  createLemmaId,
  normalizeOptionalText,
  normalizeTags,
  parseLemmaIdNumber,
  type LemmaPatch,
  type LemmaRecord,
  type LemmaSummary,
  type NewLemma,
} from '../models/lemma.js';
import {
  createCollectionMetadata,
  type CollectionMetadata,
  type CollectionPayload,
  type StoredLemma,
} from '../models/collection.js';
import { PersistenceError, SelfLoopError, UnknownRecordError, ValidationError } from '../errors.js';
import { ConsistencyGuard } from '../guard/consistency-guard.js';
import { DependencyGraph } from '../graph/dependency-graph.js';
import type { DanglingReference, RecordSource } from '../graph/types.js';

export interface LemmaStoreOptions {
  /** Clock used for every timestamp the store writes */
  now?: () => Date;
}

type OptionalTextField = 'proof' | 'category' | 'notes';

/**
 * Owns the lemma records and the id counter.
 *
 * Every mutation bumps `revision`, refreshes the collection's
 * `last_modified` and marks the store dirty. The store never writes to disk;
 * callers persist `toPayload()` and then call `markClean()`.
 */
export class LemmaStore implements RecordSource {
  readonly guard: ConsistencyGuard;
  readonly graph: DependencyGraph;

  private readonly lemmas = new Map<string, LemmaRecord>();
  private readonly now: () => Date;
  private idCounter = INITIAL_ID_COUNTER;
  private metadata: CollectionMetadata;
  private currentRevision = 0;
  private dirty = false;

  constructor(options: LemmaStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.metadata = createCollectionMetadata(this.now());
    this.guard = new ConsistencyGuard(this);
    this.graph = new DependencyGraph(this, this.guard);
  }

  /**
   * Rebuild a store from a persisted payload.
   * Throws PersistenceError when the payload breaks a record invariant.
   */
  static fromPayload(payload: CollectionPayload, options: LemmaStoreOptions = {}): LemmaStore {
    const store = new LemmaStore(options);
    store.metadata = { ...payload.metadata };
    store.idCounter = payload.id_counter;

    for (const [id, stored] of Object.entries(payload.records)) {
      if (stored.dependencies.includes(id)) {
        throw new PersistenceError(`Lemma '${id}' lists itself as a dependency`);
      }
      store.lemmas.set(id, fromStored(id, stored));
      store.bumpCounterPast(id);
    }

    return store;
  }

  // ==========================================================================
  // Create / read / update / delete
  // ==========================================================================

  add(input: NewLemma): string {
    if (input.statement.trim().length === 0) {
      throw new ValidationError('statement must be non-empty', 'statement');
    }

    const id = this.reserveId();
    const stamp = this.now().toISOString();
    const record: LemmaRecord = {
      id,
      statement: input.statement.trim(),
      tags: normalizeTags(input.tags ?? []),
      dependencies: [],
      created: stamp,
      modified: stamp,
    };
    setOptional(record, 'proof', input.proof);
    setOptional(record, 'category', input.category);
    setOptional(record, 'notes', input.notes);

    this.lemmas.set(id, record);
    this.bump(stamp);
    return id;
  }

  get(id: string): LemmaRecord | undefined {
    const record = this.lemmas.get(id);
    return record ? cloneLemma(record) : undefined;
  }

  require(id: string): LemmaRecord {
    const record = this.get(id);
    if (!record) throw new UnknownRecordError(id);
    return record;
  }

  has(id: string): boolean {
    return this.lemmas.has(id);
  }

  /**
   * Merge the fields present in `patch`. False for an unknown id.
   */
  update(id: string, patch: LemmaPatch): boolean {
    const record = this.lemmas.get(id);
    if (!record) return false;

    for (const field of IMMUTABLE_FIELDS) {
      if (Object.prototype.hasOwnProperty.call(patch, field)) {
        throw new ValidationError(`Field '${field}' cannot be updated`, field);
      }
    }

    const parsed = LemmaPatchSchema.safeParse(patch);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Invalid update for '${id}': ${issue?.message ?? 'unrecognized patch'}`,
        issue?.path.join('.'),
      );
    }
    const changes = parsed.data;

    if (changes.statement !== undefined && changes.statement.trim().length === 0) {
      throw new ValidationError('statement must be non-empty', 'statement');
    }

    if (changes.statement !== undefined) record.statement = changes.statement.trim();
    if (changes.tags !== undefined) record.tags = normalizeTags(changes.tags);
    for (const field of ['proof', 'category', 'notes'] as const) {
      if (changes[field] !== undefined) setOptional(record, field, changes[field]);
    }

    this.touch(record);
    return true;
  }

  /**
   * Remove a lemma. References to it elsewhere are left in place.
   */
  delete(id: string): boolean {
    if (!this.lemmas.delete(id)) return false;
    this.bump(this.now().toISOString());
    return true;
  }

  list(): LemmaSummary[] {
    return Array.from(this.lemmas.values(), (record) => ({
      id: record.id,
      statement: record.statement,
    }));
  }

  records(): LemmaRecord[] {
    return Array.from(this.lemmas.values(), cloneLemma);
  }

  get size(): number {
    return this.lemmas.size;
  }

  // ==========================================================================
  // Dependencies
  // ==========================================================================

  addDependency(from: string, to: string): boolean {
    return this.graph.addEdge(from, to);
  }

  removeDependency(from: string, to: string): boolean {
    return this.graph.removeEdge(from, to);
  }

  findDangling(): DanglingReference[] {
    return this.guard.findDangling();
  }

  // ==========================================================================
  // RecordSource
  // ==========================================================================

  get revision(): number {
    return this.currentRevision;
  }

  ids(): string[] {
    return Array.from(this.lemmas.keys());
  }

  dependenciesOf(id: string): readonly string[] | undefined {
    return this.lemmas.get(id)?.dependencies;
  }

  statementOf(id: string): string | undefined {
    return this.lemmas.get(id)?.statement;
  }

  writeDependencies(id: string, dependencies: string[]): void {
    const record = this.lemmas.get(id);
    if (!record) throw new UnknownRecordError(id);
    if (dependencies.includes(id)) throw new SelfLoopError(id);
    record.dependencies = [...new Set(dependencies)];
    this.touch(record);
  }

  // ==========================================================================
  // Ids and import support
  // ==========================================================================

  /**
   * Allocate the next unused id, skipping any in `avoid`. The counter only
   * grows, so ids of deleted lemmas are never handed out again.
   */
  reserveId(avoid: ReadonlySet<string> = new Set()): string {
    this.assertCounterInRange();
    let id = createLemmaId(this.idCounter);
    while (this.lemmas.has(id) || avoid.has(id)) {
      this.idCounter++;
      this.assertCounterInRange();
      id = createLemmaId(this.idCounter);
    }
    this.idCounter++;
    return id;
  }

  /**
   * True for an `L<n>` id this store has issued (or loaded) and since deleted.
   * Such ids stay retired; import treats them as conflicts.
   */
  isRetiredId(id: string): boolean {
    if (this.lemmas.has(id)) return false;
    const numeric = parseLemmaIdNumber(id);
    return numeric !== null && numeric >= INITIAL_ID_COUNTER && numeric < this.idCounter;
  }

  /**
   * Insert a persisted record under `id`, keeping its timestamps.
   * Overwrites only when `replace` is set; the import layer decides that.
   */
  adopt(id: string, stored: StoredLemma, options: { replace?: boolean } = {}): void {
    if (this.lemmas.has(id) && !options.replace) {
      throw new ValidationError(`Lemma '${id}' already exists`, 'id');
    }
    if (stored.dependencies.includes(id)) throw new SelfLoopError(id);

    this.lemmas.set(id, fromStored(id, stored));
    this.bumpCounterPast(id);
    this.bump(this.now().toISOString());
  }

  get nextIdCounter(): number {
    return this.idCounter;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  get isDirty(): boolean {
    return this.dirty;
  }

  markClean(): void {
    this.dirty = false;
  }

  getMetadata(): CollectionMetadata {
    return { ...this.metadata };
  }

  toPayload(): CollectionPayload {
    const records: Record<string, StoredLemma> = {};
    for (const record of this.lemmas.values()) {
      records[record.id] = toStored(record);
    }
    return {
      metadata: { ...this.metadata },
      id_counter: this.idCounter,
      records,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private touch(record: LemmaRecord): void {
    const stamp = this.now().toISOString();
    record.modified = stamp;
    this.bump(stamp);
  }

  private bump(stamp: string): void {
    this.metadata.last_modified = stamp;
    this.currentRevision++;
    this.dirty = true;
  }

  private assertCounterInRange(): void {
    if (!Number.isSafeInteger(this.idCounter)) {
      throw new ValidationError(`Id counter ${this.idCounter} is past the last issuable id`, 'id');
    }
  }

  private bumpCounterPast(id: string): void {
    const numeric = parseLemmaIdNumber(id);
    if (numeric !== null && numeric >= this.idCounter) {
      this.idCounter = numeric + 1;
    }
  }
}

function setOptional(
  record: LemmaRecord,
  field: OptionalTextField,
  value: string | null | undefined,
): void {
  const normalized = normalizeOptionalText(value);
  if (normalized === undefined) {
    delete record[field];
  } else {
    record[field] = normalized;
  }
}

function fromStored(id: string, stored: StoredLemma): LemmaRecord {
  const record: LemmaRecord = {
    id,
    statement: stored.statement,
    tags: normalizeTags(stored.tags),
    dependencies: [...new Set(stored.dependencies)],
    created: stored.created,
    modified: stored.modified,
  };
  setOptional(record, 'proof', stored.proof);
  setOptional(record, 'category', stored.category);
  setOptional(record, 'notes', stored.notes);
  return record;
}

function toStored(record: LemmaRecord): StoredLemma {
  const stored: StoredLemma = {
    statement: record.statement,
    tags: [...record.tags],
    dependencies: [...record.dependencies],
    created: record.created,
    modified: record.modified,
  };
  if (record.proof !== undefined) stored.proof = record.proof;
  if (record.category !== undefined) stored.category = record.category;
  if (record.notes !== undefined) stored.notes = record.notes;
  return stored;
}
