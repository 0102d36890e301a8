import { SelfLoopError, UnknownRecordError } from '../errors.js';
import type { DanglingReference, RecordSource } from '../graph/types.js';

/**
 * Validates edge mutations against the store and reports references to
 * lemmas that no longer exist. Deletion never cascades, so dangling
 * references are a normal, queryable state.
 */
export class ConsistencyGuard {
  constructor(private readonly source: RecordSource) {}

  /**
   * Throws unless `from -> to` may be added. `from` is checked first.
   */
  assertEdge(from: string, to: string): void {
    if (from === to) {
      if (!this.source.has(from)) throw new UnknownRecordError(from);
      throw new SelfLoopError(from);
    }
    if (!this.source.has(from)) throw new UnknownRecordError(from);
    if (!this.source.has(to)) throw new UnknownRecordError(to);
  }

  assertExists(id: string): void {
    if (!this.source.has(id)) throw new UnknownRecordError(id);
  }

  /**
   * Every dependency pointing at a missing lemma, in record then dependency order
   */
  findDangling(): DanglingReference[] {
    const dangling: DanglingReference[] = [];
    for (const referencingId of this.source.ids()) {
      for (const missingId of this.source.dependenciesOf(referencingId) ?? []) {
        if (!this.source.has(missingId)) {
          dangling.push({ referencingId, missingId });
        }
      }
    }
    return dangling;
  }

  /**
   * Strip all dangling references and return what was removed
   */
  repairDangling(): DanglingReference[] {
    const removed = this.findDangling();
    const affected = new Set(removed.map((ref) => ref.referencingId));

    for (const id of affected) {
      const kept = (this.source.dependenciesOf(id) ?? []).filter((dep) => this.source.has(dep));
      this.source.writeDependencies(id, kept);
    }

    return removed;
  }
}
