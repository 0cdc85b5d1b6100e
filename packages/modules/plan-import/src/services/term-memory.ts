/**
 * Term Memory: a term → tag map whose contents are an immutable snapshot.
 *
 * Writers build the next snapshot off to the side and publish it with a
 * single assignment. Readers therefore see either the state before a write
 * or after it, never a partially applied batch.
 */

import type { CorrectableTag, TermCorrection } from '../types';

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase();
}

export class TermMemory {
  private snapshot: ReadonlyMap<string, CorrectableTag>;

  constructor(initial: Iterable<TermCorrection> = []) {
    const map = new Map<string, CorrectableTag>();
    for (const c of initial) {
      const term = normalizeTerm(c.term);
      if (term) map.set(term, c.tag);
    }
    this.snapshot = map;
  }

  get size(): number {
    return this.snapshot.size;
  }

  lookup(term: string): CorrectableTag | undefined {
    return this.snapshot.get(normalizeTerm(term));
  }

  /** Latest wins. Returns false when the term was already mapped to `tag`. */
  learn(term: string, tag: CorrectableTag): boolean {
    return this.learnBatch([{ term, tag }]) > 0;
  }

  /** Applies every correction as one snapshot swap; returns how many entries changed. */
  learnBatch(corrections: readonly TermCorrection[]): number {
    const next = new Map(this.snapshot);
    let changed = 0;
    for (const c of corrections) {
      const term = normalizeTerm(c.term);
      if (!term || next.get(term) === c.tag) continue;
      next.set(term, c.tag);
      changed++;
    }
    if (changed > 0) this.snapshot = next;
    return changed;
  }

  forget(term: string): boolean {
    const key = normalizeTerm(term);
    if (!this.snapshot.has(key)) return false;
    const next = new Map(this.snapshot);
    next.delete(key);
    this.snapshot = next;
    return true;
  }

  entries(): Array<[string, CorrectableTag]> {
    return [...this.snapshot.entries()];
  }
}
