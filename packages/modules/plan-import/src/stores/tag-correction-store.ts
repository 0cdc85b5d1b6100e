import { generateUlid } from '@tallyplan/shared';
import type { CorrectedTermStat, CorrectionModelType, TagCorrection } from '../types';

export interface SaveCorrectionInput {
  userId: string;
  /** Already normalized */
  term: string;
  predictedTag: string | null;
  correctedTag: string;
  modelType: CorrectionModelType;
  sourceFileId?: string | null;
}

/**
 * Persistence for tag corrections. One row per (user, term, model type);
 * saving again overwrites the previous correction.
 */
export interface TagCorrectionStore {
  /** Oldest first, so replaying the list leaves the latest correction in place. */
  getUserCorrections(userId: string, modelType?: CorrectionModelType): Promise<TagCorrection[]>;
  saveCorrection(input: SaveCorrectionInput): Promise<TagCorrection>;
  /** Returns false when nothing was stored under that key. */
  deleteCorrection(userId: string, term: string, modelType: CorrectionModelType): Promise<boolean>;
  /** Term/tag pairs ranked by how many distinct users made that correction. */
  getMostCorrectedTerms(limit: number, modelType?: CorrectionModelType): Promise<CorrectedTermStat[]>;
}

function keyOf(userId: string, term: string, modelType: CorrectionModelType): string {
  return `${userId}\u0000${term}\u0000${modelType}`;
}

/** Process-local store for tests and single-node development. */
export class InMemoryTagCorrectionStore implements TagCorrectionStore {
  private readonly rows = new Map<string, TagCorrection>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getUserCorrections(userId: string, modelType: CorrectionModelType = 'TEXT'): Promise<TagCorrection[]> {
    return [...this.rows.values()]
      .filter((r) => r.userId === userId && r.modelType === modelType)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .map((r) => ({ ...r }));
  }

  async saveCorrection(input: SaveCorrectionInput): Promise<TagCorrection> {
    const key = keyOf(input.userId, input.term, input.modelType);
    const existing = this.rows.get(key);
    const timestamp = this.now();
    const row: TagCorrection = {
      id: existing?.id ?? generateUlid(),
      userId: input.userId,
      term: input.term,
      predictedTag: input.predictedTag,
      correctedTag: input.correctedTag,
      modelType: input.modelType,
      sourceFileId: input.sourceFileId ?? null,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.rows.set(key, row);
    return { ...row };
  }

  async deleteCorrection(userId: string, term: string, modelType: CorrectionModelType): Promise<boolean> {
    return this.rows.delete(keyOf(userId, term, modelType));
  }

  async getMostCorrectedTerms(limit: number, modelType: CorrectionModelType = 'TEXT'): Promise<CorrectedTermStat[]> {
    const users = new Map<string, { term: string; correctedTag: string; ids: Set<string> }>();
    for (const r of this.rows.values()) {
      if (r.modelType !== modelType) continue;
      const key = `${r.term}\u0000${r.correctedTag}`;
      const entry = users.get(key) ?? { term: r.term, correctedTag: r.correctedTag, ids: new Set<string>() };
      entry.ids.add(r.userId);
      users.set(key, entry);
    }
    return [...users.values()]
      .map((e) => ({ term: e.term, correctedTag: e.correctedTag, userCount: e.ids.size }))
      .sort((a, b) => b.userCount - a.userCount || a.term.localeCompare(b.term))
      .slice(0, Math.max(0, limit));
  }
}
