import { and, asc, desc, eq, sql } from 'drizzle-orm';
import { tagCorrections } from '@tallyplan/db';
import type { Database, TagCorrectionRow } from '@tallyplan/db';
import type { CorrectedTermStat, CorrectionModelType, TagCorrection } from '../types';
import type { SaveCorrectionInput, TagCorrectionStore } from './tag-correction-store';

function toCorrection(row: TagCorrectionRow, modelType: CorrectionModelType): TagCorrection {
  return {
    id: row.id,
    userId: row.userId,
    term: row.term,
    predictedTag: row.predictedTag,
    correctedTag: row.correctedTag,
    modelType,
    sourceFileId: row.sourceFileId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleTagCorrectionStore implements TagCorrectionStore {
  constructor(private readonly db: Database) {}

  async getUserCorrections(userId: string, modelType: CorrectionModelType = 'TEXT'): Promise<TagCorrection[]> {
    const rows = await this.db
      .select()
      .from(tagCorrections)
      .where(and(eq(tagCorrections.userId, userId), eq(tagCorrections.modelType, modelType)))
      .orderBy(asc(tagCorrections.updatedAt), asc(tagCorrections.id));
    return rows.map((row) => toCorrection(row, modelType));
  }

  async saveCorrection(input: SaveCorrectionInput): Promise<TagCorrection> {
    const now = new Date();
    const [saved] = await this.db
      .insert(tagCorrections)
      .values({
        userId: input.userId,
        term: input.term,
        predictedTag: input.predictedTag,
        correctedTag: input.correctedTag,
        modelType: input.modelType,
        sourceFileId: input.sourceFileId ?? null,
      })
      .onConflictDoUpdate({
        target: [tagCorrections.userId, tagCorrections.term, tagCorrections.modelType],
        set: {
          predictedTag: input.predictedTag,
          correctedTag: input.correctedTag,
          sourceFileId: input.sourceFileId ?? null,
          updatedAt: now,
        },
      })
      .returning();

    if (!saved) {
      throw new Error(`Upsert of tag correction "${input.term}" returned no row`);
    }
    return toCorrection(saved, input.modelType);
  }

  async deleteCorrection(userId: string, term: string, modelType: CorrectionModelType): Promise<boolean> {
    const deleted = await this.db
      .delete(tagCorrections)
      .where(
        and(
          eq(tagCorrections.userId, userId),
          eq(tagCorrections.term, term),
          eq(tagCorrections.modelType, modelType),
        ),
      )
      .returning({ id: tagCorrections.id });
    return deleted.length > 0;
  }

  async getMostCorrectedTerms(limit: number, modelType: CorrectionModelType = 'TEXT'): Promise<CorrectedTermStat[]> {
    const userCount = sql<number>`count(distinct ${tagCorrections.userId})::int`;
    return this.db
      .select({
        term: tagCorrections.term,
        correctedTag: tagCorrections.correctedTag,
        userCount,
      })
      .from(tagCorrections)
      .where(eq(tagCorrections.modelType, modelType))
      .groupBy(tagCorrections.term, tagCorrections.correctedTag)
      .orderBy(desc(userCount), asc(tagCorrections.term))
      .limit(limit);
  }
}
