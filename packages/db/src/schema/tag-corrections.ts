/**
 * Drizzle schema for tag_corrections: one row per (user, term, model type),
 * upserted whenever a user corrects a predicted tag.
 */

import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { generateUlid } from '@tallyplan/shared';

export const tagCorrections = pgTable(
  'tag_corrections',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    userId: text('user_id').notNull(),
    // Normalized (trimmed, lower-cased) category text
    term: text('term').notNull(),
    predictedTag: text('predicted_tag'),
    correctedTag: text('corrected_tag').notNull(),
    // TEXT = category tag prediction, STRUCTURE = group/item detection
    modelType: text('model_type').notNull().default('TEXT'),
    sourceFileId: text('source_file_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userTermModelIdx: uniqueIndex('uq_tag_corrections_user_term_model').on(
      table.userId,
      table.term,
      table.modelType,
    ),
    userIdx: index('idx_tag_corrections_user').on(table.userId),
    termIdx: index('idx_tag_corrections_term').on(table.term),
  }),
);

export type TagCorrectionRow = typeof tagCorrections.$inferSelect;
export type NewTagCorrectionRow = typeof tagCorrections.$inferInsert;
