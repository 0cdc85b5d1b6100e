/**
 * Correction Learner: the feedback loop from user corrections into the
 * predictor.
 *
 * Ordering is persist-then-memoize: a correction reaches the user's live
 * overlay only after the store has accepted it, so memory never holds a
 * correction the database does not.
 *
 * User overlays live here, keyed by user id. Each overlay is replaced
 * wholesale on hydration; the shared predictor layers are only touched by
 * `hydrateGlobal`.
 */

import { CorrectionHydrationError, NotFoundError } from '@tallyplan/shared';
import { logger as rootLogger, serializeError } from '@tallyplan/core';
import type { Logger } from '@tallyplan/core';
import type { TagCorrectionStore } from '../stores/tag-correction-store';
import { parseCorrectableTag } from '../tags';
import type { CorrectableTag, TagCorrection, TermCorrection } from '../types';
import type { ScopedTagPredictor, TagPredictor } from './tag-predictor';
import { TermMemory, normalizeTerm } from './term-memory';

const PROMOTION_SCAN_LIMIT = 500;

export interface SaveCorrectionParams {
  userId: string;
  term: string;
  predictedTag: string | null;
  correctedTag: CorrectableTag;
  sourceFileId?: string | null;
}

export interface HydrationResult {
  loaded: number;
  skipped: number;
}

export class CorrectionLearner {
  private readonly overlays = new Map<string, TermMemory>();
  private readonly hydrated = new Set<string>();
  private readonly hydrating = new Map<string, Promise<HydrationResult>>();
  // Corrections saved while a hydration for that user is in flight
  private readonly savedDuringHydration = new Map<string, TermCorrection[]>();

  constructor(
    private readonly predictor: TagPredictor,
    private readonly store: TagCorrectionStore,
    private readonly logger: Logger = rootLogger,
  ) {}

  isHydrated(userId: string): boolean {
    return this.hydrated.has(userId);
  }

  overlayFor(userId: string): TermMemory | undefined {
    return this.overlays.get(userId);
  }

  /** Predictor bound to this user's overlay (baseline and global only when not hydrated). */
  predictorFor(userId: string): ScopedTagPredictor {
    return this.predictor.forUser(this.overlays.get(userId));
  }

  async saveCorrection(params: SaveCorrectionParams): Promise<TagCorrection> {
    const term = normalizeTerm(params.term);
    const saved = await this.store.saveCorrection({
      userId: params.userId,
      term,
      predictedTag: params.predictedTag,
      correctedTag: params.correctedTag,
      modelType: 'TEXT',
      sourceFileId: params.sourceFileId ?? null,
    });

    const overlay = this.overlays.get(params.userId) ?? new TermMemory();
    overlay.learn(term, params.correctedTag);
    this.overlays.set(params.userId, overlay);
    this.savedDuringHydration.get(params.userId)?.push({ term, tag: params.correctedTag });

    this.logger.info('Tag correction saved', {
      userId: params.userId,
      term,
      predictedTag: params.predictedTag,
      correctedTag: params.correctedTag,
    });
    return saved;
  }

  /**
   * Replaces the user's overlay with their persisted TEXT corrections.
   * Unusable rows are skipped; a store failure leaves the previous overlay
   * (if any) in place and surfaces as CorrectionHydrationError.
   */
  hydrateForUser(userId: string): Promise<HydrationResult> {
    const running = this.hydrating.get(userId);
    if (running) return running;

    const pending: TermCorrection[] = [];
    this.savedDuringHydration.set(userId, pending);
    const run: Promise<HydrationResult> = this.loadOverlay(userId, pending).finally(() => {
      // an evict followed by a new hydration may already own these entries
      if (this.hydrating.get(userId) === run) {
        this.hydrating.delete(userId);
        this.savedDuringHydration.delete(userId);
      }
    });
    this.hydrating.set(userId, run);
    return run;
  }

  private async loadOverlay(userId: string, pending: TermCorrection[]): Promise<HydrationResult> {
    let rows: TagCorrection[];
    try {
      rows = await this.store.getUserCorrections(userId, 'TEXT');
    } catch (err) {
      this.logger.error('Tag correction hydration failed', { userId, error: serializeError(err) });
      throw new CorrectionHydrationError(userId, err);
    }

    const corrections: TermCorrection[] = [];
    let skipped = 0;
    for (const row of rows) {
      const term = normalizeTerm(row.term);
      const tag = parseCorrectableTag(row.correctedTag);
      if (!term || !tag) {
        skipped++;
        this.logger.warn('Skipping unusable tag correction', {
          userId,
          correctionId: row.id,
          term: row.term,
          correctedTag: row.correctedTag,
        });
        continue;
      }
      corrections.push({ term, tag });
    }

    // Evicted while the store call was in flight
    if (this.savedDuringHydration.get(userId) !== pending) {
      this.logger.debug('Discarding hydration for evicted user', { userId });
      return { loaded: corrections.length, skipped };
    }

    const overlay = new TermMemory();
    overlay.learnBatch([...corrections, ...pending]);
    this.overlays.set(userId, overlay);
    this.hydrated.add(userId);

    this.logger.info('Tag corrections hydrated', { userId, loaded: corrections.length, skipped });
    return { loaded: corrections.length, skipped };
  }

  /**
   * Promotes corrections that at least `minUsers` distinct users agree on
   * into the shared global overlay, as one batch.
   */
  async hydrateGlobal(minUsers: number): Promise<number> {
    const stats = await this.store.getMostCorrectedTerms(PROMOTION_SCAN_LIMIT, 'TEXT');

    const promoted: TermCorrection[] = [];
    const seen = new Set<string>();
    // Stats are ranked by user count, so the first tag seen for a term is the consensus
    for (const stat of stats) {
      const term = normalizeTerm(stat.term);
      const tag = parseCorrectableTag(stat.correctedTag);
      if (!term || !tag || seen.has(term)) continue;
      seen.add(term);
      if (stat.userCount >= minUsers) promoted.push({ term, tag });
    }

    const changed = this.predictor.learnBatch(promoted);
    this.logger.info('Global tag corrections promoted', { candidates: promoted.length, changed, minUsers });
    return changed;
  }

  async deleteCorrection(userId: string, term: string): Promise<void> {
    const normalized = normalizeTerm(term);
    const deleted = await this.store.deleteCorrection(userId, normalized, 'TEXT');
    if (!deleted) {
      throw new NotFoundError('Tag correction', normalized);
    }
    this.overlays.get(userId)?.forget(normalized);
    this.logger.info('Tag correction deleted', { userId, term: normalized });
  }

  async listCorrections(userId: string): Promise<TagCorrection[]> {
    return this.store.getUserCorrections(userId, 'TEXT');
  }

  /** Drops a user's overlay, e.g. on sign-out. A load still in flight is discarded. */
  evict(userId: string): boolean {
    this.hydrating.delete(userId);
    this.savedDuringHydration.delete(userId);
    this.hydrated.delete(userId);
    return this.overlays.delete(userId);
  }
}
