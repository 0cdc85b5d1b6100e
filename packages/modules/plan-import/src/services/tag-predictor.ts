/**
 * Tag Predictor: maps a category label to a semantic tag.
 *
 * Lookup order, highest precedence first:
 *   1. the caller's user overlay (request-scoped, never shared)
 *   2. the global overlay (corrections promoted across users)
 *   3. the built-in multilingual keyword baseline
 *
 * One predictor is constructed per process and injected; per-user overlays
 * are owned by the CorrectionLearner and passed in per request.
 */

import { z } from 'zod';
import baselineTermsJson from '../data/baseline-terms.json';
import { CORRECTABLE_TAGS } from '../types';
import type { CorrectableTag, TagPrediction, TermCorrection } from '../types';
import { TermMemory, normalizeTerm } from './term-memory';

export const USER_OVERLAY_CONFIDENCE = 0.95;
export const GLOBAL_OVERLAY_CONFIDENCE = 0.9;
export const UNKNOWN_CONFIDENCE = 0.3;

const EXACT_MATCH_SCORE = 3;
const PARTIAL_MATCH_SCORE = 1;

const keywordList = z.array(z.string());

export const baselineTermsSchema = z.object({
  budget: keywordList,
  recurring: keywordList,
  savings: keywordList,
  income: keywordList,
  debt: keywordList,
});

export type BaselineTerms = z.infer<typeof baselineTermsSchema>;

const DEFAULT_BASELINE = baselineTermsSchema.parse(baselineTermsJson);

const UNKNOWN: TagPrediction = { tag: 'unknown', confidence: UNKNOWN_CONFIDENCE, source: 'none' };

function absoluteConfidence(score: number): number {
  if (score >= 3) return 0.95;
  if (score >= 2) return 0.85;
  return 0.7;
}

/** Anything that can answer "which tag is this term?" for one caller. */
export interface TagPredictorView {
  predict(term: string): TagPrediction;
}

export interface TagPredictorOptions {
  baseline?: BaselineTerms;
  /** Seeds the global overlay */
  global?: Iterable<TermCorrection>;
}

export class TagPredictor implements TagPredictorView {
  private readonly keywords: ReadonlyArray<readonly [CorrectableTag, readonly string[]]>;
  private readonly global: TermMemory;

  constructor(options: TagPredictorOptions = {}) {
    const baseline = options.baseline ?? DEFAULT_BASELINE;
    this.keywords = CORRECTABLE_TAGS.map(
      (tag) => [tag, [...new Set(baseline[tag].map(normalizeTerm).filter(Boolean))]] as const,
    );
    this.global = new TermMemory(options.global);
  }

  get globalSize(): number {
    return this.global.size;
  }

  predict(term: string, userOverlay?: TermMemory): TagPrediction {
    const normalized = normalizeTerm(term);
    if (!normalized) return UNKNOWN;

    const userTag = userOverlay?.lookup(normalized);
    if (userTag) return { tag: userTag, confidence: USER_OVERLAY_CONFIDENCE, source: 'user' };

    const globalTag = this.global.lookup(normalized);
    if (globalTag) return { tag: globalTag, confidence: GLOBAL_OVERLAY_CONFIDENCE, source: 'global' };

    return this.predictBaseline(normalized);
  }

  /**
   * Keyword scoring: an exact keyword match scores 3 for its tag, a keyword
   * contained in the term scores 1. Ties keep the earlier tag.
   */
  predictBaseline(term: string): TagPrediction {
    const normalized = normalizeTerm(term);
    if (!normalized) return UNKNOWN;

    let bestTag: CorrectableTag | null = null;
    let bestScore = 0;
    let total = 0;

    for (const [tag, words] of this.keywords) {
      let score = 0;
      for (const word of words) {
        if (normalized === word) score += EXACT_MATCH_SCORE;
        else if (normalized.includes(word)) score += PARTIAL_MATCH_SCORE;
      }
      total += score;
      if (score > bestScore) {
        bestScore = score;
        bestTag = tag;
      }
    }

    if (!bestTag) return UNKNOWN;

    const relative = bestScore / total;
    return {
      tag: bestTag,
      confidence: (relative + absoluteConfidence(bestScore)) / 2,
      source: 'baseline',
    };
  }

  /** Writes to the global overlay. */
  learn(term: string, tag: CorrectableTag): boolean {
    return this.global.learn(term, tag);
  }

  learnBatch(corrections: readonly TermCorrection[]): number {
    return this.global.learnBatch(corrections);
  }

  forget(term: string): boolean {
    return this.global.forget(term);
  }

  /** Binds a user overlay for the length of one request. */
  forUser(overlay: TermMemory | undefined): ScopedTagPredictor {
    return new ScopedTagPredictor(this, overlay);
  }
}

export class ScopedTagPredictor implements TagPredictorView {
  constructor(
    private readonly base: TagPredictor,
    private readonly overlay: TermMemory | undefined,
  ) {}

  predict(term: string): TagPrediction {
    return this.base.predict(term, this.overlay);
  }
}
