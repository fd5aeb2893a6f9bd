/**
 * Similarity Ranker
 *
 * Scores a profile vector against every catalog item by cosine similarity
 * and orders the results for display.
 */

import type { CatalogIndex, CatalogItem } from '../catalog/catalog-index.js';
import { AdvisorError } from '../errors.js';
import { assertDimension, cosineSimilarity, type TraitSpace, type TraitVector } from '../profile/trait-space.js';

/**
 * How a raw similarity in [-1, 1] becomes a 0–100 display score.
 * - clamp: negative similarity is shown as 0
 * - rescale: linear map of [-1, 1] onto [0, 100]
 */
export type ScoreScaling = 'clamp' | 'rescale';

export interface RankOptions {
  topK?: number;
  scoreScaling?: ScoreScaling;
}

export interface MatchResult {
  readonly item: CatalogItem;
  /** Raw cosine similarity in [-1, 1] */
  readonly similarity: number;
  /** Display score, integer in [0, 100] */
  readonly score: number;
  /** 1-based position in the full ranking */
  readonly rank: number;
}

export interface Ranking {
  readonly top: readonly MatchResult[];
  readonly ranked: readonly MatchResult[];
}

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SCORE_SCALING: ScoreScaling = 'clamp';

export function toDisplayScore(similarity: number, scaling: ScoreScaling = DEFAULT_SCORE_SCALING): number {
  switch (scaling) {
    case 'clamp':
      return Math.round(Math.max(similarity, 0) * 100);
    case 'rescale':
      return Math.round(((similarity + 1) / 2) * 100);
  }
}

export function rankCatalog(userVector: TraitVector, catalog: CatalogIndex, options: RankOptions = {}): Ranking {
  const topK = options.topK ?? DEFAULT_TOP_K;
  const scaling = options.scoreScaling ?? DEFAULT_SCORE_SCALING;

  if (!Number.isInteger(topK) || topK < 1) {
    throw AdvisorError.invalidOptions(`topK must be a positive integer, got ${topK}`);
  }
  assertDimension(catalog.traitSpace, userVector, 'rankCatalog');

  const scored = catalog.items.map((item) => {
    const similarity = cosineSimilarity(userVector, item.vector);
    return { item, similarity, score: toDisplayScore(similarity, scaling) };
  });

  // Array.prototype.sort is stable, so equal scores keep load order.
  scored.sort((left, right) => right.score - left.score);

  const ranked = scored.map((entry, index): MatchResult => Object.freeze({ ...entry, rank: index + 1 }));

  return Object.freeze({
    top: Object.freeze(ranked.slice(0, topK)),
    ranked: Object.freeze(ranked),
  });
}

export interface SharedTrait {
  trait: string;
  userValue: number;
  itemValue: number;
}

/**
 * Traits where both the profile and the item are positive, strongest
 * overlap first; feeds the "why this match" line.
 */
export function explainMatch(
  space: TraitSpace,
  userVector: TraitVector,
  item: CatalogItem,
  limit = 3
): SharedTrait[] {
  assertDimension(space, userVector, 'explainMatch');

  return space.dimensions
    .map((trait, index): SharedTrait => ({ trait, userValue: userVector[index], itemValue: item.vector[index] }))
    .filter((entry) => entry.userValue > 0 && entry.itemValue > 0)
    .sort((left, right) => right.userValue * right.itemValue - left.userValue * left.itemValue)
    .slice(0, limit);
}
