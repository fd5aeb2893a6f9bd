import { scaleVector, vectorFromWeights, zeroVector, type TraitSpace, type TraitVector } from './trait-space.js';

export interface KeywordLexicon {
  /** Total weight a matching text contributes, spread across the hit traits */
  scale: number;
  keywords: Readonly<Record<string, readonly string[]>>;
}

/**
 * Turn an optional "about me" text into a trait vector by substring keyword
 * hits. The hit distribution is normalised so the text is worth `scale`
 * in total, roughly one question's influence.
 */
export function extractTextSignal(space: TraitSpace, lexicon: KeywordLexicon, text: string | undefined): TraitVector {
  const haystack = ` ${(text ?? '').toLowerCase()} `;
  const hits: Record<string, number> = {};
  let totalHits = 0;

  for (const [trait, keywords] of Object.entries(lexicon.keywords)) {
    for (const keyword of keywords) {
      if (haystack.includes(keyword.toLowerCase())) {
        hits[trait] = (hits[trait] ?? 0) + 1;
        totalHits += 1;
      }
    }
  }

  if (totalHits === 0) {
    return zeroVector(space);
  }

  return scaleVector(vectorFromWeights(space, hits), lexicon.scale / totalHits);
}
