/**
 * Advisor Engine
 *
 * One scoring request in, ranked matches and an identity summary out.
 * Holds only the read-only catalog, questionnaire and templates it was built
 * with; every call is an independent pure computation.
 */

import type { CatalogIndex } from '../../domain/catalog/catalog-index.js';
import { UnknownTraitError } from '../../domain/errors.js';
import {
  DEFAULT_SCORE_SCALING,
  DEFAULT_TOP_K,
  explainMatch,
  rankCatalog,
  type ScoreScaling,
  type SharedTrait,
} from '../../domain/matching/similarity-ranker.js';
import { buildIdentitySnapshot, type IdentitySnapshot } from '../../domain/narrative/identity-snapshot.js';
import type { Dominance, NarrativeGenerator } from '../../domain/narrative/narrative-generator.js';
import { aggregateAnswers, type AnswerSet } from '../../domain/profile/answer-aggregator.js';
import type { Questionnaire } from '../../domain/profile/questionnaire.js';
import { extractTextSignal, type KeywordLexicon } from '../../domain/profile/text-signal.js';
import { addVectors, assertSameTraitSpace, type TraitVector } from '../../domain/profile/trait-space.js';

export interface ScoringRequest {
  answers: AnswerSet;
  /** Optional free text; only used when the engine has a keyword lexicon */
  about?: string;
  topK?: number;
}

export interface MatchView {
  itemId: string;
  rank: number;
  displayFields: Readonly<Record<string, string>>;
  score: number;
  sharedTraits: SharedTrait[];
}

export interface ScoringResponse {
  matches: MatchView[];
  summary: string;
  dominance: Dominance;
  snapshot: IdentitySnapshot;
  profile: TraitVector;
}

export interface AdvisorEngineOptions {
  catalog: CatalogIndex;
  questionnaire: Questionnaire;
  narratives: NarrativeGenerator;
  lexicon?: KeywordLexicon;
  topK?: number;
  scoreScaling?: ScoreScaling;
}

export class AdvisorEngine {
  readonly catalog: CatalogIndex;
  readonly questionnaire: Questionnaire;
  private readonly narratives: NarrativeGenerator;
  private readonly lexicon?: KeywordLexicon;
  private readonly topK: number;
  private readonly scoreScaling: ScoreScaling;

  constructor(options: AdvisorEngineOptions) {
    const space = options.catalog.traitSpace;
    assertSameTraitSpace(space, options.questionnaire.traitSpace, 'questionnaire');
    assertSameTraitSpace(space, options.narratives.traitSpace, 'narratives');
    const unknownTrait = Object.keys(options.lexicon?.keywords ?? {}).find((trait) => !space.has(trait));
    if (unknownTrait !== undefined) {
      throw new UnknownTraitError(unknownTrait, space.dimensions);
    }

    this.catalog = options.catalog;
    this.questionnaire = options.questionnaire;
    this.narratives = options.narratives;
    this.lexicon = options.lexicon;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.scoreScaling = options.scoreScaling ?? DEFAULT_SCORE_SCALING;
  }

  get acceptsFreeText(): boolean {
    return this.lexicon !== undefined;
  }

  buildProfile(answers: AnswerSet, about?: string): TraitVector {
    const fromAnswers = aggregateAnswers(this.questionnaire, answers);
    if (!this.lexicon || !about?.trim()) {
      return fromAnswers;
    }
    return addVectors(fromAnswers, extractTextSignal(this.catalog.traitSpace, this.lexicon, about));
  }

  score(request: ScoringRequest): ScoringResponse {
    const space = this.catalog.traitSpace;
    const profile = this.buildProfile(request.answers, request.about);
    const ranking = rankCatalog(profile, this.catalog, {
      topK: request.topK ?? this.topK,
      scoreScaling: this.scoreScaling,
    });
    const summary = this.narratives.summarize(profile);

    return {
      matches: ranking.top.map((result) => ({
        itemId: result.item.id,
        rank: result.rank,
        displayFields: result.item.displayFields,
        score: result.score,
        sharedTraits: explainMatch(space, profile, result.item),
      })),
      summary: summary.text,
      dominance: summary.dominance,
      snapshot: buildIdentitySnapshot(space, profile, 3, this.narratives.label),
      profile,
    };
  }

  label(trait: string): string {
    return this.narratives.label(trait);
  }
}
