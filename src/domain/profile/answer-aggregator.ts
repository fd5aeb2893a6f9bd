import { IncompleteResponseError, InvalidAnswerError } from '../errors.js';
import type { AnswerOption, Questionnaire } from './questionnaire.js';
import { sumVectors, type TraitVector } from './trait-space.js';

/** question id → selected option id */
export type AnswerSet = Readonly<Record<string, string>>;

/**
 * Sum the weight vectors of the selected options into one profile vector.
 *
 * Every question must be answered exactly once. Raw weights accumulate with
 * no normalisation, so a trait reinforced by several questions stays ahead.
 */
export function aggregateAnswers(questionnaire: Questionnaire, answers: AnswerSet): TraitVector {
  const selected = new Map<string, AnswerOption>();

  for (const [questionId, optionId] of Object.entries(answers)) {
    const question = questionnaire.question(questionId);
    if (!question) {
      throw new InvalidAnswerError(questionId);
    }
    const option = question.option(optionId);
    if (!option) {
      throw new InvalidAnswerError(questionId, optionId);
    }
    selected.set(questionId, option);
  }

  const vectors: TraitVector[] = [];
  const missing: string[] = [];
  for (const question of questionnaire.questions) {
    const option = selected.get(question.id);
    if (option) {
      vectors.push(option.vector);
    } else {
      missing.push(question.id);
    }
  }

  if (missing.length > 0) {
    throw new IncompleteResponseError(missing);
  }

  return sumVectors(questionnaire.traitSpace, vectors);
}
