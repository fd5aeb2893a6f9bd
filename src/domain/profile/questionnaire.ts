import { ConfigValidationError, type ValidationIssue } from '../errors.js';
import { vectorFromWeights, type TraitSpace, type TraitVector, type TraitWeights } from './trait-space.js';

/**
 * Questionnaire as written in questionnaire.json
 */
export interface OptionDefinition {
  id: string;
  label: string;
  /** Sparse contribution; an empty map is a neutral "None of these" choice */
  weights: TraitWeights;
}

export interface QuestionDefinition {
  id: string;
  prompt: string;
  options: OptionDefinition[];
}

export interface QuestionnaireDefinition {
  $schema?: string;
  questions: QuestionDefinition[];
}

export interface AnswerOption {
  readonly id: string;
  readonly label: string;
  readonly vector: TraitVector;
}

export interface Question {
  readonly id: string;
  readonly prompt: string;
  readonly options: readonly AnswerOption[];
  option(optionId: string): AnswerOption | undefined;
}

export interface Questionnaire {
  readonly traitSpace: TraitSpace;
  readonly questions: readonly Question[];
  question(questionId: string): Question | undefined;
}

function validateDefinition(space: TraitSpace, definition: QuestionnaireDefinition): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const questionIds = new Set<string>();

  if (definition.questions.length === 0) {
    issues.push({ path: '/questions', message: 'must contain at least one question' });
  }

  definition.questions.forEach((question, qIndex) => {
    const questionPath = `/questions/${qIndex}`;

    if (questionIds.has(question.id)) {
      issues.push({ path: `${questionPath}/id`, message: `duplicate question id '${question.id}'` });
    }
    questionIds.add(question.id);

    if (question.options.length === 0) {
      issues.push({ path: `${questionPath}/options`, message: 'must contain at least one option' });
    }

    const optionIds = new Set<string>();
    question.options.forEach((option, oIndex) => {
      const optionPath = `${questionPath}/options/${oIndex}`;

      if (optionIds.has(option.id)) {
        issues.push({ path: `${optionPath}/id`, message: `duplicate option id '${option.id}'` });
      }
      optionIds.add(option.id);

      for (const [trait, weight] of Object.entries(option.weights)) {
        if (!space.has(trait)) {
          issues.push({ path: `${optionPath}/weights/${trait}`, message: 'is not a catalog trait' });
        } else if (!Number.isFinite(weight) || weight < 0) {
          issues.push({ path: `${optionPath}/weights/${trait}`, message: 'must be a non-negative number' });
        }
      }
    });
  });

  return issues;
}

/**
 * Resolve option weights against the trait space. Structural problems are
 * collected and reported together.
 */
export function compileQuestionnaire(space: TraitSpace, definition: QuestionnaireDefinition): Questionnaire {
  const issues = validateDefinition(space, definition);
  if (issues.length > 0) {
    throw new ConfigValidationError('questionnaire', issues);
  }

  const questions = definition.questions.map((question): Question => {
    const options = question.options.map(
      (option): AnswerOption =>
        Object.freeze({
          id: option.id,
          label: option.label,
          vector: vectorFromWeights(space, option.weights),
        })
    );
    const byId = new Map(options.map((option) => [option.id, option]));

    return Object.freeze({
      id: question.id,
      prompt: question.prompt,
      options: Object.freeze(options),
      option: (optionId: string) => byId.get(optionId),
    });
  });
  const byId = new Map(questions.map((question) => [question.id, question]));

  return Object.freeze({
    traitSpace: space,
    questions: Object.freeze(questions),
    question: (questionId: string) => byId.get(questionId),
  });
}
