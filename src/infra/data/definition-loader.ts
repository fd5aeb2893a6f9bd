/**
 * Loaders for the JSON definitions that sit beside the catalog:
 * questionnaire, narrative templates and the free-text keyword lexicon.
 * Each file is schema-checked before it is compiled against the trait space.
 */

import * as fs from 'fs';
import { ConfigValidationError } from '../../domain/errors.js';
import {
  createNarrativeGenerator,
  type NarrativeGenerator,
  type NarrativeTemplates,
} from '../../domain/narrative/narrative-generator.js';
import {
  compileQuestionnaire,
  type Questionnaire,
  type QuestionnaireDefinition,
} from '../../domain/profile/questionnaire.js';
import type { KeywordLexicon } from '../../domain/profile/text-signal.js';
import type { TraitSpace } from '../../domain/profile/trait-space.js';
import { parseJson, validateWithSchema } from '../config/schema-validator.js';

const ID_PATTERN = '^[A-Za-z0-9][A-Za-z0-9_.-]*$';

export const QUESTIONNAIRE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Questionnaire',
  type: 'object',
  required: ['questions'],
  properties: {
    $schema: { type: 'string' },
    questions: {
      type: 'array',
      minItems: 1,
      items: { $ref: '#/$defs/Question' },
    },
  },
  additionalProperties: false,
  $defs: {
    Question: {
      type: 'object',
      required: ['id', 'prompt', 'options'],
      properties: {
        id: { type: 'string', pattern: ID_PATTERN },
        prompt: { type: 'string', minLength: 1 },
        options: {
          type: 'array',
          minItems: 1,
          items: { $ref: '#/$defs/Option' },
        },
      },
      additionalProperties: false,
    },
    Option: {
      type: 'object',
      required: ['id', 'label', 'weights'],
      properties: {
        id: { type: 'string', pattern: ID_PATTERN },
        label: { type: 'string', minLength: 1 },
        weights: {
          type: 'object',
          additionalProperties: { type: 'number', minimum: 0 },
        },
      },
      additionalProperties: false,
    },
  },
};

export const NARRATIVES_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Narrative Templates',
  type: 'object',
  required: ['single', 'blend', 'rounded', 'none'],
  properties: {
    $schema: { type: 'string' },
    labels: { type: 'object', additionalProperties: { type: 'string', minLength: 1 } },
    single: { type: 'object', additionalProperties: { type: 'string', minLength: 1 } },
    pairs: { type: 'object', additionalProperties: { type: 'string', minLength: 1 } },
    blend: { type: 'string', minLength: 1 },
    rounded: { type: 'string', minLength: 1 },
    none: { type: 'string', minLength: 1 },
  },
  additionalProperties: false,
};

export const KEYWORDS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Keyword Lexicon',
  type: 'object',
  required: ['scale', 'keywords'],
  properties: {
    $schema: { type: 'string' },
    scale: { type: 'number', exclusiveMinimum: 0 },
    keywords: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: { type: 'string', minLength: 1 },
      },
    },
  },
  additionalProperties: false,
};

function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigValidationError(filePath, [
      { path: '/', message: `cannot read file: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
  return parseJson(filePath, content);
}

export function parseQuestionnaire(space: TraitSpace, data: unknown, source = 'questionnaire'): Questionnaire {
  const definition = validateWithSchema<QuestionnaireDefinition>(source, QUESTIONNAIRE_SCHEMA, data);
  return compileQuestionnaire(space, definition);
}

export function parseNarratives(space: TraitSpace, data: unknown, source = 'narratives'): NarrativeGenerator {
  const templates = validateWithSchema<NarrativeTemplates>(source, NARRATIVES_SCHEMA, data);
  return createNarrativeGenerator(space, templates);
}

export function parseKeywordLexicon(space: TraitSpace, data: unknown, source = 'keywords'): KeywordLexicon {
  const lexicon = validateWithSchema<KeywordLexicon>(source, KEYWORDS_SCHEMA, data);

  const unknownTraits = Object.keys(lexicon.keywords).filter((trait) => !space.has(trait));
  if (unknownTraits.length > 0) {
    throw new ConfigValidationError(
      source,
      unknownTraits.map((trait) => ({ path: `/keywords/${trait}`, message: 'is not a catalog trait' }))
    );
  }

  return lexicon;
}

export function loadQuestionnaireFile(space: TraitSpace, filePath: string): Questionnaire {
  return parseQuestionnaire(space, readJsonFile(filePath), filePath);
}

export function loadNarrativesFile(space: TraitSpace, filePath: string): NarrativeGenerator {
  return parseNarratives(space, readJsonFile(filePath), filePath);
}

export function loadKeywordLexiconFile(space: TraitSpace, filePath: string): KeywordLexicon {
  return parseKeywordLexicon(space, readJsonFile(filePath), filePath);
}
