import * as fs from 'fs';
import type { AnswerSet } from '../../domain/profile/answer-aggregator.js';
import { ConfigValidationError } from '../../domain/errors.js';
import { parseJson, validateWithSchema } from '../../infra/config/schema-validator.js';

/**
 * Scoring request as stored on disk for `advisor match --answers`.
 */
export interface AnswersFile {
  answers: AnswerSet;
  about?: string;
}

export const ANSWERS_FILE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Advisor Answers',
  type: 'object',
  required: ['answers'],
  properties: {
    $schema: { type: 'string' },
    answers: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    about: { type: 'string' },
  },
  additionalProperties: false,
};

export function parseAnswersFile(source: string, content: string): AnswersFile {
  return validateWithSchema<AnswersFile>(source, ANSWERS_FILE_SCHEMA, parseJson(source, content));
}

export function readAnswersFile(filePath: string): AnswersFile {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigValidationError(filePath, [
      { path: '/', message: `cannot read file: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
  return parseAnswersFile(filePath, content);
}
