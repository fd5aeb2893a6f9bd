/**
 * Advisor Error Codes and Classes
 *
 * User-facing validation failures (incomplete or invalid answers) and
 * data/configuration failures (catalog, questionnaire, templates) share one
 * base class so callers can branch on `code` without instanceof chains.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  // Request errors
  INCOMPLETE_RESPONSE: 'INCOMPLETE_RESPONSE',
  INVALID_ANSWER: 'INVALID_ANSWER',
  INVALID_OPTIONS: 'INVALID_OPTIONS',

  // Data errors
  CATALOG_LOAD_ERROR: 'CATALOG_LOAD_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
  INVALID_TRAIT_SPACE: 'INVALID_TRAIT_SPACE',
  INVALID_NARRATIVES: 'INVALID_NARRATIVES',
  EXPORT_FAILED: 'EXPORT_FAILED',
  EXPLANATION_FAILED: 'EXPLANATION_FAILED',

  // Contract violations
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  UNKNOWN_TRAIT: 'UNKNOWN_TRAIT',
  TRAIT_SPACE_MISMATCH: 'TRAIT_SPACE_MISMATCH',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.INCOMPLETE_RESPONSE]: 'Every question needs an answer',
  [ErrorCodes.INVALID_ANSWER]: 'Invalid answer',
  [ErrorCodes.INVALID_OPTIONS]: 'Invalid options',
  [ErrorCodes.CATALOG_LOAD_ERROR]: 'Catalog could not be loaded',
  [ErrorCodes.CONFIG_INVALID]: 'Invalid configuration',
  [ErrorCodes.INVALID_TRAIT_SPACE]: 'Invalid trait space',
  [ErrorCodes.INVALID_NARRATIVES]: 'Invalid narrative templates',
  [ErrorCodes.EXPORT_FAILED]: 'Results could not be written',
  [ErrorCodes.EXPLANATION_FAILED]: 'AI explanation unavailable',
  [ErrorCodes.DIMENSION_MISMATCH]: 'Vector dimension does not match the trait space',
  [ErrorCodes.UNKNOWN_TRAIT]: 'Unknown trait',
  [ErrorCodes.TRAIT_SPACE_MISMATCH]: 'Trait spaces do not match',
};

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface CatalogIssue {
  /** 1-based data row (header excluded); absent for header-level problems */
  row?: number;
  column?: string;
  message: string;
}

// ============================================================================
// AdvisorError Class
// ============================================================================

export class AdvisorError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message?: string, details?: unknown) {
    super(message || ErrorMessages[code]);
    this.name = 'AdvisorError';
    this.code = code;
    this.details = details;
  }

  static invalidOptions(details: string): AdvisorError {
    return new AdvisorError(ErrorCodes.INVALID_OPTIONS, `Invalid options: ${details}`);
  }

  static invalidTraitSpace(details: string): AdvisorError {
    return new AdvisorError(ErrorCodes.INVALID_TRAIT_SPACE, `Invalid trait space: ${details}`);
  }

  static invalidNarratives(details: string): AdvisorError {
    return new AdvisorError(ErrorCodes.INVALID_NARRATIVES, `Invalid narrative templates: ${details}`);
  }

  static explanationFailed(details: string): AdvisorError {
    return new AdvisorError(ErrorCodes.EXPLANATION_FAILED, `AI explanation unavailable: ${details}`);
  }

  static exportFailed(filePath: string, reason: string): AdvisorError {
    return new AdvisorError(ErrorCodes.EXPORT_FAILED, `Could not write ${filePath}: ${reason}`, { filePath });
  }
}

export class IncompleteResponseError extends AdvisorError {
  readonly missingQuestionIds: readonly string[];

  constructor(missingQuestionIds: readonly string[]) {
    super(
      ErrorCodes.INCOMPLETE_RESPONSE,
      `Missing answers for: ${missingQuestionIds.join(', ')}`,
      { missingQuestionIds }
    );
    this.name = 'IncompleteResponseError';
    this.missingQuestionIds = missingQuestionIds;
  }
}

export class InvalidAnswerError extends AdvisorError {
  readonly questionId: string;
  readonly optionId?: string;

  constructor(questionId: string, optionId?: string) {
    super(
      ErrorCodes.INVALID_ANSWER,
      optionId === undefined
        ? `Invalid answer: unknown question '${questionId}'`
        : `Invalid answer: '${optionId}' is not an option of question '${questionId}'`,
      { questionId, optionId }
    );
    this.name = 'InvalidAnswerError';
    this.questionId = questionId;
    this.optionId = optionId;
  }
}

export class CatalogLoadError extends AdvisorError {
  readonly errors: readonly CatalogIssue[];

  constructor(errors: readonly CatalogIssue[]) {
    super(ErrorCodes.CATALOG_LOAD_ERROR, `Invalid catalog: ${errors.map(formatCatalogIssue).join('; ')}`, {
      errors,
    });
    this.name = 'CatalogLoadError';
    this.errors = errors;
  }
}

export class DimensionMismatchError extends AdvisorError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context?: string) {
    super(
      ErrorCodes.DIMENSION_MISMATCH,
      `Dimension mismatch${context ? ` in ${context}` : ''}: expected ${expected}, got ${actual}`,
      { expected, actual }
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnknownTraitError extends AdvisorError {
  readonly trait: string;

  constructor(trait: string, known: readonly string[]) {
    super(ErrorCodes.UNKNOWN_TRAIT, `Unknown trait '${trait}' (expected one of: ${known.join(', ')})`, {
      trait,
      known,
    });
    this.name = 'UnknownTraitError';
    this.trait = trait;
  }
}

/** Same size, different dimension names or order */
export class TraitSpaceMismatchError extends AdvisorError {
  readonly expected: readonly string[];
  readonly actual: readonly string[];

  constructor(expected: readonly string[], actual: readonly string[], context?: string) {
    super(
      ErrorCodes.TRAIT_SPACE_MISMATCH,
      `Trait space mismatch${context ? ` in ${context}` : ''}: ` +
        `expected [${expected.join(', ')}], got [${actual.join(', ')}]`,
      { expected, actual }
    );
    this.name = 'TraitSpaceMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigValidationError extends AdvisorError {
  readonly errors: readonly ValidationIssue[];

  constructor(source: string, errors: readonly ValidationIssue[]) {
    super(
      ErrorCodes.CONFIG_INVALID,
      `Invalid ${source}: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      { source, errors }
    );
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function formatCatalogIssue(issue: CatalogIssue): string {
  const location = [
    issue.row !== undefined ? `row ${issue.row}` : undefined,
    issue.column !== undefined ? `column '${issue.column}'` : undefined,
  ]
    .filter((part): part is string => part !== undefined)
    .join(', ');

  return location ? `${location}: ${issue.message}` : issue.message;
}

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}
