import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { ConfigValidationError } from '../../domain/errors.js';

/**
 * Create AJV validator instance
 */
function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

/**
 * Validate a parsed JSON document against a schema, narrowing it to T.
 * Throws ConfigValidationError listing every schema violation.
 */
export function validateWithSchema<T>(source: string, schema: object, data: unknown): T {
  const validate = createValidator().compile<T>(schema);

  if (!validate(data)) {
    const errors = (validate.errors || []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message || 'Unknown validation error',
    }));
    throw new ConfigValidationError(source, errors);
  }

  return data;
}

export function parseJson(source: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigValidationError(source, [
      { path: '/', message: error instanceof Error ? error.message : String(error) },
    ]);
  }
}
