import * as fs from 'fs';
import * as path from 'path';
import type { ScoreScaling } from '../../domain/matching/similarity-ranker.js';
import { getBundledDataDir, getConfigDir } from './config-paths.js';
import { parseJson, validateWithSchema } from './schema-validator.js';

export interface AdvisorRuntimeConfig {
  $schema?: string;
  paths: {
    dataDir: string;
    catalog: string;
    questionnaire: string;
    narratives: string;
    keywords: string;
  };
  catalog: {
    idColumn: string;
    displayColumns: string[];
  };
  ranking: {
    topK: number;
    scoreScaling: ScoreScaling;
  };
  textSignal: {
    enabled: boolean;
  };
  /** Optional AI "why these fit" paragraph; also needs OPENAI_API_KEY */
  explanation: {
    enabled: boolean;
    model: string;
    baseUrl: string;
    timeoutMs: number;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

/** Shape of advisor.json: every section and key optional */
export type AdvisorRuntimeConfigFile = {
  $schema?: string;
} & {
  [Section in Exclude<keyof AdvisorRuntimeConfig, '$schema'>]?: Partial<AdvisorRuntimeConfig[Section]>;
};

export const DEFAULT_RUNTIME_CONFIG: AdvisorRuntimeConfig = {
  $schema: './advisor.schema.json',
  paths: {
    dataDir: getBundledDataDir(),
    catalog: 'programmes.csv',
    questionnaire: 'questionnaire.json',
    narratives: 'narratives.json',
    keywords: 'keywords.json',
  },
  catalog: {
    idColumn: 'id',
    displayColumns: ['program_name', 'institution'],
  },
  ranking: {
    topK: 5,
    scoreScaling: 'clamp',
  },
  textSignal: {
    enabled: true,
  },
  explanation: {
    enabled: true,
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
    timeoutMs: 20000,
  },
  debug: {
    loggingEnabled: false,
  },
};

export const RUNTIME_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Programme Advisor Runtime Config',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    paths: {
      type: 'object',
      properties: {
        dataDir: { type: 'string', minLength: 1 },
        catalog: { type: 'string', minLength: 1 },
        questionnaire: { type: 'string', minLength: 1 },
        narratives: { type: 'string', minLength: 1 },
        keywords: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    catalog: {
      type: 'object',
      properties: {
        idColumn: { type: 'string', minLength: 1 },
        displayColumns: { type: 'array', items: { type: 'string', minLength: 1 } },
      },
      additionalProperties: false,
    },
    ranking: {
      type: 'object',
      properties: {
        topK: { type: 'integer', minimum: 1 },
        scoreScaling: { enum: ['clamp', 'rescale'] },
      },
      additionalProperties: false,
    },
    textSignal: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    explanation: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        model: { type: 'string', minLength: 1 },
        baseUrl: { type: 'string', format: 'uri' },
        timeoutMs: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export function getRuntimeConfigPath(): string {
  return path.join(getConfigDir(), 'advisor.json');
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function toScoreScaling(value: unknown, fallback: ScoreScaling): ScoreScaling {
  return value === 'clamp' || value === 'rescale' ? value : fallback;
}

function mergeConfig(base: AdvisorRuntimeConfig, file: AdvisorRuntimeConfigFile): AdvisorRuntimeConfig {
  return {
    $schema: base.$schema,
    paths: { ...base.paths, ...file.paths },
    catalog: { ...base.catalog, ...file.catalog },
    ranking: { ...base.ranking, ...file.ranking },
    textSignal: { ...base.textSignal, ...file.textSignal },
    explanation: { ...base.explanation, ...file.explanation },
    debug: { ...base.debug, ...file.debug },
  };
}

/**
 * Environment variables win over the config file.
 */
export function applyEnvironmentOverrides(
  config: AdvisorRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): AdvisorRuntimeConfig {
  return {
    ...config,
    paths: {
      ...config.paths,
      dataDir: path.resolve(toStringValue(env.ADVISOR_DATA_DIR, config.paths.dataDir)),
    },
    ranking: {
      topK: toPositiveInt(env.ADVISOR_TOP_K, config.ranking.topK),
      scoreScaling: toScoreScaling(env.ADVISOR_SCORE_SCALING, config.ranking.scoreScaling),
    },
    textSignal: {
      enabled: toBoolean(env.ADVISOR_TEXT_SIGNAL, config.textSignal.enabled),
    },
    explanation: {
      ...config.explanation,
      enabled: toBoolean(env.ADVISOR_EXPLAIN, config.explanation.enabled),
      model: toStringValue(env.ADVISOR_EXPLAIN_MODEL, config.explanation.model),
    },
    debug: {
      loggingEnabled: toBoolean(env.ADVISOR_DEBUG, config.debug.loggingEnabled),
    },
  };
}

/**
 * The validated contents of advisor.json, without defaults; `{}` when the file does not exist.
 */
export function loadRuntimeConfigFile(): AdvisorRuntimeConfigFile {
  const configPath = getRuntimeConfigPath();

  if (!fs.existsSync(configPath)) {
    return {};
  }

  const parsed = parseJson(configPath, fs.readFileSync(configPath, 'utf-8'));
  return validateWithSchema<AdvisorRuntimeConfigFile>(configPath, RUNTIME_CONFIG_SCHEMA, parsed);
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): AdvisorRuntimeConfig {
  return applyEnvironmentOverrides(mergeConfig(DEFAULT_RUNTIME_CONFIG, loadRuntimeConfigFile()), env);
}

/**
 * Absolute path of a data file; relative names resolve against dataDir.
 */
export function resolveDataPath(
  config: AdvisorRuntimeConfig,
  file: Exclude<keyof AdvisorRuntimeConfig['paths'], 'dataDir'>
): string {
  return path.resolve(config.paths.dataDir, config.paths[file]);
}

export function saveRuntimeConfig(file: AdvisorRuntimeConfigFile): void {
  const validated = validateWithSchema<AdvisorRuntimeConfigFile>('advisor.json', RUNTIME_CONFIG_SCHEMA, file);
  const configDir = getConfigDir();
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }

  fs.writeFileSync(getRuntimeConfigPath(), JSON.stringify(validated, null, 2), { mode: 0o600 });
}

/**
 * Merge `patch` into the saved advisor.json section by section and save it.
 * Keys the patch does not name keep their saved values.
 */
export function updateRuntimeConfig(patch: AdvisorRuntimeConfigFile): AdvisorRuntimeConfigFile {
  const current = loadRuntimeConfigFile();
  const updated: AdvisorRuntimeConfigFile = { ...current };

  if (patch.$schema !== undefined) updated.$schema = patch.$schema;
  if (patch.paths) updated.paths = { ...current.paths, ...patch.paths };
  if (patch.catalog) updated.catalog = { ...current.catalog, ...patch.catalog };
  if (patch.ranking) updated.ranking = { ...current.ranking, ...patch.ranking };
  if (patch.textSignal) updated.textSignal = { ...current.textSignal, ...patch.textSignal };
  if (patch.explanation) updated.explanation = { ...current.explanation, ...patch.explanation };
  if (patch.debug) updated.debug = { ...current.debug, ...patch.debug };

  saveRuntimeConfig(updated);
  return updated;
}
