/**
 * Advisor Factory
 *
 * Loads every data file named by the runtime config and returns a ready
 * AdvisorEngine. All I/O happens here, once, before any request is scored.
 */

import type { AdvisorRuntimeConfig } from '../../infra/config/runtime-config.js';
import { resolveDataPath } from '../../infra/config/runtime-config.js';
import { loadCatalogFile } from '../../infra/data/catalog-loader.js';
import {
  loadKeywordLexiconFile,
  loadNarrativesFile,
  loadQuestionnaireFile,
} from '../../infra/data/definition-loader.js';
import { OpenAIChatClient } from '../../infra/llm/chat-client.js';
import { AdvisorEngine } from './advisor-engine.js';
import { FitExplainer } from './fit-explainer.js';

export interface AdvisorFactoryOptions {
  logger?: Pick<Console, 'info' | 'warn'>;
}

export function createAdvisor(config: AdvisorRuntimeConfig, options: AdvisorFactoryOptions = {}): AdvisorEngine {
  const logger = options.logger ?? console;

  // The catalog header defines the trait space everything else compiles against
  const catalog = loadCatalogFile(resolveDataPath(config, 'catalog'), {
    idColumn: config.catalog.idColumn,
    displayColumns: config.catalog.displayColumns,
    logger,
  });
  const space = catalog.traitSpace;

  const questionnaire = loadQuestionnaireFile(space, resolveDataPath(config, 'questionnaire'));
  const narratives = loadNarrativesFile(space, resolveDataPath(config, 'narratives'));
  const lexicon = config.textSignal.enabled
    ? loadKeywordLexiconFile(space, resolveDataPath(config, 'keywords'))
    : undefined;

  logger.info(
    `[AdvisorFactory] Ready: ${questionnaire.questions.length} questions, ${catalog.size} programmes, ` +
      `text signal ${lexicon ? 'on' : 'off'}`
  );

  return new AdvisorEngine({
    catalog,
    questionnaire,
    narratives,
    lexicon,
    topK: config.ranking.topK,
    scoreScaling: config.ranking.scoreScaling,
  });
}

export interface FitExplainerFactoryOptions {
  apiKey?: string;
  label?: (trait: string) => string;
  logger?: Pick<Console, 'info' | 'warn'>;
  fetch?: typeof fetch;
}

/**
 * The AI explanation is opt-out in config and needs an API key; without
 * either there is no explainer and output is unchanged.
 */
export function createFitExplainer(
  config: AdvisorRuntimeConfig,
  options: FitExplainerFactoryOptions = {}
): FitExplainer | undefined {
  const logger = options.logger ?? console;
  if (!config.explanation.enabled || !options.apiKey) {
    return undefined;
  }

  const [nameColumn, detailColumn] = config.catalog.displayColumns;
  logger.info(`[AdvisorFactory] AI explanation via ${config.explanation.model}`);

  return new FitExplainer({
    client: new OpenAIChatClient({
      apiKey: options.apiKey,
      baseUrl: config.explanation.baseUrl,
      timeoutMs: config.explanation.timeoutMs,
      fetch: options.fetch,
    }),
    model: config.explanation.model,
    nameColumn,
    detailColumn,
    label: options.label,
    logger,
  });
}
