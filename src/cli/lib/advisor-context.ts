import chalk from 'chalk';
import * as path from 'path';
import type { AdvisorEngine } from '../../app/advisor/advisor-engine.js';
import { createAdvisor, createFitExplainer } from '../../app/advisor/advisor-factory.js';
import type { FitExplainer } from '../../app/advisor/fit-explainer.js';
import { isAdvisorError } from '../../domain/errors.js';
import { loadRuntimeConfig, type AdvisorRuntimeConfig } from '../../infra/config/runtime-config.js';

export interface DataOptions {
  dataDir?: string;
  catalog?: string;
  /** `--no-explain` sets this to false */
  explain?: boolean;
}

export interface AdvisorContext {
  config: AdvisorRuntimeConfig;
  engine: AdvisorEngine;
  explainer?: FitExplainer;
}

/**
 * Debug-level `info` lines only reach the terminal with ADVISOR_DEBUG=1.
 */
export function createCliLogger(debug: boolean): Pick<Console, 'info' | 'warn'> {
  return {
    info: (...args: unknown[]) => {
      if (debug) {
        console.info(chalk.dim(args.map(String).join(' ')));
      }
    },
    warn: (...args: unknown[]) => {
      console.warn(chalk.yellow(args.map(String).join(' ')));
    },
  };
}

export function resolveCliConfig(options: DataOptions): AdvisorRuntimeConfig {
  const config = loadRuntimeConfig();
  return {
    ...config,
    paths: {
      ...config.paths,
      dataDir: options.dataDir ? path.resolve(options.dataDir) : config.paths.dataDir,
      catalog: options.catalog ? path.resolve(options.catalog) : config.paths.catalog,
    },
    explanation: {
      ...config.explanation,
      enabled: config.explanation.enabled && options.explain !== false,
    },
  };
}

export function loadAdvisorContext(options: DataOptions): AdvisorContext {
  const config = resolveCliConfig(options);
  const logger = createCliLogger(config.debug.loggingEnabled);
  const engine = createAdvisor(config, { logger });
  const explainer = createFitExplainer(config, {
    apiKey: process.env.OPENAI_API_KEY,
    label: (trait) => engine.label(trait),
    logger,
  });
  return { config, engine, explainer };
}

/**
 * Print advisor errors for the user and exit; anything else is a bug and
 * propagates with its stack.
 */
export function handleCommandError(error: unknown): never {
  if (isAdvisorError(error)) {
    console.error(chalk.red(`✗ [${error.code}] ${error.message}`));
    process.exit(1);
  }
  throw error;
}
