import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { handleCommandError } from '../lib/advisor-context.js';
import {
  getRuntimeConfigPath,
  loadRuntimeConfig,
  resolveDataPath,
  updateRuntimeConfig,
} from '../../infra/config/runtime-config.js';

async function showConfig(): Promise<void> {
  try {
    const config = loadRuntimeConfig();

    console.log(chalk.cyan('\nCurrent Configuration:\n'));
    console.log(chalk.white('  Config file:'), getRuntimeConfigPath());
    console.log(chalk.white('  Data dir:'), config.paths.dataDir);
    console.log(chalk.white('  Catalog:'), resolveDataPath(config, 'catalog'));
    console.log(chalk.white('  Questionnaire:'), resolveDataPath(config, 'questionnaire'));
    console.log(chalk.white('  Narratives:'), resolveDataPath(config, 'narratives'));
    console.log(chalk.white('  Keywords:'), resolveDataPath(config, 'keywords'));
    console.log(chalk.white('  Top K:'), config.ranking.topK);
    console.log(chalk.white('  Score scaling:'), config.ranking.scoreScaling);
    console.log(chalk.white('  Text signal:'), config.textSignal.enabled ? chalk.green('On') : chalk.red('Off'));
    console.log(
      chalk.white('  AI explanation:'),
      config.explanation.enabled ? chalk.green(`On (${config.explanation.model}, needs OPENAI_API_KEY)`) : chalk.red('Off')
    );
    console.log(chalk.white('  Debug logging:'), config.debug.loggingEnabled ? chalk.green('On') : chalk.red('Off'));
    console.log();
  } catch (error) {
    handleCommandError(error);
  }
}

async function setDataDir(dir: string): Promise<void> {
  try {
    updateRuntimeConfig({ paths: { dataDir: path.resolve(dir) } });
    console.log(chalk.green(`✓ Data directory set to: ${path.resolve(dir)}`));
  } catch (error) {
    handleCommandError(error);
  }
}

export function createConfigCommand(): Command {
  const configCommand = new Command('config')
    .description('Manage advisor configuration');

  configCommand
    .command('show')
    .description('Show the resolved configuration')
    .action(showConfig);

  configCommand
    .command('set-data-dir')
    .description('Point the advisor at another data directory')
    .argument('<dir>', 'Directory holding programmes.csv and the JSON definitions')
    .action(setDataDir);

  return configCommand;
}
