import { Command } from 'commander';
import chalk from 'chalk';
import { CatalogLoadError, formatCatalogIssue } from '../../domain/errors.js';
import { resolveDataPath } from '../../infra/config/runtime-config.js';
import { loadCatalogFile } from '../../infra/data/catalog-loader.js';
import { createCliLogger, handleCommandError, resolveCliConfig } from '../lib/advisor-context.js';

interface CatalogOptions {
  dataDir?: string;
  catalog?: string;
}

async function validateCatalog(options: CatalogOptions): Promise<void> {
  const config = resolveCliConfig(options);
  const filePath = resolveDataPath(config, 'catalog');

  try {
    const catalog = loadCatalogFile(filePath, {
      idColumn: config.catalog.idColumn,
      displayColumns: config.catalog.displayColumns,
      logger: createCliLogger(config.debug.loggingEnabled),
    });

    console.log(chalk.green(`✓ ${filePath}`));
    console.log(chalk.white('  Programmes:'), catalog.size);
    console.log(chalk.white('  Traits:'), catalog.traitSpace.dimensions.join(', '));
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      console.error(chalk.red(`✗ ${filePath}`));
      for (const issue of error.errors) {
        console.error(chalk.red(`  - ${formatCatalogIssue(issue)}`));
      }
      process.exit(1);
    }
    handleCommandError(error);
  }
}

async function listCatalog(options: CatalogOptions): Promise<void> {
  const config = resolveCliConfig(options);

  try {
    const catalog = loadCatalogFile(resolveDataPath(config, 'catalog'), {
      idColumn: config.catalog.idColumn,
      displayColumns: config.catalog.displayColumns,
      logger: createCliLogger(config.debug.loggingEnabled),
    });
    const { dimensions } = catalog.traitSpace;

    for (const item of catalog) {
      const fields = config.catalog.displayColumns.map((column) => item.displayFields[column]).filter(Boolean);
      const traits = dimensions
        .map((trait, index) => ({ trait, value: item.vector[index] }))
        .filter((entry) => entry.value > 0)
        .map((entry) => `${entry.trait}=${entry.value}`);
      console.log(`${chalk.bold(item.id)}  ${fields.join(' — ')}`);
      console.log(chalk.dim(`    ${traits.join(' ')}`));
    }
  } catch (error) {
    handleCommandError(error);
  }
}

export function createCatalogCommand(): Command {
  const catalogCommand = new Command('catalog').description('Inspect the programme catalog');

  catalogCommand
    .command('validate')
    .description('Load the catalog and report every invalid record')
    .option('-d, --data-dir <dir>', 'Directory holding programmes.csv')
    .option('-c, --catalog <file>', 'Programme catalog CSV')
    .action(validateCatalog);

  catalogCommand
    .command('list')
    .description('List programmes with their trait values')
    .option('-d, --data-dir <dir>', 'Directory holding programmes.csv')
    .option('-c, --catalog <file>', 'Programme catalog CSV')
    .action(listCatalog);

  return catalogCommand;
}
