import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { formatResultsText } from '../../app/advisor/results-export.js';
import { AdvisorError } from '../../domain/errors.js';
import { readAnswersFile } from '../lib/answers-file.js';
import { handleCommandError, loadAdvisorContext, type AdvisorContext } from '../lib/advisor-context.js';
import { renderResponse } from '../lib/render.js';
import type { ScoringResponse } from '../../app/advisor/advisor-engine.js';

interface MatchOptions {
  answers: string;
  about?: string;
  top?: string;
  json?: boolean;
  export?: string;
  explain?: boolean;
  dataDir?: string;
  catalog?: string;
}

export function parseTopK(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  // Validated by the ranker so a bad value surfaces as INVALID_OPTIONS
  return Number(value);
}

export function printResponse(context: AdvisorContext, response: ScoringResponse, asJson: boolean): void {
  if (asJson) {
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  const [nameColumn = context.config.catalog.idColumn, detailColumn = ''] = context.config.catalog.displayColumns;
  for (const line of renderResponse(response, {
    nameColumn,
    detailColumn,
    label: (trait) => context.engine.label(trait),
  })) {
    console.log(line);
  }
  console.log();
}

export async function printExplanation(
  context: AdvisorContext,
  response: ScoringResponse,
  about: string | undefined
): Promise<void> {
  if (!context.explainer) {
    return;
  }

  const explanation = await context.explainer.explain(response, about);
  if (explanation) {
    console.log(chalk.cyan('🤖 Why these fit (AI)\n'));
    console.log(explanation);
    console.log();
  }
}

export function exportResponse(context: AdvisorContext, response: ScoringResponse, filePath: string): void {
  const [nameColumn, detailColumn] = context.config.catalog.displayColumns;
  const text = formatResultsText(response, { nameColumn, detailColumn, label: (trait) => context.engine.label(trait) });
  try {
    fs.writeFileSync(filePath, text);
  } catch (error) {
    throw AdvisorError.exportFailed(filePath, error instanceof Error ? error.message : String(error));
  }
}

async function runMatch(options: MatchOptions): Promise<void> {
  try {
    const context = loadAdvisorContext(options);
    const request = readAnswersFile(options.answers);
    const about = options.about ?? request.about;
    const response = context.engine.score({ answers: request.answers, about, topK: parseTopK(options.top) });

    printResponse(context, response, options.json === true);
    if (!options.json) {
      await printExplanation(context, response, about);
    }
    if (options.export) {
      exportResponse(context, response, options.export);
      console.log(`Results written to ${options.export}`);
    }
  } catch (error) {
    handleCommandError(error);
  }
}

export function createMatchCommand(): Command {
  return new Command('match')
    .description('Score a saved answers file against the programme catalog')
    .requiredOption('-a, --answers <file>', 'JSON file with { "answers": { questionId: optionId }, "about"?: string }')
    .option('--about <text>', 'Free text about yourself (projects, modules, clubs)')
    .option('-k, --top <k>', 'Number of programmes to show')
    .option('--json', 'Print the full response as JSON')
    .option('-e, --export <file>', 'Also write a plain-text summary to this file')
    .option('--no-explain', 'Skip the AI explanation even when OPENAI_API_KEY is set')
    .option('-d, --data-dir <dir>', 'Directory holding programmes.csv and the JSON definitions')
    .option('-c, --catalog <file>', 'Programme catalog CSV')
    .action(runMatch);
}
