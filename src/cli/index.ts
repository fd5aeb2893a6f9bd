#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { createCatalogCommand } from './commands/catalog.js';
import { createConfigCommand } from './commands/config.js';
import { createMatchCommand } from './commands/match.js';
import { createQuestionsCommand } from './commands/questions.js';
import { createQuizCommand } from './commands/quiz.js';

const program = new Command();

program
  .name('advisor')
  .description('Programme Advisor - match your work-mode profile to university programmes')
  .version('1.0.0');

program.addCommand(createQuizCommand());
program.addCommand(createMatchCommand());
program.addCommand(createQuestionsCommand());
program.addCommand(createCatalogCommand());
program.addCommand(createConfigCommand());

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `advisor --help` for available commands'));
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.stack ?? error.message : String(error)));
  process.exit(1);
});
