import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import type { Question } from '../../domain/profile/questionnaire.js';
import { handleCommandError, loadAdvisorContext } from '../lib/advisor-context.js';
import { exportResponse, parseTopK, printExplanation, printResponse } from './match.js';

interface QuizOptions {
  top?: string;
  export?: string;
  explain?: boolean;
  dataDir?: string;
  catalog?: string;
}

async function askQuestion(question: Question, position: number, total: number): Promise<string> {
  const { optionId } = await inquirer.prompt<{ optionId: string }>([
    {
      type: 'list',
      name: 'optionId',
      message: `(${position}/${total}) ${question.prompt}`,
      choices: question.options.map((option) => ({ name: option.label, value: option.id })),
    },
  ]);
  return optionId;
}

async function runQuiz(options: QuizOptions): Promise<void> {
  try {
    const context = loadAdvisorContext(options);
    const { questions } = context.engine.questionnaire;

    console.log(chalk.cyan('\n🎓 Programme Advisor\n'));
    console.log(chalk.white('Answer a few quick questions; we will infer your work-mode profile.\n'));

    const answers: Record<string, string> = {};
    for (const [index, question] of questions.entries()) {
      answers[question.id] = await askQuestion(question, index + 1, questions.length);
    }

    let about: string | undefined;
    if (context.engine.acceptsFreeText) {
      ({ about } = await inquirer.prompt<{ about: string }>([
        {
          type: 'input',
          name: 'about',
          message: 'Optional: tell us about yourself (projects, modules, clubs, goals)',
        },
      ]));
    }

    const response = context.engine.score({ answers, about, topK: parseTopK(options.top) });
    printResponse(context, response, false);
    await printExplanation(context, response, about);

    if (options.export) {
      exportResponse(context, response, options.export);
      console.log(chalk.green(`✓ Results written to ${options.export}`));
    }
  } catch (error) {
    handleCommandError(error);
  }
}

export function createQuizCommand(): Command {
  return new Command('quiz')
    .description('Answer the questionnaire interactively and see your matches')
    .option('-k, --top <k>', 'Number of programmes to show')
    .option('-e, --export <file>', 'Write a plain-text summary to this file')
    .option('--no-explain', 'Skip the AI explanation even when OPENAI_API_KEY is set')
    .option('-d, --data-dir <dir>', 'Directory holding programmes.csv and the JSON definitions')
    .option('-c, --catalog <file>', 'Programme catalog CSV')
    .action(runQuiz);
}
