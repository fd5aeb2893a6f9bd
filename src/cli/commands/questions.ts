import { Command } from 'commander';
import { handleCommandError, loadAdvisorContext } from '../lib/advisor-context.js';
import { renderQuestions } from '../lib/render.js';

interface QuestionsOptions {
  dataDir?: string;
  catalog?: string;
}

async function listQuestions(options: QuestionsOptions): Promise<void> {
  try {
    const { engine } = loadAdvisorContext(options);
    for (const line of renderQuestions(engine.questionnaire)) {
      console.log(line);
    }
  } catch (error) {
    handleCommandError(error);
  }
}

export function createQuestionsCommand(): Command {
  return new Command('questions')
    .description('List questions and option ids for writing an answers file')
    .option('-d, --data-dir <dir>', 'Directory holding programmes.csv and the JSON definitions')
    .option('-c, --catalog <file>', 'Programme catalog CSV')
    .action(listQuestions);
}
