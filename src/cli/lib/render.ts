import chalk from 'chalk';
import type { ScoringResponse } from '../../app/advisor/advisor-engine.js';
import type { Questionnaire } from '../../domain/profile/questionnaire.js';

export interface RenderOptions {
  nameColumn: string;
  detailColumn: string;
  label: (trait: string) => string;
}

function scoreColor(score: number): (text: string) => string {
  if (score >= 80) return chalk.green;
  if (score >= 50) return chalk.yellow;
  return chalk.white;
}

export function renderResponse(response: ScoringResponse, options: RenderOptions): string[] {
  const lines: string[] = [];

  lines.push(chalk.cyan('\n🧭 Your identity snapshot\n'));
  lines.push(chalk.white(response.summary));
  lines.push(chalk.dim(response.snapshot.text));

  lines.push(chalk.cyan('\n🎓 Suggested programmes\n'));
  if (response.matches.length === 0) {
    lines.push(chalk.yellow('No programmes in the catalog.'));
    return lines;
  }

  for (const match of response.matches) {
    const name = match.displayFields[options.nameColumn] || match.itemId;
    const detail = match.displayFields[options.detailColumn];
    const color = scoreColor(match.score);

    lines.push(`${chalk.white(`${match.rank}.`)} ${chalk.bold(name)}${detail ? chalk.dim(` — ${detail}`) : ''}`);
    lines.push(`   ${chalk.white('Match:')} ${color(`${match.score}%`)}`);
    if (match.sharedTraits.length > 0) {
      lines.push(`   ${chalk.white('Why:')} ${match.sharedTraits.map((shared) => options.label(shared.trait)).join(', ')}`);
    }
  }

  return lines;
}

export function renderQuestions(questionnaire: Questionnaire): string[] {
  const lines: string[] = [chalk.cyan(`\n📝 Questionnaire (${questionnaire.questions.length} questions)\n`)];

  for (const question of questionnaire.questions) {
    lines.push(`${chalk.bold(question.id)}  ${question.prompt}`);
    for (const option of question.options) {
      lines.push(`    ${chalk.dim(option.id.padEnd(20))} ${option.label}`);
    }
    lines.push('');
  }

  return lines;
}
