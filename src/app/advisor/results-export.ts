import type { ScoringResponse } from './advisor-engine.js';

export interface ExportOptions {
  title?: string;
  /** Display column used as the match heading */
  nameColumn?: string;
  /** Display column shown in brackets after the name */
  detailColumn?: string;
  label?: (trait: string) => string;
}

/**
 * Plain-text rendering of a scoring response for download/sharing.
 */
export function formatResultsText(response: ScoringResponse, options: ExportOptions = {}): string {
  const title = options.title ?? 'PROGRAMME ADVISOR - YOUR RESULTS';
  const nameColumn = options.nameColumn ?? 'program_name';
  const detailColumn = options.detailColumn ?? 'institution';
  const label = options.label ?? ((trait: string) => trait);

  const lines: string[] = [title, '', 'YOUR IDENTITY:', response.summary, response.snapshot.text, ''];

  lines.push('YOUR TOP PROGRAMME MATCHES:');
  if (response.matches.length === 0) {
    lines.push('No programmes available.');
  }

  for (const match of response.matches) {
    const name = match.displayFields[nameColumn] || match.itemId;
    const detail = match.displayFields[detailColumn];
    lines.push(`${match.rank}. ${name}${detail ? ` (${detail})` : ''} - Match: ${match.score}%`);
    if (match.sharedTraits.length > 0) {
      lines.push(`   why: shares ${match.sharedTraits.map((shared) => label(shared.trait)).join(', ')}`);
    }
  }

  return `${lines.join('\n')}\n`;
}
