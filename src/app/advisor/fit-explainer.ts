/**
 * Fit Explainer
 *
 * Optional AI paragraph on why the top matches fit. It only rewords facts
 * already in the scoring response; ranking never depends on it, and any
 * failure leaves the response without an explanation.
 */

import type { ChatClient, ChatMessage } from '../../infra/llm/chat-client.js';
import type { ScoringResponse } from './advisor-engine.js';

export interface FitExplainerOptions {
  client: ChatClient;
  model: string;
  nameColumn?: string;
  detailColumn?: string;
  label?: (trait: string) => string;
  logger?: Pick<Console, 'warn'>;
}

const SYSTEM_PROMPT =
  'You are an academic advising assistant. Be concise, plain-English, and use only the facts provided.';

export function buildExplanationMessages(
  response: ScoringResponse,
  about: string | undefined,
  options: Pick<FitExplainerOptions, 'nameColumn' | 'detailColumn' | 'label'> = {}
): ChatMessage[] {
  const nameColumn = options.nameColumn ?? 'program_name';
  const detailColumn = options.detailColumn ?? 'institution';
  const label = options.label ?? ((trait: string) => trait);

  const identity = [response.summary, response.snapshot.text, about?.trim()].filter(Boolean).join(' ');
  const programmes = response.matches.map((match) => {
    const name = match.displayFields[nameColumn] || match.itemId;
    const detail = match.displayFields[detailColumn];
    const traits = match.sharedTraits.map((shared) => label(shared.trait)).join(', ') || 'none';
    return `- ${name}${detail ? ` (${detail})` : ''}: ${match.score}% match, shared traits: ${traits}`;
  });

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: [
        'Identity snapshot:',
        identity,
        '',
        'Programmes:',
        ...programmes,
        '',
        'Write 3-5 sentences summarising why these programmes fit, referencing the traits shown.',
      ].join('\n'),
    },
  ];
}

export class FitExplainer {
  constructor(private readonly options: FitExplainerOptions) {}

  async explain(response: ScoringResponse, about?: string): Promise<string | null> {
    if (response.matches.length === 0) {
      return null;
    }

    try {
      const text = await this.options.client.complete({
        model: this.options.model,
        temperature: 0.2,
        messages: buildExplanationMessages(response, about, this.options),
      });
      return text?.trim() || null;
    } catch (error) {
      const logger = this.options.logger ?? console;
      logger.warn(`[FitExplainer] Skipped: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}
