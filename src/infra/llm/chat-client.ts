import { AdvisorError } from '../../domain/errors.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface ChatClient {
  /** Text of the first choice, or null when the model returned none */
  complete(request: ChatCompletionRequest): Promise<string | null>;
}

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readContent(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return null;
  }
  const [first] = data.choices;
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  return typeof first.message.content === 'string' ? first.message.content : null;
}

/**
 * Chat Completions client for OpenAI and compatible endpoints.
 */
export class OpenAIChatClient implements ChatClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIChatClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: ChatCompletionRequest): Promise<string | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => response.statusText);
        throw AdvisorError.explanationFailed(`request failed: ${response.status} ${detail}`);
      }

      return readContent(await response.json());
    } finally {
      clearTimeout(timer);
    }
  }
}
