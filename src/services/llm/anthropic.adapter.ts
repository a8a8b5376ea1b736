import Anthropic from '@anthropic-ai/sdk';
import { HistoryTurn } from '../../types/session';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { CompletionClient, DEFAULT_TIMEOUT_MS, LLMConfig } from './llm.adapter';

interface AnthropicTurn {
  role: 'user' | 'assistant';
  content: string;
}

// The Messages API wants alternating roles starting with the user.
export function toAlternatingTurns(history: HistoryTurn[], userText: string): AnthropicTurn[] {
  const turns: AnthropicTurn[] = [];
  for (const turn of [...history, { role: 'user' as const, text: userText }]) {
    if (turns.length === 0 && turn.role === 'assistant') continue;

    const last = turns[turns.length - 1];
    if (last && last.role === turn.role) {
      last.content = `${last.content}\n${turn.text}`;
    } else {
      turns.push({ role: turn.role, content: turn.text });
    }
  }
  return turns;
}

export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = 'anthropic';
  private client: Anthropic;

  constructor(private config: LLMConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async complete(systemPrompt: string, history: HistoryTurn[], userText: string): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        system: systemPrompt,
        messages: toAlternatingTurns(history, userText),
        temperature: this.config.temperature ?? 0.3,
        max_tokens: this.config.maxTokens ?? 400,
      });

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      logger.debug('Anthropic completion generated', {
        model: this.config.model,
        prompt: response.usage?.input_tokens ?? 0,
        completion: response.usage?.output_tokens ?? 0,
      });
      return content;
    } catch (error) {
      if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
        throw new HttpError(error.status, error.message, 'Anthropic');
      }
      throw error;
    }
  }
}
