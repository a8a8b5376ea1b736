import OpenAI from 'openai';
import { HistoryTurn } from '../../types/session';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { CompletionClient, DEFAULT_TIMEOUT_MS, LLMConfig } from './llm.adapter';

export class OpenAICompletionClient implements CompletionClient {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(private config: LLMConfig) {
    // Retries are owned by the caller, which applies its own backoff policy.
    this.client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async complete(systemPrompt: string, history: HistoryTurn[], userText: string): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: systemPrompt },
          ...history.map(
            (turn): OpenAI.Chat.ChatCompletionMessageParam =>
              turn.role === 'user'
                ? { role: 'user', content: turn.text }
                : { role: 'assistant', content: turn.text }
          ),
          { role: 'user', content: userText },
        ],
        temperature: this.config.temperature ?? 0.3,
        max_tokens: this.config.maxTokens ?? 400,
      });

      const content = response.choices[0]?.message?.content ?? '';
      logger.debug('OpenAI completion generated', {
        model: this.config.model,
        prompt: response.usage?.prompt_tokens ?? 0,
        completion: response.usage?.completion_tokens ?? 0,
      });
      return content.trim();
    } catch (error) {
      if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
        throw new HttpError(error.status, error.message, 'OpenAI');
      }
      throw error;
    }
  }
}
