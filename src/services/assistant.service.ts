import { BusinessProfile } from '../types/knowledge';
import { HistoryTurn } from '../types/session';
import { HttpError, errorMessage } from '../utils/errors';
import { buildSystemPrompt } from '../utils/prompts';
import { logger } from '../utils/logger';
import { CompletionClient } from './llm/llm.adapter';

export const OFFLINE_REPLY =
  'Thanks for your message! A manager will answer shortly. To book a repair, send your phone number or type /ro.';
export const HIGH_LOAD_REPLY =
  "We're under heavy load right now and couldn't prepare an answer. Please try again in a minute.";
export const EMPTY_REPLY = "Sorry, I didn't quite get that. Could you rephrase your question?";

const MAX_ATTEMPTS = 5;
const BASE_DELAY_MS = 1000;
const MAX_DELAY_MS = 16_000;

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number): number {
  return Math.min(BASE_DELAY_MS * Math.pow(2, attempt - 1), MAX_DELAY_MS);
}

export function technicalErrorReply(status?: number): string {
  const code = status !== undefined ? ` (HTTP ${status})` : '';
  return `Technical pause${code}: I can't answer right now. A manager will get back to you, or send your phone number to book a repair.`;
}

export class AssistantService {
  constructor(
    private completion: CompletionClient | null,
    private profile: BusinessProfile,
    private sleep: Sleep = defaultSleep
  ) {}

  get available(): boolean {
    return this.completion !== null;
  }

  async reply(history: HistoryTurn[], userText: string, hint?: string | null): Promise<string> {
    if (!this.completion) {
      return OFFLINE_REPLY;
    }

    const systemPrompt = buildSystemPrompt(this.profile, hint);

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const content = await this.completion.complete(systemPrompt, history, userText);
        logger.debug('Assistant reply generated', { provider: this.completion.provider, attempt });
        return content || EMPTY_REPLY;
      } catch (error) {
        if (error instanceof HttpError && error.retryable) {
          if (attempt < MAX_ATTEMPTS) {
            const delay = backoffDelay(attempt);
            logger.warn('Completion API busy, backing off', { status: error.status, attempt, delay });
            await this.sleep(delay);
          }
          continue;
        }

        if (error instanceof HttpError) {
          logger.error('Completion API rejected the request', { status: error.status, error: error.message });
          return technicalErrorReply(error.status);
        }

        logger.error('Completion API call failed', { attempt, error: errorMessage(error) });
        return technicalErrorReply();
      }
    }

    logger.error('Completion API retries exhausted', { attempts: MAX_ATTEMPTS });
    return HIGH_LOAD_REPLY;
  }
}
