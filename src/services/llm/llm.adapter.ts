import { HistoryTurn } from '../../types/session';

export interface CompletionClient {
  readonly provider: string;
  /**
   * Generates a reply for `userText` given the preceding turns.
   * Throws HttpError for non-2xx responses and plain errors for transport failures.
   */
  complete(systemPrompt: string, history: HistoryTurn[], userText: string): Promise<string>;
}

export interface LLMConfig {
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export const DEFAULT_TIMEOUT_MS = 40_000;
