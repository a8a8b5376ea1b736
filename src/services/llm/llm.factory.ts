import { AnthropicCompletionClient } from './anthropic.adapter';
import { CompletionClient, LLMConfig } from './llm.adapter';
import { OpenAICompletionClient } from './openai.adapter';

export class LLMFactory {
  /** Returns null when the provider has no credentials, which switches AI features to their fallbacks. */
  static create(provider: string, config: LLMConfig): CompletionClient | null {
    if (!config.apiKey) return null;

    switch (provider) {
      case 'openai':
        return new OpenAICompletionClient(config);
      case 'anthropic':
        return new AnthropicCompletionClient(config);
      default:
        throw new Error(`Unsupported LLM provider: ${provider}`);
    }
  }
}
