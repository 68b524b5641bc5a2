import { AnthropicConfig } from '../config/anthropic.js';
import { OpenAIConfig } from '../config/openai.js';
import type { PipelineSettings, ReasoningProvider } from '../config/pipeline.js';
import { AnthropicReasoningClient } from './AnthropicReasoningClient.js';
import { OpenAIReasoningClient } from './OpenAIReasoningClient.js';
import type { ReasoningClient } from './ReasoningClient.js';

/**
 * Reasoning Client Factory
 *
 * Creates the client for the configured provider
 */
export class ReasoningClientFactory {
  /**
   * @param runId Run identifier for logging (usually the patent number)
   */
  static createClient(settings: PipelineSettings, runId: string): ReasoningClient {
    switch (settings.provider) {
      case 'openai':
        return new OpenAIReasoningClient(runId, {
          model: settings.model,
          maxConcurrentApiCalls: settings.concurrency,
        });

      case 'anthropic':
        return new AnthropicReasoningClient(runId, { model: settings.model });
    }
  }

  /**
   * Validate provider configuration without creating a client
   */
  static validateProvider(provider: ReasoningProvider): boolean {
    return provider === 'openai' ? OpenAIConfig.validate() : AnthropicConfig.validate();
  }
}
