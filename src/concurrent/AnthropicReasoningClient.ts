import type Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../config/anthropic.js';
import { CallError, err, ok, type Result } from '../core/errors.js';
import { RunLogger } from '../utils/logger.js';
import type { ReasoningCallOptions, ReasoningClient, ReasoningRequest } from './ReasoningClient.js';

export interface AnthropicReasoningClientOptions {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Anthropic Reasoning Client
 *
 * Wrapper for the Anthropic Messages API. One attempt per call.
 */
export class AnthropicReasoningClient implements ReasoningClient {
  readonly name = 'anthropic';
  private client: Anthropic;
  private logger: RunLogger;
  private model: string;
  private temperature: number;
  private maxOutputTokens: number;

  constructor(runId: string, options?: AnthropicReasoningClientOptions) {
    this.client = AnthropicConfig.getClient();
    this.model = options?.model || AnthropicConfig.getModel();
    this.temperature = options?.temperature ?? 0.3;
    // Larger values trip the SDK's non-streaming duration guard
    this.maxOutputTokens = Math.min(options?.maxOutputTokens ?? 8192, 20000);
    this.logger = new RunLogger(runId, `Claude:${this.model}`);
  }

  async analyze(
    request: ReasoningRequest,
    options: ReasoningCallOptions = {}
  ): Promise<Result<string, CallError>> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxOutputTokens,
          temperature: this.temperature,
          system: `${request.system}\n\nRespond with valid JSON only. No explanations.`,
          messages: [{ role: 'user', content: request.user }],
        },
        { signal: options.signal }
      );

      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          content += block.text;
        }
      }

      if (response.stop_reason === 'max_tokens') {
        this.logger.warn('Response truncated at max_tokens', { maxOutputTokens: this.maxOutputTokens });
      }
      if (content.trim().length === 0) {
        return err(new CallError('Empty completion returned'));
      }
      return ok(content);
    } catch (error) {
      const callError = CallError.from(error);
      if (callError.status === 429) {
        this.logger.warn('Rate limit hit', { error: callError.message, retryAfterMs: callError.retryAfterMs });
      } else {
        this.logger.error('API call failed', error, { status: callError.status });
      }
      return err(callError);
    }
  }
}
