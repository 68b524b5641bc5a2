import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const log = createLogger('OpenAIConfig');

/**
 * OpenAI Configuration
 *
 * Manages connection to an OpenAI-compatible chat completions endpoint.
 * OPENAI_BASE_URL points the SDK at a compatible gateway (e.g. a Qwen
 * deployment); left unset it talks to api.openai.com.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const baseURL = process.env.OPENAI_BASE_URL || undefined;
    const model = process.env.OPENAI_MODEL || 'gpt-4o-mini';

    if (!apiKey) {
      throw new ConfigurationError('Missing required OpenAI configuration', [
        'OPENAI_API_KEY must be set in .env',
      ]);
    }

    return {
      apiKey,
      organization,
      baseURL,
      model,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create OpenAI client
   *
   * SDK retries are disabled: the orchestrator owns retry and timeout.
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        baseURL: config.baseURL,
        maxRetries: 0,
      });

      log.info('OpenAI client initialized', {
        model: config.model,
        baseURL: config.baseURL ?? 'default',
      });
    }

    return this.client;
  }

  /**
   * Get the default model name
   */
  static getModel(): string {
    return this.getConfig().model;
  }

  /**
   * Validate OpenAI configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      log.error('OpenAI configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
