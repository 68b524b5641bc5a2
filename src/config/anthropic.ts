import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const log = createLogger('AnthropicConfig');

/**
 * Anthropic Configuration
 *
 * Manages connection to the Anthropic Messages API
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const model = process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-5-20250929';

    if (!apiKey) {
      throw new ConfigurationError('Missing required Anthropic configuration', [
        'ANTHROPIC_API_KEY must be set in .env',
      ]);
    }

    return {
      apiKey,
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
   * Get or create Anthropic client
   */
  static getClient(): Anthropic {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new Anthropic({
        apiKey: config.apiKey,
        maxRetries: 0,
      });

      log.info('Anthropic client initialized', { model: config.model });
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
   * Validate Anthropic configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      log.error('Anthropic configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
