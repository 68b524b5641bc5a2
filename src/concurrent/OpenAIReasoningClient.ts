import type OpenAI from 'openai';
import pLimit from 'p-limit';
import { OpenAIConfig } from '../config/openai.js';
import { CallError, err, ok, type Result } from '../core/errors.js';
import { RunLogger } from '../utils/logger.js';
import type { ReasoningCallOptions, ReasoningClient, ReasoningRequest } from './ReasoningClient.js';

/**
 * OpenAI Reasoning Client Options
 */
export interface OpenAIReasoningClientOptions {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /**
   * Maximum concurrent API calls allowed.
   * Default: 4
   */
  maxConcurrentApiCalls?: number;
  /**
   * Maximum requests per second.
   * Default: undefined (no rate limiting, only concurrency limiting)
   */
  requestsPerSecond?: number;
}

/**
 * OpenAI Reasoning Client
 *
 * Wrapper for an OpenAI-compatible chat completions endpoint.
 * Limits concurrent calls and spaces requests; one attempt per call.
 */
export class OpenAIReasoningClient implements ReasoningClient {
  readonly name = 'openai';
  private client: OpenAI;
  private logger: RunLogger;
  private model: string;
  private temperature: number;
  private maxOutputTokens?: number;
  private apiLimiter: ReturnType<typeof pLimit>;
  private minDelayMs: number;
  private lastRequestTime: number = 0;
  private rateLimitMutex: Promise<void> = Promise.resolve();

  constructor(runId: string, options?: OpenAIReasoningClientOptions) {
    const maxConcurrentApiCalls = options?.maxConcurrentApiCalls ?? 4;
    const requestsPerSecond = options?.requestsPerSecond;

    this.apiLimiter = pLimit(maxConcurrentApiCalls);
    this.minDelayMs = requestsPerSecond ? Math.ceil(1000 / requestsPerSecond) : 0;

    this.client = OpenAIConfig.getClient();
    this.model = options?.model || OpenAIConfig.getModel();
    this.temperature = options?.temperature ?? 0.3;
    this.maxOutputTokens = options?.maxOutputTokens;
    this.logger = new RunLogger(runId, `OpenAI:${this.model}`);

    this.logger.debug('Client initialized', {
      maxConcurrentApiCalls,
      requestsPerSecond: requestsPerSecond ?? 'unlimited',
      minDelayMs: this.minDelayMs,
    });
  }

  /**
   * Enforce rate limiting by waiting if necessary
   * Uses a mutex to ensure sequential timing even with concurrent calls
   */
  private async enforceRateLimit(): Promise<void> {
    if (this.minDelayMs === 0) return;

    this.rateLimitMutex = this.rateLimitMutex.then(async () => {
      const elapsed = Date.now() - this.lastRequestTime;
      const waitTime = this.minDelayMs - elapsed;

      if (waitTime > 0) {
        this.logger.debug(`Rate limiting: waiting ${waitTime}ms`);
        await new Promise((resolve) => setTimeout(resolve, waitTime));
      }

      this.lastRequestTime = Date.now();
    });

    await this.rateLimitMutex;
  }

  async analyze(
    request: ReasoningRequest,
    options: ReasoningCallOptions = {}
  ): Promise<Result<string, CallError>> {
    return this.apiLimiter(async () => {
      this.logger.debug('API slot acquired', {
        activeCount: this.apiLimiter.activeCount,
        pendingCount: this.apiLimiter.pendingCount,
      });

      await this.enforceRateLimit();

      try {
        const response = await this.client.chat.completions.create(
          {
            model: this.model,
            temperature: this.temperature,
            ...(this.maxOutputTokens ? { max_tokens: this.maxOutputTokens } : {}),
            messages: [
              { role: 'system', content: request.system },
              { role: 'user', content: request.user },
            ],
          },
          { signal: options.signal }
        );

        const content = response.choices[0]?.message?.content ?? '';
        if (content.trim().length === 0) {
          return err(new CallError('Empty completion returned'));
        }
        return ok(content);
      } catch (error) {
        const callError = CallError.from(error);
        if (callError.status === 429) {
          this.logger.warn('Rate limit hit', {
            error: callError.message,
            retryAfterMs: callError.retryAfterMs,
          });
        } else {
          this.logger.error('API call failed', error, { status: callError.status });
        }
        return err(callError);
      }
    });
  }
}
