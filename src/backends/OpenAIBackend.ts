import type winston from 'winston';
import pLimit from 'p-limit';
import { setTimeout as sleep } from 'timers/promises';
import { OpenAIConfig } from '../config/openai.js';
import { createLogger } from '../utils/logger.js';
import type { InvocationOptions, LanguageModelBackend } from './Backend.js';
import { retryOnRateLimit } from './retry.js';

/**
 * OpenAI backend options
 */
export interface OpenAIBackendOptions {
  /**
   * Maximum concurrent API calls; excess calls queue.
   * Default: 20
   */
  maxConcurrentApiCalls?: number;
  /**
   * Maximum requests per second.
   * Default: undefined (only concurrency limiting)
   */
  requestsPerSecond?: number;
}

interface ResponsesRequest {
  model: string;
  input: string;
  instructions?: string;
  temperature?: number;
  max_output_tokens?: number;
}

/**
 * The part of the OpenAI client this backend calls
 */
export interface OpenAIResponsesClient {
  responses: {
    create(
      body: ResponsesRequest,
      options?: { signal?: AbortSignal }
    ): Promise<{
      output_text: string;
      usage?: { input_tokens: number; output_tokens: number } | null;
    }>;
  };
}

/**
 * OpenAI backend (Responses API)
 *
 * Calls pass through a concurrency limiter and, when a request rate is
 * configured, a minimum delay enforced across concurrent callers.
 */
export class OpenAIBackend implements LanguageModelBackend {
  private readonly logger: winston.Logger;
  private readonly apiLimiter: ReturnType<typeof pLimit>;
  private readonly minDelayMs: number;
  private lastRequestTime: number = 0;
  private rateLimitMutex: Promise<void> = Promise.resolve();

  constructor(
    public readonly id: string,
    private readonly model: string,
    options: OpenAIBackendOptions = {},
    private readonly client: OpenAIResponsesClient = OpenAIConfig.getClient()
  ) {
    const maxConcurrentApiCalls = options.maxConcurrentApiCalls ?? 20;
    this.apiLimiter = pLimit(maxConcurrentApiCalls);
    this.minDelayMs = options.requestsPerSecond ? Math.ceil(1000 / options.requestsPerSecond) : 0;
    this.logger = createLogger(`Backend:${id}`);

    this.logger.debug('Client initialized', {
      model,
      maxConcurrentApiCalls,
      requestsPerSecond: options.requestsPerSecond ?? 'unlimited',
      minDelayMs: this.minDelayMs,
    });
  }

  /**
   * Wait until the minimum delay since the previous request has passed
   * Chained on a promise so concurrent callers are spaced one by one
   */
  private async enforceRateLimit(): Promise<void> {
    if (this.minDelayMs === 0) return;

    this.rateLimitMutex = this.rateLimitMutex.then(async () => {
      const waitTime = this.minDelayMs - (Date.now() - this.lastRequestTime);

      if (waitTime > 0) {
        this.logger.debug(`Rate limiting: waiting ${waitTime}ms`);
        await sleep(waitTime);
      }

      this.lastRequestTime = Date.now();
    });

    await this.rateLimitMutex;
  }

  async invoke(prompt: string, systemInstruction: string | undefined, options: InvocationOptions = {}): Promise<string> {
    return this.apiLimiter(async () => {
      this.logger.debug('API slot acquired', {
        activeCount: this.apiLimiter.activeCount,
        pendingCount: this.apiLimiter.pendingCount,
      });

      return retryOnRateLimit(
        async () => {
          await this.enforceRateLimit();

          const response = await this.client.responses.create(
            {
              model: this.model,
              input: prompt,
              ...(systemInstruction ? { instructions: systemInstruction } : {}),
              ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
              ...(options.maxOutputTokens ? { max_output_tokens: options.maxOutputTokens } : {}),
            },
            { signal: options.signal }
          );

          this.logger.debug('Completion received', {
            model: this.model,
            inputTokens: response.usage?.input_tokens ?? 0,
            outputTokens: response.usage?.output_tokens ?? 0,
          });
          return response.output_text;
        },
        { backendId: this.id, logger: this.logger, signal: options.signal }
      );
    });
  }
}
