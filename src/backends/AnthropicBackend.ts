import type winston from 'winston';
import type Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../config/anthropic.js';
import { createLogger } from '../utils/logger.js';
import type { InvocationOptions, LanguageModelBackend } from './Backend.js';
import { retryOnRateLimit } from './retry.js';

/**
 * Anthropic backend (Messages API)
 */

// The SDK refuses non-streaming requests whose worst case exceeds ten
// minutes: (3600s * maxTokens) / 128000 must stay under 600s.
const SAFE_MAX_TOKENS = 20000;
const DEFAULT_MAX_TOKENS = 8192;

/**
 * The part of the Anthropic client this backend calls
 */
export interface AnthropicMessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): Promise<{
      content: Array<{ type: string; text?: string }>;
      usage: { input_tokens: number; output_tokens: number };
      stop_reason: string | null;
    }>;
  };
}

export class AnthropicBackend implements LanguageModelBackend {
  private readonly logger: winston.Logger;

  constructor(
    public readonly id: string,
    private readonly model: string,
    private readonly client: AnthropicMessagesClient = AnthropicConfig.getClient()
  ) {
    this.logger = createLogger(`Backend:${id}`);
  }

  async invoke(prompt: string, systemInstruction: string | undefined, options: InvocationOptions = {}): Promise<string> {
    const requested = options.maxOutputTokens ?? DEFAULT_MAX_TOKENS;
    const maxTokens = Math.min(requested, SAFE_MAX_TOKENS);

    if (requested > SAFE_MAX_TOKENS) {
      this.logger.warn(`Max tokens reduced from ${requested} to ${maxTokens} to avoid timeout`);
    }

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }],
    };
    if (systemInstruction) {
      body.system = systemInstruction;
    }
    if (options.temperature !== undefined) {
      body.temperature = options.temperature;
    }

    return retryOnRateLimit(
      async () => {
        const response = await this.client.messages.create(body, { signal: options.signal });

        let content = '';
        for (const block of response.content) {
          if (block.type === 'text' && block.text) {
            content += block.text;
          }
        }

        this.logger.debug('Completion received', {
          model: this.model,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          stopReason: response.stop_reason,
        });
        return content;
      },
      { backendId: this.id, logger: this.logger, maxRetries: 3, signal: options.signal }
    );
  }
}
