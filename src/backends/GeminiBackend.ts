import type winston from 'winston';
import type { GenerateContentRequest, ModelParams, SingleRequestOptions } from '@google/generative-ai';
import { GeminiConfig } from '../config/gemini.js';
import { createLogger } from '../utils/logger.js';
import type { InvocationOptions, LanguageModelBackend } from './Backend.js';
import { retryOnRateLimit } from './retry.js';

/**
 * The part of the Generative AI client this backend calls
 */
export interface GeminiModelClient {
  getGenerativeModel(params: ModelParams): {
    generateContent(
      request: GenerateContentRequest,
      options?: SingleRequestOptions
    ): Promise<{
      response: {
        text(): string;
        usageMetadata?: { promptTokenCount: number; candidatesTokenCount: number };
      };
    }>;
  };
}

/**
 * Gemini backend (generateContent)
 */
export class GeminiBackend implements LanguageModelBackend {
  private readonly logger: winston.Logger;

  constructor(
    public readonly id: string,
    private readonly model: string,
    private readonly client: GeminiModelClient = GeminiConfig.getClient()
  ) {
    this.logger = createLogger(`Backend:${id}`);
  }

  async invoke(prompt: string, systemInstruction: string | undefined, options: InvocationOptions = {}): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      ...(systemInstruction ? { systemInstruction } : {}),
    });

    return retryOnRateLimit(
      async () => {
        const result = await model.generateContent(
          {
            contents: [{ role: 'user', parts: [{ text: prompt }] }],
            generationConfig: {
              ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
              ...(options.maxOutputTokens ? { maxOutputTokens: options.maxOutputTokens } : {}),
            },
          },
          { signal: options.signal }
        );

        const text = result.response.text();
        this.logger.debug('Completion received', {
          model: this.model,
          inputTokens: result.response.usageMetadata?.promptTokenCount ?? 0,
          outputTokens: result.response.usageMetadata?.candidatesTokenCount ?? 0,
        });
        return text;
      },
      { backendId: this.id, logger: this.logger, signal: options.signal }
    );
  }
}
