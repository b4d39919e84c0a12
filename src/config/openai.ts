import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const logger = createLogger('OpenAIConfig');

/**
 * OpenAI Configuration
 *
 * Manages connection to the standard OpenAI API (Responses API).
 * The backend is registered as available only when OPENAI_API_KEY is set.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   * @param fallbackModel Model used when OPENAI_MODEL is unset
   */
  static getConfig(fallbackModel: string = 'gpt-4.1') {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const model = process.env.OPENAI_MODEL || fallbackModel;

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
      model,
    };
  }

  static isConfigured(): boolean {
    return Boolean(process.env.OPENAI_API_KEY);
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
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        maxRetries: 0,
      });

      logger.info('OpenAI client initialized', {
        model: config.model,
        organization: config.organization ?? null,
      });
    }

    return this.client;
  }

  /**
   * Get the model name
   */
  static getModel(fallbackModel?: string): string {
    return this.getConfig(fallbackModel).model;
  }
}
