import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const logger = createLogger('AnthropicConfig');

/**
 * Anthropic Configuration
 *
 * Manages connection to the Anthropic Messages API.
 * The backend is registered as available only when ANTHROPIC_API_KEY is set.
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  /**
   * Get required environment variables
   * @param fallbackModel Model used when ANTHROPIC_MODEL is unset
   */
  static getConfig(fallbackModel: string = 'claude-sonnet-4-5') {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const model = process.env.ANTHROPIC_MODEL || fallbackModel;

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  /**
   * Whether credentials are present, without throwing
   */
  static isConfigured(): boolean {
    return Boolean(process.env.ANTHROPIC_API_KEY);
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
        timeout: 600000, // 10 minutes
        maxRetries: 0, // Rate limits are retried by the backend itself
      });

      logger.info('Anthropic client initialized', { model: config.model });
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
