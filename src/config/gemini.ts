import { GoogleGenerativeAI } from '@google/generative-ai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const logger = createLogger('GeminiConfig');

/**
 * Gemini Configuration
 *
 * Manages connection to the Google Generative AI API.
 */
export class GeminiConfig {
  private static client: GoogleGenerativeAI | null = null;

  /**
   * Get required environment variables
   * @param fallbackModel Model used when GEMINI_MODEL is unset
   */
  static getConfig(fallbackModel: string = 'gemini-2.5-flash') {
    const apiKey = process.env.GEMINI_API_KEY;
    const model = process.env.GEMINI_MODEL || fallbackModel;

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Gemini configuration. ' +
          'Please ensure GEMINI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  static isConfigured(): boolean {
    return Boolean(process.env.GEMINI_API_KEY);
  }

  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create the Generative AI client
   */
  static getClient(): GoogleGenerativeAI {
    if (!this.client) {
      const config = this.getConfig();
      this.client = new GoogleGenerativeAI(config.apiKey);
      logger.info('Gemini client initialized', { model: config.model });
    }

    return this.client;
  }

  static getModel(fallbackModel?: string): string {
    return this.getConfig(fallbackModel).model;
  }
}
