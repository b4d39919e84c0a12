import fs from 'fs';
import { validator } from '../utils/validators.js';
import { ConfigurationError } from '../utils/errors.js';
import { configPath } from './paths.js';

/**
 * Classification thresholds and keyword sets
 */
export interface ClassificationConfig {
  /** Share of Cyrillic letters above which the denser ratio applies */
  cyrillicShare: number;
  cyrillicCharsPerToken: number;
  latinCharsPerToken: number;
  /** Estimates strictly above this are 'large-document' */
  largeDocumentTokens: number;
  /** Upper bound (inclusive) for 'quick' tasks */
  quickMaxTokens: number;
  reasoningKeywords: string[];
  /** Regular expression sources, matched case-insensitively */
  quickPatterns: string[];
}

export const classificationSchema = {
  type: 'object',
  required: [
    'cyrillicShare',
    'cyrillicCharsPerToken',
    'latinCharsPerToken',
    'largeDocumentTokens',
    'quickMaxTokens',
    'reasoningKeywords',
    'quickPatterns',
  ],
  additionalProperties: false,
  properties: {
    cyrillicShare: { type: 'number', minimum: 0, maximum: 1 },
    cyrillicCharsPerToken: { type: 'number', exclusiveMinimum: 0 },
    latinCharsPerToken: { type: 'number', exclusiveMinimum: 0 },
    largeDocumentTokens: { type: 'integer', minimum: 1 },
    quickMaxTokens: { type: 'integer', minimum: 0 },
    reasoningKeywords: { type: 'array', items: { type: 'string', minLength: 1 } },
    quickPatterns: { type: 'array', items: { type: 'string', minLength: 1 } },
  },
};

function isClassificationConfig(data: unknown): data is ClassificationConfig {
  validator.assertValid('classification', classificationSchema, data, 'classification config');
  return true;
}

/**
 * Validate a classification config object, including its regex sources
 */
export function parseClassificationConfig(data: unknown): ClassificationConfig {
  if (!isClassificationConfig(data)) {
    throw new ConfigurationError('Invalid classification config');
  }

  for (const pattern of data.quickPatterns) {
    try {
      new RegExp(pattern, 'iu');
    } catch (error) {
      throw new ConfigurationError(`Invalid quick pattern "${pattern}"`, error);
    }
  }

  return data;
}

let cached: ClassificationConfig | null = null;

/**
 * Load config/classification.json (cached after the first call)
 * @param filePath Alternate file to read instead of the bundled one
 */
export function loadClassificationConfig(filePath?: string): ClassificationConfig {
  if (!filePath && cached) {
    return cached;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath ?? configPath('classification.json'), 'utf-8'));
  const config = parseClassificationConfig(raw);

  if (!filePath) {
    cached = config;
  }
  return config;
}
