import fs from 'fs';
import { validator } from '../utils/validators.js';
import { ConfigurationError } from '../utils/errors.js';
import { TASK_CATEGORIES } from '../routing/types.js';
import type { BackendCapability } from '../routing/types.js';
import { configPath } from './paths.js';

/**
 * Backend capability table
 */
export interface BackendTable {
  defaultBackendId: string;
  backends: BackendCapability[];
}

export const backendTableSchema = {
  type: 'object',
  required: ['defaultBackendId', 'backends'],
  additionalProperties: false,
  properties: {
    defaultBackendId: { type: 'string', minLength: 1 },
    backends: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: [
          'id',
          'provider',
          'model',
          'maxContextTokens',
          'safeContextRatio',
          'costTier',
          'latencyTier',
          'reasoningDepth',
          'strengths',
          'priority',
        ],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          provider: { enum: ['anthropic', 'openai', 'gemini'] },
          model: { type: 'string', minLength: 1 },
          maxContextTokens: { type: 'integer', minimum: 1 },
          safeContextRatio: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
          costTier: { type: 'number', minimum: 0 },
          latencyTier: { type: 'number', minimum: 0 },
          reasoningDepth: { type: 'number', minimum: 0 },
          strengths: { type: 'array', items: { enum: [...TASK_CATEGORIES] } },
          priority: { type: 'integer' },
        },
      },
    },
  },
};

function isBackendTable(data: unknown): data is BackendTable {
  validator.assertValid('backend-table', backendTableSchema, data, 'backend capability table');
  return true;
}

/**
 * Validate a capability table: schema, unique ids, known default
 */
export function parseBackendTable(data: unknown): BackendTable {
  if (!isBackendTable(data)) {
    throw new ConfigurationError('Invalid backend capability table');
  }

  const ids = new Set<string>();
  for (const backend of data.backends) {
    if (ids.has(backend.id)) {
      throw new ConfigurationError(`Duplicate backend id "${backend.id}"`);
    }
    ids.add(backend.id);
  }

  if (!ids.has(data.defaultBackendId)) {
    throw new ConfigurationError(
      `Default backend "${data.defaultBackendId}" is not in the capability table`
    );
  }

  return data;
}

/**
 * Load config/backends.json
 * @param filePath Alternate file to read instead of the bundled one
 */
export function loadBackendTable(filePath?: string): BackendTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath ?? configPath('backends.json'), 'utf-8'));
  return parseBackendTable(raw);
}
