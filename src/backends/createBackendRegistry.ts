import { AnthropicConfig } from '../config/anthropic.js';
import { loadBackendTable } from '../config/backends.js';
import type { BackendTable } from '../config/backends.js';
import { GeminiConfig } from '../config/gemini.js';
import { OpenAIConfig } from '../config/openai.js';
import { BackendRegistry } from '../routing/BackendRegistry.js';
import type { BackendCapability } from '../routing/types.js';
import { createLogger } from '../utils/logger.js';
import { AnthropicBackend } from './AnthropicBackend.js';
import type { LanguageModelBackend } from './Backend.js';
import { GeminiBackend } from './GeminiBackend.js';
import { OpenAIBackend } from './OpenAIBackend.js';
import type { OpenAIBackendOptions } from './OpenAIBackend.js';

const logger = createLogger('BackendFactory');

export interface BackendRegistryOptions {
  /** Capability table (default: config/backends.json) */
  table?: BackendTable;
  openai?: OpenAIBackendOptions;
}

/**
 * Placeholder for a provider without credentials
 *
 * Registered unavailable so the router can name it in fallbacks; never
 * selected, and fails loudly if invoked directly.
 */
class UnconfiguredBackend implements LanguageModelBackend {
  constructor(public readonly id: string, private readonly provider: string) {}

  async invoke(): Promise<string> {
    throw new Error(`Backend "${this.id}" has no ${this.provider} credentials configured`);
  }
}

function isConfigured(capability: BackendCapability): boolean {
  switch (capability.provider) {
    case 'anthropic':
      return AnthropicConfig.isConfigured();
    case 'openai':
      return OpenAIConfig.isConfigured();
    case 'gemini':
      return GeminiConfig.isConfigured();
  }
}

function createBackend(capability: BackendCapability, options: BackendRegistryOptions): LanguageModelBackend {
  switch (capability.provider) {
    case 'anthropic':
      return new AnthropicBackend(capability.id, AnthropicConfig.getModel(capability.model));
    case 'openai':
      return new OpenAIBackend(capability.id, OpenAIConfig.getModel(capability.model), options.openai);
    case 'gemini':
      return new GeminiBackend(capability.id, GeminiConfig.getModel(capability.model));
  }
}

/**
 * Build a registry from the capability table and the credentials present
 * in the environment (availability = credentials present)
 */
export function createBackendRegistry(options: BackendRegistryOptions = {}): BackendRegistry {
  const table = options.table ?? loadBackendTable();
  const registry = new BackendRegistry(table.defaultBackendId);

  for (const capability of table.backends) {
    if (isConfigured(capability)) {
      registry.register(capability, createBackend(capability, options), true);
    } else {
      registry.register(capability, new UnconfiguredBackend(capability.id, capability.provider), false);
    }
  }

  logger.info('Backend registry created', {
    registered: registry.size,
    available: registry.availableIds(),
    defaultBackendId: table.defaultBackendId,
  });

  return registry;
}
