import type { LanguageModelBackend } from '../backends/Backend.js';
import { createLogger } from '../utils/logger.js';
import type { BackendCapability } from './types.js';

const logger = createLogger('BackendRegistry');

export interface RegisteredBackend {
  capability: BackendCapability;
  backend: LanguageModelBackend;
  available: boolean;
}

/**
 * Backend registry
 *
 * Explicit configuration object handed to routers and executors, so several
 * independently configured pipelines can coexist in one process.
 */
export class BackendRegistry {
  private readonly entries: Map<string, RegisteredBackend> = new Map();

  constructor(public readonly defaultBackendId: string) {}

  register(capability: BackendCapability, backend: LanguageModelBackend, available: boolean = true): this {
    if (capability.id !== backend.id) {
      throw new Error(`Backend id "${backend.id}" does not match capability id "${capability.id}"`);
    }
    this.entries.set(capability.id, { capability, backend, available });
    logger.debug('Backend registered', { backendId: capability.id, available });
    return this;
  }

  setAvailability(backendId: string, available: boolean): void {
    const entry = this.entries.get(backendId);
    if (!entry) {
      throw new Error(`Unknown backend "${backendId}"`);
    }
    if (entry.available !== available) {
      logger.info('Backend availability changed', { backendId, available });
    }
    entry.available = available;
  }

  isAvailable(backendId: string): boolean {
    return this.entries.get(backendId)?.available ?? false;
  }

  get(backendId: string): RegisteredBackend | undefined {
    return this.entries.get(backendId);
  }

  /**
   * Capability profiles of every registered backend, available or not
   */
  capabilities(): BackendCapability[] {
    return [...this.entries.values()].map((entry) => entry.capability);
  }

  availableIds(): string[] {
    return [...this.entries.values()].filter((entry) => entry.available).map((entry) => entry.capability.id);
  }

  get size(): number {
    return this.entries.size;
  }
}
