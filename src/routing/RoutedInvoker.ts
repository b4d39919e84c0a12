import type { InvocationOptions } from '../backends/Backend.js';
import { AuthenticationError, NoBackendAvailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { BackendRegistry } from './BackendRegistry.js';
import { BackendRouter } from './BackendRouter.js';
import type { TaskCategory, TaskProfile } from './types.js';

const logger = createLogger('RoutedInvoker');

export interface RoutedCall {
  prompt: string;
  systemInstruction?: string;
  /** Counted toward the size estimate, not sent separately */
  auxiliaryContext?: string;
  categoryHint?: TaskCategory;
  options?: InvocationOptions;
}

export interface RoutedResult {
  output: string;
  profile: TaskProfile;
}

/**
 * Classify, route and invoke one call
 *
 * An authentication failure marks the backend unavailable for later calls;
 * the in-flight call still fails with the original error.
 */
export class RoutedInvoker {
  constructor(
    private readonly registry: BackendRegistry,
    private readonly router: BackendRouter = new BackendRouter(registry)
  ) {}

  /**
   * Classification and backend choice without invoking anything
   */
  plan(call: RoutedCall): TaskProfile {
    return this.router.route(call.prompt, call.auxiliaryContext, call.categoryHint);
  }

  async invoke(call: RoutedCall, profile: TaskProfile = this.plan(call)): Promise<RoutedResult> {
    const entry = this.registry.get(profile.chosenBackend);
    if (!entry) {
      throw new NoBackendAvailableError(`Routed to unregistered backend "${profile.chosenBackend}"`);
    }

    try {
      const output = await entry.backend.invoke(call.prompt, call.systemInstruction, call.options);
      return { output, profile };
    } catch (error) {
      if (error instanceof AuthenticationError) {
        logger.error('Authentication failed, disabling backend', {
          backendId: profile.chosenBackend,
          error: error.message,
        });
        this.registry.setAvailability(profile.chosenBackend, false);
      }
      throw error;
    }
  }
}
