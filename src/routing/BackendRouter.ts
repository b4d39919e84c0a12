import { NoBackendAvailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { BackendRegistry } from './BackendRegistry.js';
import { TaskClassifier } from './TaskClassifier.js';
import { safeContextTokens } from './types.js';
import type { BackendCapability, TaskCategory, TaskClassification, TaskProfile } from './types.js';

/**
 * Backend Router
 *
 * Deterministic choice of a backend for a classified task:
 * - large-document: cheapest backend whose safe context holds the estimate,
 *   otherwise the largest-context backend
 * - reasoning: deepest reasoning
 * - quick: lowest cost + latency
 * - general: the configured default
 *
 * Ties within a rule go to a backend that declares the category among its
 * strengths, then by priority.
 *
 * An unavailable choice falls back to the next available backend by
 * priority. NoBackendAvailableError is the only error routing raises.
 */

const logger = createLogger('BackendRouter');

function byPriority(a: BackendCapability, b: BackendCapability): number {
  return a.priority - b.priority || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

function strengthFirst(category: TaskCategory): (a: BackendCapability, b: BackendCapability) => number {
  const declares = (capability: BackendCapability) => (capability.strengths.includes(category) ? 0 : 1);
  return (a, b) => declares(a) - declares(b) || byPriority(a, b);
}

export class BackendRouter {
  constructor(
    private readonly registry: BackendRegistry,
    private readonly classifier: TaskClassifier = new TaskClassifier()
  ) {}

  /**
   * Classify a task and select its backend
   */
  route(primaryText: string, auxiliaryContext?: string, hint?: TaskCategory): TaskProfile {
    return this.select(this.classifier.classify(primaryText, auxiliaryContext, hint));
  }

  select(classification: TaskClassification): TaskProfile {
    const capabilities = this.registry.capabilities();
    const available = capabilities.filter((capability) => this.registry.isAvailable(capability.id));

    if (available.length === 0) {
      logger.error('No backend available', {
        category: classification.category,
        registered: capabilities.map((capability) => capability.id),
      });
      throw new NoBackendAvailableError(
        `No backend available for ${classification.category} task (${capabilities.length} registered)`,
        { classification }
      );
    }

    const preferred = this.preferred(classification, capabilities);

    if (preferred && this.registry.isAvailable(preferred.capability.id)) {
      const profile: TaskProfile = {
        ...classification,
        chosenBackend: preferred.capability.id,
        fallback: false,
        rationale: `${classification.rationale}; ${preferred.reason}`,
      };
      logger.debug('Backend selected', {
        category: profile.category,
        estimatedTokens: profile.estimatedTokens,
        backendId: profile.chosenBackend,
      });
      return profile;
    }

    const fallback = this.fallback(classification, available);
    const unavailable = preferred ? preferred.capability.id : this.registry.defaultBackendId;

    logger.warn('Preferred backend unavailable, falling back', {
      preferred: unavailable,
      fallback: fallback.id,
      category: classification.category,
    });

    return {
      ...classification,
      chosenBackend: fallback.id,
      fallback: true,
      rationale: `${classification.rationale}; preferred "${unavailable}" unavailable, fell back to "${fallback.id}" by priority`,
    };
  }

  private preferred(
    classification: TaskClassification,
    capabilities: BackendCapability[]
  ): { capability: BackendCapability; reason: string } | undefined {
    const tieBreak = strengthFirst(classification.category);
    const ordered = [...capabilities].sort(tieBreak);

    switch (classification.category) {
      case 'large-document': {
        const byCost = [...ordered].sort((a, b) => a.costTier - b.costTier || tieBreak(a, b));
        const fits = byCost.find((capability) => safeContextTokens(capability) >= classification.estimatedTokens);
        if (fits) {
          return { capability: fits, reason: `cheapest backend whose safe context holds the document` };
        }
        const largest = [...ordered].sort(
          (a, b) => b.maxContextTokens - a.maxContextTokens || tieBreak(a, b)
        )[0];
        return largest && { capability: largest, reason: 'largest context window' };
      }
      case 'reasoning': {
        const deepest = [...ordered].sort((a, b) => b.reasoningDepth - a.reasoningDepth || tieBreak(a, b))[0];
        return deepest && { capability: deepest, reason: 'deepest reasoning' };
      }
      case 'quick': {
        const fastest = [...ordered].sort(
          (a, b) => a.costTier + a.latencyTier - (b.costTier + b.latencyTier) || tieBreak(a, b)
        )[0];
        return fastest && { capability: fastest, reason: 'lowest cost and latency' };
      }
      case 'general': {
        const configured = this.registry.get(this.registry.defaultBackendId)?.capability;
        return configured && { capability: configured, reason: 'configured default' };
      }
    }
  }

  /**
   * Next available backend by priority, preferring those whose context
   * window holds the estimate
   */
  private fallback(classification: TaskClassification, available: BackendCapability[]): BackendCapability {
    const ordered = [...available].sort(byPriority);
    const holding = ordered.find((capability) => capability.maxContextTokens >= classification.estimatedTokens);
    return holding ?? ordered[0];
  }
}
