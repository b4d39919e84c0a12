/**
 * Routing types shared by the classifier, the registry and the router
 */

export type TaskCategory = 'large-document' | 'reasoning' | 'quick' | 'general';

export const TASK_CATEGORIES: readonly TaskCategory[] = ['large-document', 'reasoning', 'quick', 'general'];

export type Script = 'cyrillic' | 'latin';

export interface TaskClassification {
  estimatedTokens: number;
  category: TaskCategory;
  script: Script;
  rationale: string;
}

/**
 * Classification plus the backend chosen for it
 */
export interface TaskProfile extends TaskClassification {
  chosenBackend: string;
  /** True when the preferred backend was unavailable */
  fallback: boolean;
}

export type Provider = 'anthropic' | 'openai' | 'gemini';

/**
 * Capability profile of one backend
 *
 * Tiers are relative: lower cost/latency is cheaper/faster, higher
 * reasoningDepth is deeper. `priority` orders fallback (ascending).
 */
export interface BackendCapability {
  id: string;
  provider: Provider;
  model: string;
  maxContextTokens: number;
  /** Share of the context window considered safe to fill */
  safeContextRatio: number;
  costTier: number;
  latencyTier: number;
  reasoningDepth: number;
  strengths: TaskCategory[];
  priority: number;
}

export function safeContextTokens(capability: BackendCapability): number {
  return Math.floor(capability.maxContextTokens * capability.safeContextRatio);
}
