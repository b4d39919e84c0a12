import type { InvocationOptions, LanguageModelBackend } from '../backends/Backend.js';
import type { ClassificationConfig } from '../config/classification.js';
import { BackendRegistry } from '../routing/BackendRegistry.js';
import type { BackendCapability } from '../routing/types.js';

export interface RecordedCall {
  prompt: string;
  systemInstruction: string | undefined;
  options: InvocationOptions | undefined;
}

type Responder = (prompt: string, call: number) => string | Promise<string>;

/**
 * In-process backend that answers from a responder function
 */
export class FakeBackend implements LanguageModelBackend {
  readonly calls: RecordedCall[] = [];

  constructor(
    public readonly id: string,
    private readonly responder: Responder = (prompt) => `ok:${prompt.length}`
  ) {}

  async invoke(prompt: string, systemInstruction: string | undefined, options?: InvocationOptions): Promise<string> {
    this.calls.push({ prompt, systemInstruction, options });
    return this.responder(prompt, this.calls.length);
  }
}

export function capability(id: string, overrides: Partial<BackendCapability> = {}): BackendCapability {
  return {
    id,
    provider: 'openai',
    model: `${id}-model`,
    maxContextTokens: 100000,
    safeContextRatio: 0.8,
    costTier: 2,
    latencyTier: 2,
    reasoningDepth: 2,
    strengths: [],
    priority: 1,
    ...overrides,
  };
}

/**
 * Three backends shaped like the bundled table:
 * - "fast": cheap, quick, shallow, small context
 * - "deep": mid cost, deepest reasoning
 * - "wide": largest context, most expensive
 */
export function standardCapabilities(): BackendCapability[] {
  return [
    capability('fast', {
      costTier: 1,
      latencyTier: 1,
      reasoningDepth: 1,
      maxContextTokens: 100000,
      priority: 2,
    }),
    capability('deep', {
      provider: 'anthropic',
      costTier: 2,
      latencyTier: 2,
      reasoningDepth: 3,
      maxContextTokens: 200000,
      priority: 1,
    }),
    capability('wide', {
      provider: 'gemini',
      costTier: 3,
      latencyTier: 3,
      reasoningDepth: 2,
      maxContextTokens: 1000000,
      priority: 3,
    }),
  ];
}

/**
 * Registry of FakeBackends; every backend available unless listed in `unavailable`
 */
export function fakeRegistry(
  capabilities: BackendCapability[] = standardCapabilities(),
  options: { defaultBackendId?: string; unavailable?: string[]; responder?: Responder } = {}
): { registry: BackendRegistry; backends: Map<string, FakeBackend> } {
  const registry = new BackendRegistry(options.defaultBackendId ?? capabilities[0].id);
  const backends = new Map<string, FakeBackend>();
  const unavailable = new Set(options.unavailable ?? []);

  for (const cap of capabilities) {
    const backend = new FakeBackend(cap.id, options.responder);
    backends.set(cap.id, backend);
    registry.register(cap, backend, !unavailable.has(cap.id));
  }

  return { registry, backends };
}

export const testClassificationConfig: ClassificationConfig = {
  cyrillicShare: 0.3,
  cyrillicCharsPerToken: 2,
  latinCharsPerToken: 4,
  largeDocumentTokens: 1000,
  quickMaxTokens: 50,
  reasoningKeywords: ['analyze', 'проанализируй', 'why'],
  quickPatterns: ['what is', 'что такое'],
};

/**
 * Numbered articles "Статья 1." ... "Статья n." on separate lines
 */
export function articlesDocument(count: number): string {
  return Array.from({ length: count }, (_, i) => `Статья ${i + 1}. Положение ${i + 1}\nТекст статьи ${i + 1}.`).join('\n');
}
