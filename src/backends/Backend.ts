/**
 * Invocation options common to every backend
 */
export interface InvocationOptions {
  temperature?: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

/**
 * A language-model service performing one unit of analysis or generation
 *
 * Failures surface as AuthenticationError, RateLimitError or ProviderError.
 */
export interface LanguageModelBackend {
  readonly id: string;
  invoke(prompt: string, systemInstruction: string | undefined, options?: InvocationOptions): Promise<string>;
}
