/**
 * Error hierarchy
 *
 * Backend errors are attributed to the backend that raised them; routing
 * raises only NoBackendAvailableError.
 */

export class BackendError extends Error {
  code = 'BACKEND_ERROR';
  constructor(
    message: string,
    public readonly backendId: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

export class AuthenticationError extends BackendError {
  code = 'AUTHENTICATION_ERROR';
  constructor(message: string, backendId: string, details?: unknown) {
    super(message, backendId, details);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends BackendError {
  code = 'RATE_LIMIT_ERROR';
  constructor(
    message: string,
    backendId: string,
    public readonly retryAfterSeconds?: number,
    details?: unknown
  ) {
    super(message, backendId, details);
    this.name = 'RateLimitError';
  }
}

export class ProviderError extends BackendError {
  code = 'PROVIDER_ERROR';
  constructor(message: string, backendId: string, details?: unknown) {
    super(message, backendId, details);
    this.name = 'ProviderError';
  }
}

export class NoBackendAvailableError extends Error {
  code = 'NO_BACKEND_AVAILABLE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NoBackendAvailableError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class PipelineConfigurationError extends Error {
  code = 'PIPELINE_CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'PipelineConfigurationError';
  }
}

export class StageTimeoutError extends Error {
  code = 'STAGE_TIMEOUT';
  constructor(stageName: string, public readonly timeoutMs: number) {
    super(`Stage "${stageName}" timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

/**
 * Render any thrown value as a one-line detail for execution records
 */
export function toErrorDetail(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Numeric HTTP status carried by SDK errors (Anthropic, OpenAI, Gemini fetch errors)
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Retry-After header (seconds) carried by a 429 response, when present
 */
export function retryAfterSeconds(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) {
    return undefined;
  }

  const headers = error.headers;
  let raw: unknown;
  if (headers instanceof Headers) {
    raw = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null && 'retry-after' in headers) {
    raw = headers['retry-after'];
  }

  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }

  const seconds = typeof raw === 'number' ? raw : parseInt(raw, 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}

/**
 * Map a provider SDK failure onto the backend error classes
 */
export function toBackendError(backendId: string, error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }

  const status = errorStatus(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, backendId, error);
  }
  if (status === 429) {
    return new RateLimitError(message, backendId, retryAfterSeconds(error), error);
  }
  return new ProviderError(message, backendId, error);
}
