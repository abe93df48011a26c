// src/errors.ts

/**
 * Base class for every failure the service reports to callers.
 * `code` is the stable machine-readable identifier sent in error bodies,
 * `status` the HTTP status the route layer answers with.
 */
export class FableRagError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    // keeps instanceof working on the compiled CommonJS output
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Invalid environment or provider table. Fatal at startup. */
export class ConfigError extends FableRagError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'config_error', 500);
    this.issues = issues;
  }
}

export class ValidationError extends FableRagError {
  constructor(message: string) {
    super(message, 'validation_error', 400);
  }
}

export class EncodingError extends FableRagError {
  constructor(message: string, options?: { cause?: unknown; unreachable?: boolean }) {
    super(message, 'encoding_error', options?.unreachable ? 503 : 400, options);
  }
}

// ---------- vector index ----------

export class SchemaMismatchError extends FableRagError {
  constructor(message: string) {
    super(message, 'schema_mismatch', 500);
  }
}

export class CollectionMissingError extends FableRagError {
  constructor(collection: string, options?: { cause?: unknown }) {
    super(`Collection '${collection}' does not exist; run the index initializer first`, 'collection_missing', 503, options);
  }
}

export class ConnectionError extends FableRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'index_unreachable', 503, options);
  }
}

export class FableNotFoundError extends FableRagError {
  constructor(id: number) {
    super(`Fable with ID ${id} not found`, 'fable_not_found', 404);
  }
}

// ---------- generation ----------

export class UnknownProviderError extends FableRagError {
  readonly available: string[];

  constructor(name: string, available: string[]) {
    super(`Provider '${name}' not available. Available: ${available.join(', ')}`, 'unknown_provider', 400);
    this.available = available;
  }
}

export class UnknownModelError extends FableRagError {
  constructor(provider: string, model: string, available: string[]) {
    super(`Model '${model}' not available for ${provider}. Available: ${available.join(', ')}`, 'unknown_model', 400);
  }
}

export class ProviderTimeout extends FableRagError {
  readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(`${provider} did not answer within ${timeoutMs}ms`, 'provider_timeout', 504);
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderUnavailable extends FableRagError {
  constructor(provider: string, detail: string, options?: { cause?: unknown }) {
    super(`${provider} unavailable: ${detail}`, 'provider_unavailable', 502, options);
  }
}

export class ProviderOutputError extends FableRagError {
  constructor(provider: string, detail: string) {
    super(`${provider} returned unusable output: ${detail}`, 'provider_output_error', 502);
  }
}

export class GenerationCancelled extends FableRagError {
  constructor(message = 'Generation request was cancelled') {
    // 499: client closed request
    super(message, 'request_cancelled', 499);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
