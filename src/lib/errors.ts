/**
 * Error taxonomy
 *
 * Only RetriesExhaustedError, UnsupportedTypeError, UnsupportedClientError and
 * InputContractError leave the Reckoner. The rest are attempt failures that the
 * retry controller consumes.
 */

export class ReckonError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedTypeError extends ReckonError {
  readonly typeText: string;

  constructor(typeText: string, reason: string, options?: { cause?: unknown }) {
    super(`Unsupported type "${typeText}": ${reason}`, options);
    this.typeText = typeText;
  }
}

export class UnsupportedClientError extends ReckonError {
  readonly supported: string[];

  constructor(supported: string[]) {
    super(`Client is not recognized by any provider (supported: ${supported.join(", ") || "none"})`);
    this.supported = supported;
  }
}

export class InputContractError extends ReckonError {}

export class ProviderError extends ReckonError {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, options?: { cause?: unknown; status?: number }) {
    super(`${provider}: ${message}`, options);
    this.provider = provider;
    this.status = options?.status;
  }
}

export class ProviderTimeoutError extends ProviderError {}

export class ParseError extends ReckonError {
  readonly rawText: string;

  constructor(rawText: string, message: string) {
    super(`${message}. Content: ${rawText.substring(0, 200)}`);
    this.rawText = rawText;
  }
}

export class TypeMismatchError extends ReckonError {
  readonly value: unknown;
  readonly path: string;

  constructor(path: string, expected: string, value: unknown, detail?: string) {
    super(`${path}: expected ${expected}${detail ? ` (${detail})` : ""}`);
    this.value = value;
    this.path = path;
  }
}

export class RetriesExhaustedError extends ReckonError {
  readonly attempts: number;

  constructor(label: string, attempts: number, lastError: AttemptError) {
    super(`Gave up on "${label}" after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.attempts = attempts;
  }
}

/**
 * Failures that count against the retry budget
 */
export type AttemptError = ProviderError | ParseError | TypeMismatchError;

export function isAttemptError(error: unknown): error is AttemptError {
  return error instanceof ProviderError || error instanceof ParseError || error instanceof TypeMismatchError;
}
