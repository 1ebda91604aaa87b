export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// Checksum mismatch or unregistered artifact version. Never downgraded to a warning.
export class SecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SecurityError";
  }
}

export class RetryableSignerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetryableSignerError";
  }
}

export class SignerResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SignerResponseError";
  }
}

export class OnChainError extends Error {
  constructor(
    message: string,
    public readonly txHash?: string,
    public readonly blockNumber?: number
  ) {
    super(message);
    this.name = "OnChainError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`invalid status transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Prefixes an error with the operation that produced it, keeping its class so callers
 * can still tell a security failure from a transient one.
 */
export function wrapError(operation: string, error: unknown): Error {
  const message = `${operation}: ${errorMessage(error)}`;
  if (error instanceof ConfigurationError) {
    return new ConfigurationError(message, error.field);
  }
  if (error instanceof SecurityError) {
    return new SecurityError(message);
  }
  if (error instanceof OnChainError) {
    return new OnChainError(message, error.txHash, error.blockNumber);
  }
  if (error instanceof SignerResponseError) {
    return new SignerResponseError(message);
  }
  if (isAbortError(error)) {
    return abortError(message);
  }
  return new Error(message);
}

export function abortError(message: string = "operation aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}
