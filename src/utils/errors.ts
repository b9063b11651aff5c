export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Caller passed an empty or malformed request; never retried. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "validation_error");
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "not_found");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "conflict");
  }
}

export type ProviderErrorCode =
  | "not_configured"
  | "cancelled"
  | "timeout"
  | "network_error"
  | "http_error"
  | "quota_exceeded"
  | "malformed_response";

/**
 * Remote recipe search failed. Search falls back to the local store on this
 * error; other routes surface it as a 502.
 */
export class ProviderError extends AppError {
  readonly providerCode: ProviderErrorCode;
  readonly status?: number;

  constructor(message: string, providerCode: ProviderErrorCode, options: { status?: number; cause?: unknown } = {}) {
    super(message, providerStatusCode(providerCode), `provider_${providerCode}`, { cause: options.cause });
    this.providerCode = providerCode;
    this.status = options.status;
  }
}

function providerStatusCode(code: ProviderErrorCode): number {
  switch (code) {
    case "timeout":
      return 504;
    case "not_configured":
    case "quota_exceeded":
      return 503;
    default:
      return 502;
  }
}

export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, "store_error", { cause });
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    typeof error.name === "string" &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
