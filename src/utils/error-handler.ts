import { ErrorType, type ErrorContext } from "../types/error-handler.js";
import type { BackendKind } from "../types/common.js";

export class GenerationError extends Error {
  readonly type: ErrorType;
  readonly context: ErrorContext;
  readonly recoverable: boolean;

  constructor(
    message: string,
    type: ErrorType,
    context: ErrorContext = {},
    recoverable = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationError";
    this.type = type;
    this.context = context;
    this.recoverable = recoverable;
  }
}

/** Backend could not be reached. Only the daemon kind retries on this. */
export class BackendUnavailableError extends GenerationError {
  constructor(
    backend: BackendKind,
    message: string,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(
      message,
      ErrorType.BACKEND_UNAVAILABLE,
      { backend },
      options?.retryable ?? true,
      options
    );
    this.name = "BackendUnavailableError";
  }
}

export class AuthFailedError extends GenerationError {
  constructor(backend: BackendKind, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, ErrorType.AUTH_FAILED, { backend, status: options?.status }, false, options);
    this.name = "AuthFailedError";
  }
}

export class EmptyResponseError extends GenerationError {
  constructor(backend: BackendKind, message = "Backend returned an empty response") {
    super(message, ErrorType.EMPTY_RESPONSE, { backend }, false);
    this.name = "EmptyResponseError";
  }
}

export class ProtocolError extends GenerationError {
  constructor(backend: BackendKind, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, ErrorType.PROTOCOL_ERROR, { backend, status: options?.status }, false, options);
    this.name = "ProtocolError";
  }
}

export interface BackendFailure {
  backend: BackendKind;
  attempt: number;
  error: Error;
}

export class AllBackendsExhaustedError extends GenerationError {
  readonly attempts: readonly BackendFailure[];

  constructor(attempts: readonly BackendFailure[]) {
    super(
      AllBackendsExhaustedError.describe(attempts),
      ErrorType.ALL_BACKENDS_EXHAUSTED,
      { operation: "route", backend: attempts.at(-1)?.backend },
      false,
      { cause: attempts.at(-1)?.error }
    );
    this.name = "AllBackendsExhaustedError";
    this.attempts = attempts;
  }

  get backendsTried(): BackendKind[] {
    return [...new Set(this.attempts.map(a => a.backend))];
  }

  /** Type of the last underlying failure; drives the remediation shown to the user. */
  get lastCauseType(): ErrorType | undefined {
    const last = this.attempts.at(-1)?.error;
    return last instanceof GenerationError ? last.type : undefined;
  }

  // One line per backend, keeping only the last failure of each.
  private static describe(attempts: readonly BackendFailure[]): string {
    const lastByBackend = new Map<BackendKind, BackendFailure>();
    for (const failure of attempts) {
      lastByBackend.set(failure.backend, failure);
    }
    const causes = [...lastByBackend.values()].map(
      f => `${f.backend} (attempt ${f.attempt}): ${f.error.message}`
    );
    return `All backends failed. ${causes.join("; ")}`;
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const withErrorHandling = async <T>(
  operation: () => Promise<T>,
  context: ErrorContext = {},
  fallbackType: ErrorType = ErrorType.VALIDATION_ERROR
): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof GenerationError) {
      throw error;
    }
    const err = toError(error);
    throw new GenerationError(err.message, fallbackType, context, false, { cause: err });
  }
};

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export interface RetryHooks {
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, maxAttempts: number, error: Error) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs `operation` up to `maxAttempts` times with a fixed delay between
 * attempts. Rethrows the last error, or the first one `shouldRetry` rejects.
 * `onRetry` sees every failure, including the final one.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  maxAttempts: number,
  delayMs: number,
  context: ErrorContext = {},
  hooks: RetryHooks = {}
): Promise<T> => {
  const wait = hooks.sleep ?? sleep;
  const shouldRetry =
    hooks.shouldRetry ?? ((error: Error) => !(error instanceof GenerationError) || error.recoverable);
  let lastError: Error = new GenerationError(
    "Retry loop ran zero attempts",
    ErrorType.VALIDATION_ERROR,
    context
  );

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = toError(error);
      hooks.onRetry?.(attempt, maxAttempts, lastError);
      if (attempt >= maxAttempts || !shouldRetry(lastError)) {
        break;
      }
      await wait(delayMs);
    }
  }

  throw lastError;
};
