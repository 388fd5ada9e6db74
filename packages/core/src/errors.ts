/**
 * Deterministic error codes for failures that leave the tick loop.
 * Recoverable conditions (a malformed record line, an out-of-range threshold
 * request, a draw outside the surface) never surface as errors.
 */
export type PsiStatErrorCode =
  | "PSI_SOURCE_UNAVAILABLE"
  | "PSI_SOURCE_READ_FAILED"
  | "PSI_INVALID_CONFIG"
  | "PSI_USAGE";

export class PsiStatError extends Error {
  override readonly name = "PsiStatError";
  readonly code: PsiStatErrorCode;

  constructor(code: PsiStatErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PsiStatError);
    }
  }
}

export function isPsiStatError(error: unknown, code?: PsiStatErrorCode): error is PsiStatError {
  if (!(error instanceof PsiStatError)) return false;
  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
