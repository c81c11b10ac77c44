/**
 * Error types shared by the import pipeline and the delivery layer
 */

export type EnrollErrorCode =
  | 'PARSE_ERROR'
  | 'EXPORT_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CONFIG_MISSING'
  | 'AUTHENTICATION_FAILED'
  | 'VALIDATION_ERROR'
  | 'INVALID_SHARE_PATH'
  | 'UNKNOWN';

export interface EnrollErrorDetails {
  /** Error code for programmatic handling */
  code: EnrollErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context (file path, asset number, ...) */
  context?: Record<string, unknown>;
}

export class EnrollError extends Error {
  readonly code: EnrollErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: EnrollErrorDetails) {
    super(details.message);
    this.name = 'EnrollError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, EnrollError);
  }

  /**
   * Format the error for a status line or the command line
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as EnrollError
 */
export function wrapError(
  error: unknown,
  defaultCode: EnrollErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): EnrollError {
  if (error instanceof EnrollError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new EnrollError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
