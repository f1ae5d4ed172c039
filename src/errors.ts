/**
 * Quote Error Types
 *
 * Standardized error codes for the cache, the resolvers and the providers.
 * Every failure raised by this library is a QuoteError; callers branch on `code`
 * instead of on the message text.
 */

export enum QuoteErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_OPERATION = 'INVALID_OPERATION',
  NOT_FOUND = 'NOT_FOUND',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
}

export class QuoteError extends Error {
  constructor(
    public code: QuoteErrorCode,
    message: string,
    public suggestion?: string,
    public context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'QuoteError';
  }
}

/**
 * Type guard for a QuoteError, optionally with a specific code
 */
export function isQuoteError(error: unknown, code?: QuoteErrorCode): error is QuoteError {
  return error instanceof QuoteError && (code === undefined || error.code === code);
}

// ============================================================================
// Factories
// ============================================================================

export function invalidArgument(name: string, reason: string): QuoteError {
  return new QuoteError(QuoteErrorCode.INVALID_ARGUMENT, `${name} ${reason}`, undefined, { argument: name });
}

export function nullOrEmpty(name: string): QuoteError {
  return invalidArgument(name, 'cannot be null or empty');
}

export function nullArgument(name: string): QuoteError {
  return invalidArgument(name, 'cannot be null');
}

export function invalidOperation(message: string, suggestion?: string): QuoteError {
  return new QuoteError(QuoteErrorCode.INVALID_OPERATION, message, suggestion);
}

export function notFound(message: string, context?: Record<string, unknown>): QuoteError {
  return new QuoteError(QuoteErrorCode.NOT_FOUND, message, undefined, context);
}

/**
 * True for a string that carries at least one non-whitespace character
 */
export function isNonBlank(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Format a QuoteError into a single human-readable line
 */
export function formatQuoteError(error: QuoteError): string {
  let text = `[${error.code}] ${error.message}`;
  if (error.suggestion) text += ` → ${error.suggestion}`;
  return text;
}
