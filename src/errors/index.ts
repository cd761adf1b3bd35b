/**
 * Application error hierarchy
 *
 * Every error carries a message safe to log and an optional details record.
 * User-facing text is chosen by the dispatcher and routes, not taken from here.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all application errors
 */
export class AppError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * Malformed or unknown input
 */
export class ValidationError extends AppError {}

export class PersonaNotFoundError extends ValidationError {
  readonly personaId: string;
  readonly validIds: string[];

  constructor(personaId: string, validIds: string[]) {
    super(`Persona '${personaId}' not found`, { personaId, validIds });
    this.personaId = personaId;
    this.validIds = validIds;
  }
}

export type FetchFailureReason =
  | 'InvalidUrl'
  | 'NotFound'
  | 'Forbidden'
  | 'Timeout'
  | 'UnsupportedContent'
  | 'TooLarge'
  | 'HttpError'
  | 'NetworkError';

/**
 * Article could not be fetched or extracted
 */
export class UpstreamFetchError extends AppError {
  readonly reason: FetchFailureReason;

  constructor(reason: FetchFailureReason, message: string, details: ErrorDetails = {}) {
    super(message, { ...details, reason });
    this.reason = reason;
  }
}

export type LLMFailureReason = 'AuthError' | 'RateLimited' | 'Timeout' | 'ProviderError';

/**
 * Completion provider failed; the message never contains provider bodies or keys
 */
export class UpstreamLLMError extends AppError {
  readonly reason: LLMFailureReason;

  constructor(reason: LLMFailureReason, message: string, details: ErrorDetails = {}) {
    super(message, { ...details, reason });
    this.reason = reason;
  }
}

/**
 * Conversation store invariant violation (programming fault)
 */
export class InternalStateError extends AppError {}

export class ConfigurationError extends AppError {}

/**
 * Raised when a request exceeds its time budget
 */
export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when a response body grows past its byte cap
 */
export class ResponseTooLargeError extends Error {
  readonly maxBytes: number;

  constructor(maxBytes: number) {
    super(`Response body exceeds ${maxBytes} bytes`);
    this.name = 'ResponseTooLargeError';
    this.maxBytes = maxBytes;
  }
}
