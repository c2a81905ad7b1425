/**
 * Typed error model for the GitLab client.
 *
 * Every error thrown by this package is a GitlabError subclass. Each one
 * carries the HTTP status and raw body when a response was involved, plus a
 * machine-readable TypedError that callers can inspect without matching on
 * message strings.
 */

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The machine-readable payload attached to every GitlabError. */
export interface TypedError {
  /** Namespaced error code (e.g., "OPERATION.GET"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same request is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** 429 and 5xx are worth repeating; everything else needs a change first. */
export function isRetryableStatus(statusCode: number | undefined): boolean {
  if (statusCode === undefined) return false;
  return statusCode === 429 || statusCode >= 500;
}

function suggestedFixesForStatus(statusCode: number | undefined): SuggestedFix[] {
  if (statusCode === undefined) return [];
  if (statusCode === 401 || statusCode === 403) {
    return [{ type: 'CHECK_TOKEN', params: { statusCode }, description: 'Verify the token is valid and has the read_api or api scope.' }];
  }
  if (statusCode === 404) {
    return [{ type: 'FIX_RESOURCE_NOT_FOUND', params: { statusCode }, description: 'Verify the project, ref, job name and artifact path.' }];
  }
  if (statusCode === 429) {
    return [{ type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } }];
  }
  if (statusCode >= 500) {
    return [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Transient server error. Retry after backoff.' }];
  }
  return [];
}

// ─── Error classes ──────────────────────────────────────────────────────────

/** Base class for every error raised by the client. */
export class GitlabError extends Error {
  public readonly typedError: TypedError;
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message);
    this.name = 'GitlabError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    this.typedError = createTypedError({
      code: this.errorCode(),
      message,
      retryable: isRetryableStatus(statusCode),
      details: statusCode === undefined ? undefined : { statusCode },
      suggestedFixes: suggestedFixesForStatus(statusCode),
    });
  }

  protected errorCode(): string {
    return 'CLIENT.ERROR';
  }
}

/** Signature shared by every error class, so they can be passed around as values. */
export type GitlabErrorClass = new (message: string, statusCode?: number, responseBody?: string) => GitlabError;

/** A request path could not be built from the parent resource. */
export class GitlabAttributeError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabAttributeError';
  }

  protected errorCode(): string {
    return 'CLIENT.MISSING_ATTRIBUTE';
  }
}

/** Raised when a ClientConfig fails validation. */
export class GitlabConfigError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabConfigError';
  }

  protected errorCode(): string {
    return 'CLIENT.CONFIG';
  }
}

/** Network failure, timeout or an interrupted response body. */
export class GitlabConnectionError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabConnectionError';
  }

  protected errorCode(): string {
    return 'HTTP.CONNECTION';
  }
}

/** The server rejected the credentials (401) or their scope (403). */
export class GitlabAuthenticationError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabAuthenticationError';
  }

  protected errorCode(): string {
    return 'AUTH.UNAUTHORIZED';
  }
}

/** Any other non-2xx response. */
export class GitlabHttpError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabHttpError';
  }

  protected errorCode(): string {
    return 'HTTP.STATUS';
  }
}

/** A JSON object was expected and something else came back. */
export class GitlabParsingError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabParsingError';
  }

  protected errorCode(): string {
    return 'HTTP.PARSE';
  }
}

/** Base for errors scoped to one resource operation. */
export class GitlabOperationError extends GitlabError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabOperationError';
  }

  protected errorCode(): string {
    return 'OPERATION.FAILED';
  }
}

export class GitlabGetError extends GitlabOperationError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabGetError';
  }

  protected errorCode(): string {
    return 'OPERATION.GET';
  }
}

export class GitlabDeleteError extends GitlabOperationError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, statusCode, responseBody);
    this.name = 'GitlabDeleteError';
  }

  protected errorCode(): string {
    return 'OPERATION.DELETE';
  }
}

/**
 * Run `fn`, converting a GitlabHttpError it raises into `errorClass`.
 *
 * Status code and body are carried over. Authentication, connection and
 * caller errors pass through untouched.
 */
export async function withHttpError<T>(errorClass: GitlabErrorClass, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof GitlabHttpError) {
      throw new errorClass(err.message, err.statusCode, err.responseBody);
    }
    throw err;
  }
}

// ─── Secret masking ─────────────────────────────────────────────────────────

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of each secret in `message` with its masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join: secrets may contain regex metacharacters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
