export class ImageComponentError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ImageComponentError';
    this.code = code;
    this.context = context;
  }
}

export interface FailedAttempt {
  source: string;
  reason: string;
}

/**
 * The primary source could not be loaded and no fallback was available.
 */
export class SourceLoadFailure extends ImageComponentError {
  public readonly attempt: FailedAttempt;

  constructor(attempt: FailedAttempt, context?: Record<string, unknown>) {
    super(
      `Failed to load image "${attempt.source}" (${attempt.reason}) and no fallback provided.`,
      'SOURCE_LOAD_FAILURE',
      context
    );
    this.name = 'SourceLoadFailure';
    this.attempt = attempt;
  }
}

/**
 * Both the primary and the fallback source failed.
 */
export class FallbackLoadFailure extends ImageComponentError {
  public readonly primary: FailedAttempt;
  public readonly fallback: FailedAttempt;

  constructor(primary: FailedAttempt, fallback: FailedAttempt, context?: Record<string, unknown>) {
    super(
      `Failed to load image "${primary.source}" (${primary.reason}); ` +
        `fallback "${fallback.source}" also failed (${fallback.reason}).`,
      'FALLBACK_LOAD_FAILURE',
      context
    );
    this.name = 'FallbackLoadFailure';
    this.primary = primary;
    this.fallback = fallback;
  }

  get attempts(): FailedAttempt[] {
    return [this.primary, this.fallback];
  }
}

export class DuplicateRegistrationError extends ImageComponentError {
  constructor(handleId: string, context?: Record<string, unknown>) {
    super(
      `Element is already registered under handle ${handleId}; call teardown before initializing again`,
      'DUPLICATE_REGISTRATION',
      { ...context, handleId }
    );
    this.name = 'DuplicateRegistrationError';
  }
}

export interface RequestIssue {
  path: string;
  message: string;
}

export class InvalidRequestError extends ImageComponentError {
  public readonly issues: RequestIssue[];

  constructor(issues: RequestIssue[], context?: Record<string, unknown>) {
    super(
      `Invalid image request: ${issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`,
      'INVALID_REQUEST',
      context
    );
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
