/**
 * Base error for everything the library raises on purpose.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    isOperational = true
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A pipeline stage was invoked out of order (parse before download,
 * nlp before parse). Always a programmer error.
 */
export class ArticleException extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'ARTICLE_LIFECYCLE', { url }, false);
    this.url = url;
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Rejected configuration overrides: bad type, bad value or unknown key.
 */
export class ConfigurationError extends AppError {
  public readonly issues: readonly ConfigurationIssue[];

  constructor(message: string, issues: readonly ConfigurationIssue[] = []) {
    super(message, 'INVALID_CONFIGURATION', { issues }, false);
    this.issues = issues;
  }
}

export class UrlValidationError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 'INVALID_URL', { url });
    this.url = url;
  }
}

/**
 * Network or HTTP failure while fetching a URL.
 */
export class FetchError extends AppError {
  public readonly url: string;
  public readonly httpStatus: number | undefined;

  constructor(
    message: string,
    url: string,
    httpStatus?: number,
    details: Record<string, unknown> = {}
  ) {
    super(message, 'FETCH_ERROR', { ...details, httpStatus });
    this.url = url;
    this.httpStatus = httpStatus;
  }
}
