/**
 * Base class for every error raised by the exporter
 */
export class RunalyzeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input (date window, credentials, log level). Raised before any I/O. */
export class ValidationError extends RunalyzeError {}

export class TokenNotFoundError extends RunalyzeError {
  constructor() {
    super("csrf token not found in login page");
  }
}

export class LoginFailedError extends RunalyzeError {
  readonly status: number;

  constructor(status: number) {
    super(`login was not accepted (status ${status})`);
    this.status = status;
  }
}

/**
 * The session cookie is missing or expired and the site sent us back to /login.
 * Not terminal: the auth service reacts by logging in once.
 */
export class RedirectedToLoginError extends RunalyzeError {
  constructor() {
    super("redirected to login page");
  }
}

export class UnexpectedStatusError extends RunalyzeError {
  readonly status: number;

  constructor(status: number, url?: string) {
    super(`unexpected status code: ${status}${url ? ` (${url})` : ""}`);
    this.status = status;
  }
}

/** 404 on an export endpoint: the format does not exist for this activity */
export class NotFoundError extends RunalyzeError {
  constructor(url: string) {
    super(`not found: ${url}`);
  }
}

export class FilenameMissingError extends RunalyzeError {
  constructor(header?: string) {
    super(
      header
        ? `filename not found in content-disposition header: ${header}`
        : "content-disposition header not found"
    );
  }
}

export class ParseError extends RunalyzeError {}

export class NoExportAvailableError extends RunalyzeError {
  constructor(activityId: string) {
    super(`neither FIT nor TCX available for activity ${activityId}`);
  }
}

/**
 * A failure that has already been shown to the user. Carries the original
 * error as `cause` and repeats its message.
 */
export class ReportedError extends RunalyzeError {
  constructor(cause: unknown) {
    super(errorMessage(cause), { cause });
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
