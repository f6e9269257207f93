export type EauErrorCode =
  | "INVALID_CREDENTIALS"
  | "MISSING_CREDENTIALS"
  | "FLOW_STEP_FAILED"
  | "MISSING_FIELD"
  | "UNSUPPORTED_METHOD"
  | "INVALID_ARGUMENT"
  | "REQUEST_FAILED";

/**
 * Base error for everything raised by the client. None of these are retried;
 * the caller decides whether to start a new login.
 */
export class EauApiError extends Error {
  code: EauErrorCode;
  statusCode?: number;
  url?: string;

  constructor(code: EauErrorCode, message: string, statusCode?: number, url?: string) {
    super(message);

    this.name = "EauApiError";

    this.code = code;
    this.statusCode = statusCode;
    this.url = url;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toString(): string {
    const parts: string[] = [];
    if (this.statusCode != null) parts.push(String(this.statusCode));
    if (this.message) parts.push(this.message);
    return parts.length ? parts.join(" : ") : super.toString();
  }
}

// Identity provider rejected the username/password pair.
export class InvalidCredentialsError extends EauApiError {
  constructor(message = "Invalid username or password") {
    super("INVALID_CREDENTIALS", message, 400);
    this.name = "InvalidCredentialsError";
  }
}

export class MissingCredentialsError extends EauApiError {
  constructor(message = "Username or password not provided") {
    super("MISSING_CREDENTIALS", message);
    this.name = "MissingCredentialsError";
  }
}

/** A login step answered with a status other than the one it declares. */
export class FlowStepError extends EauApiError {
  constructor(message: string, statusCode?: number, url?: string) {
    super("FLOW_STEP_FAILED", message, statusCode, url);
    this.name = "FlowStepError";
  }
}

export class MissingFieldError extends EauApiError {
  field: string;

  constructor(field: string, message = `${field} not found in the response`) {
    super("MISSING_FIELD", message);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

export class UnsupportedMethodError extends EauApiError {
  constructor(method: string) {
    super("UNSUPPORTED_METHOD", `Unsupported HTTP method: ${method}`);
    this.name = "UnsupportedMethodError";
  }
}

export class InvalidArgumentError extends EauApiError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/** Data call (account, billing, consumption, alerts) got an unexpected status. */
export class RequestError extends EauApiError {
  responseText?: string;

  constructor(message: string, statusCode?: number, url?: string, responseText?: string) {
    super("REQUEST_FAILED", message, statusCode, url);
    this.name = "RequestError";
    this.responseText = responseText;
  }
}
