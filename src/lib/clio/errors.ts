export type ClioAuthErrorCode =
  | "missing_access_token"
  | "empty_access_token"
  | "token_expired"
  | "unauthorized"
  | "forbidden";

export class ClioAuthError extends Error {
  code: ClioAuthErrorCode;
  status?: number;

  constructor(message: string, options: { code: ClioAuthErrorCode; status?: number }) {
    super(message);
    this.name = "ClioAuthError";
    this.code = options.code;
    this.status = options.status;
  }
}

export class ClioValidationError extends Error {
  readonly code = "validation_failed";
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ClioValidationError";
    this.issues = issues;
  }
}

export type ClioAPIErrorCode = "network_error" | "timeout" | "http_error" | "invalid_json" | "unexpected_response";

export class ClioAPIError extends Error {
  code: ClioAPIErrorCode;
  status?: number;
  retryable: boolean;
  responseText?: string;

  constructor(
    message: string,
    options: { code: ClioAPIErrorCode; status?: number; retryable?: boolean; responseText?: string },
  ) {
    super(message);
    this.name = "ClioAPIError";
    this.code = options.code;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
    this.responseText = options.responseText;
  }
}
