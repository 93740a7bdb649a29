export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** A provider is not configured (missing credentials, ids or files). */
export class ConfigurationError extends Error {
  constructor(
    public feature: string,
    public missing: string
  ) {
    super(`${feature} is not configured: missing ${missing}`);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class ExternalServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ExternalServiceError.prototype);
  }
}

export class SMSError extends ExternalServiceError {
  constructor(
    public provider: string,
    operation: string,
    originalError: Error,
    retryable: boolean = true
  ) {
    super(`sms:${provider}`, operation, originalError, retryable);
    Object.setPrototypeOf(this, SMSError.prototype);
  }
}

export class SummaryParseError extends Error {
  constructor(public rawText: string) {
    super('Summary response is missing the "Summary:" / "Action Items:" sections');
    Object.setPrototypeOf(this, SummaryParseError.prototype);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
