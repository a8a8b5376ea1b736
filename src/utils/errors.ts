export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
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

/**
 * Non-2xx answer from an upstream HTTP API (CRM, completion provider).
 * `body` is the raw response text, kept so the caller can show a truncated diagnostic.
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    public body: string = '',
    public service: string = 'http'
  ) {
    super(`${service} returned HTTP ${status}`);
    Object.setPrototypeOf(this, HttpError.prototype);
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class TransportError extends AppError {
  constructor(
    public provider: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(502, `Transport error: ${provider}.${operation}`, true);
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
