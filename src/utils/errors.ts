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

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message, true);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export type ProviderErrorKind = 'transport' | 'timeout' | 'invalid_response';

export class ProviderError extends ServiceError {
  constructor(
    public provider: string,
    operation: string,
    originalError: Error,
    public kind: ProviderErrorKind,
    public attempts: number,
    retryable: boolean = kind !== 'invalid_response'
  ) {
    super(provider, operation, originalError, retryable);
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

export class ProviderTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, ProviderTimeoutError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
