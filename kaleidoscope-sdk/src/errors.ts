/**
 * Kaleidoscope SDK Error Types
 *
 * The transport never lets these escape to callers: they classify a failure
 * so it can be logged, and the call then resolves to null.
 */

import axios from 'axios';

export interface ApiErrorDetails {
  code?: string;
  message?: string;
  detail?: string;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all Kaleidoscope SDK errors
 */
export class KaleidoscopeError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'KaleidoscopeError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, KaleidoscopeError.prototype);
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends KaleidoscopeError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends KaleidoscopeError {
  constructor(message = 'Authentication failed', statusCode = 401) {
    super(message, 'UNAUTHORIZED', statusCode);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when authorization fails
 */
export class AuthorizationError extends KaleidoscopeError {
  constructor(message = 'Permission denied') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error raised for rejected requests and for payloads that do not match
 * their schema
 */
export class ValidationError extends KaleidoscopeError {
  public readonly validationErrors: string[];

  constructor(message: string, errors: string[] = [], statusCode?: number) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.name = 'ValidationError';
    this.validationErrors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when there's a conflict
 */
export class ConflictError extends KaleidoscopeError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * Error thrown when rate limited
 */
export class RateLimitError extends KaleidoscopeError {
  public readonly retryAfter?: number;

  constructor(message = 'Rate limit exceeded', retryAfter?: number) {
    super(message, 'RATE_LIMITED', 429);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Error for requests that never produced a response
 */
export class NetworkError extends KaleidoscopeError {
  constructor(message = 'Network error') {
    super(message, 'NETWORK_ERROR');
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Error for requests that ran past the client timeout
 */
export class TimeoutError extends KaleidoscopeError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error for a download whose Content-Type is not an accepted file format
 */
export class ContentTypeError extends KaleidoscopeError {
  public readonly contentType: string;

  constructor(contentType: string) {
    super(
      `Invalid Content-Type: ${contentType || '(none)'}. Response does not contain valid file data.`,
      'INVALID_CONTENT_TYPE'
    );
    this.name = 'ContentTypeError';
    this.contentType = contentType;
    Object.setPrototypeOf(this, ContentTypeError.prototype);
  }
}

/**
 * Error for missing or malformed client configuration
 */
export class ConfigurationError extends KaleidoscopeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorBody(body: unknown): ApiErrorDetails {
  if (typeof body === 'string') {
    try {
      return readErrorBody(JSON.parse(body));
    } catch {
      return body.length > 0 ? { message: body } : {};
    }
  }
  if (!isRecord(body)) return {};

  const fields = body;
  const pick = (key: string): string | undefined => {
    const value = fields[key];
    return typeof value === 'string' ? value : undefined;
  };

  return {
    code: pick('code'),
    message: pick('message'),
    detail: pick('detail'),
    details: isRecord(body.details) ? body.details : undefined,
  };
}

/**
 * Convert API error response to appropriate error class
 */
export function parseApiError(statusCode: number, body: unknown): KaleidoscopeError {
  const error = readErrorBody(body);
  const message = error.message ?? error.detail ?? `HTTP Error ${statusCode}`;
  const details = error.details;

  switch (statusCode) {
    case 400: {
      const listed: unknown = details?.errors;
      const errors = Array.isArray(listed)
        ? listed.filter((e): e is string => typeof e === 'string')
        : [];
      return new ValidationError(message, errors, 400);
    }
    case 401:
      return new AuthenticationError(message);
    case 403:
      return new AuthorizationError(message);
    case 404:
      return new NotFoundError(message);
    case 409:
      return new ConflictError(message);
    case 429:
      return new RateLimitError(message);
    default:
      return new KaleidoscopeError(message, error.code ?? 'UNKNOWN', statusCode, details);
  }
}

/**
 * Classify anything thrown by an axios call
 */
export function toKaleidoscopeError(error: unknown, timeoutMs: number): KaleidoscopeError {
  if (error instanceof KaleidoscopeError) return error;
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return parseApiError(error.response.status, error.response.data);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TimeoutError(timeoutMs);
    }
    return new NetworkError(error.message);
  }
  return new NetworkError(error instanceof Error ? error.message : String(error));
}
