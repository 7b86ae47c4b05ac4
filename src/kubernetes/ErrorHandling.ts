/**
 * Kubernetes Client Error Handling Module
 *
 * Typed errors for Kubernetes operations and the conversion of raw API failures into them.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all Kubernetes-related errors
 */
export class KubernetesError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: ErrorDetails;
  public readonly retryable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    retryable: boolean = false,
    details?: ErrorDetails,
  ) {
    super(message);
    this.name = 'KubernetesError';
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KubernetesError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'AUTHENTICATION_ERROR', 401, false, details || {});
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when authorization fails
 */
export class AuthorizationError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'AUTHORIZATION_ERROR', 403, false, details || {});
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when a resource is not found
 */
export class ResourceNotFoundError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RESOURCE_NOT_FOUND', 404, false, details || {});
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Error thrown when a resource already exists (conflict)
 */
export class ResourceConflictError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'RESOURCE_CONFLICT', 409, false, details || {});
    this.name = 'ResourceConflictError';
    Object.setPrototypeOf(this, ResourceConflictError.prototype);
  }
}

/**
 * Error thrown when request validation fails, either at the API server or in tool input
 */
export class ValidationError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, false, details || {});
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when the server is unavailable
 */
export class ServerUnavailableError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SERVER_UNAVAILABLE', 503, true, details || {});
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

/**
 * Error thrown when a timeout occurs
 */
export class TimeoutError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'TIMEOUT_ERROR', 408, true, details || {});
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when rate limiting is encountered
 */
export class RateLimitError extends KubernetesError {
  constructor(message: string, retryAfter?: number, details?: ErrorDetails) {
    super(message, 'RATE_LIMIT_ERROR', 429, true, { ...(details || {}), retryAfter });
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Error thrown for network-related issues
 */
export class NetworkError extends KubernetesError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'NETWORK_ERROR', undefined, true, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Locate the Status body of a failed API call. The client exposes it on the error itself
 * and on the attached response.
 */
function extractStatusBody(
  error: Record<string, unknown>,
): { body: Record<string, unknown>; statusCode?: number; headers?: Record<string, unknown> } | null {
  const response = isRecord(error.response) ? error.response : {};
  const errorBody = error.body;
  const responseBody = response.body;
  const body = isRecord(errorBody) ? errorBody : isRecord(responseBody) ? responseBody : null;
  if (!body) {
    return null;
  }

  const statusCode =
    readNumber(response, 'statusCode') ??
    readNumber(error, 'statusCode') ??
    readNumber(body, 'code');
  const responseHeaders = response.headers;
  const headers = isRecord(responseHeaders) ? responseHeaders : undefined;
  return { body, statusCode, headers };
}

/**
 * Convert Kubernetes API errors to typed errors
 */
export function convertApiError(error: unknown): KubernetesError {
  if (error instanceof KubernetesError) {
    return error;
  }

  if (!isRecord(error)) {
    return new KubernetesError(String(error), 'UNKNOWN_ERROR', undefined, false, {
      originalError: String(error),
    });
  }

  // Handle Kubernetes API response errors
  const status = extractStatusBody(error);
  if (status) {
    const { body, statusCode, headers } = status;
    const message = readString(body, 'message') || readString(body, 'reason') || 'Unknown error';
    const retryAfterHeader = headers ? headers['retry-after'] : undefined;
    const retryAfter =
      typeof retryAfterHeader === 'string' ? parseInt(retryAfterHeader, 10) : undefined;

    const details: ErrorDetails = {
      kind: body.kind,
      apiVersion: body.apiVersion,
      reason: body.reason,
      details: body.details,
      code: body.code,
    };

    switch (statusCode) {
      case 401:
        return new AuthenticationError(message, details);
      case 403:
        return new AuthorizationError(message, details);
      case 404:
        return new ResourceNotFoundError(message, details);
      case 409:
        return new ResourceConflictError(message, details);
      case 400:
      case 422:
        return new ValidationError(message, details);
      case 429:
        return new RateLimitError(
          message,
          Number.isFinite(retryAfter) ? retryAfter : undefined,
          details,
        );
      case 408:
        return new TimeoutError(message, details);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ServerUnavailableError(message, details);
      default:
        return new KubernetesError(
          message,
          'API_ERROR',
          statusCode,
          statusCode !== undefined && statusCode >= 500,
          details,
        );
    }
  }

  const code = readString(error, 'code');
  const message = readString(error, 'message');

  // Handle network errors
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
    return new NetworkError(message || code, { code });
  }

  // Handle timeout and abort errors
  if (message && message.toLowerCase().includes('timeout')) {
    return new TimeoutError(message);
  }
  if (readString(error, 'name') === 'AbortError') {
    return new TimeoutError(message || 'The operation was aborted');
  }

  // Default error
  return new KubernetesError(message || 'Unknown error', 'UNKNOWN_ERROR', undefined, false, {
    originalError: String(error),
  });
}
