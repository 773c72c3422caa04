export type GatewayErrorKind =
  | 'validation'
  | 'throttled'
  | 'upstream_timeout'
  | 'upstream'
  | 'not_found'
  | 'path_security'
  | 'internal';

/**
 * Base class for every failure the gateway reports to a client.
 * `statusCode` is the HTTP status the error maps to at the API boundary.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(kind: GatewayErrorKind, statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation', 400, message, details);
  }
}

/** Admission denied. A flow-control signal, not a failure. */
export class ThrottleError extends GatewayError {
  readonly retryAfter: number;

  constructor(retryAfter: number) {
    super('throttled', 429, 'Rate limit exceeded', { retryAfter });
    this.retryAfter = retryAfter;
  }
}

export class UpstreamTimeoutError extends GatewayError {
  constructor(service: string, timeoutMs: number) {
    super('upstream_timeout', 504, `${service} did not respond within ${timeoutMs} ms`, { service, timeoutMs });
  }
}

export class UpstreamError extends GatewayError {
  readonly upstreamStatus?: number;

  constructor(service: string, message: string, upstreamStatus?: number) {
    super('upstream', 502, message, { service, upstreamStatus });
    this.upstreamStatus = upstreamStatus;
  }
}

export class NotFoundError extends GatewayError {
  constructor(resource: string) {
    super('not_found', 404, `${resource} not found`, { resource });
  }
}

export class PathSecurityError extends GatewayError {
  constructor() {
    super('path_security', 403, 'Access to the requested file is not allowed');
  }
}

export class InternalError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super('internal', 500, message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Normalize anything thrown into a GatewayError. Unknown errors become
 * InternalError and keep the original as `cause`.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (isGatewayError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, error);
  }
  return new InternalError(String(error), error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
