import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import {
  ThrottleError,
  ValidationError,
  toGatewayError,
  type GatewayError,
  type GatewayErrorKind,
} from '../utils/errors.js';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorContext {
  url?: string;
  method?: string;
  ip?: string;
  sessionId?: string;
  stage?: string; // Pipeline step that failed, e.g. "query_execution"
  upstreamStatus?: number;
}

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  kind: GatewayErrorKind;
  statusCode: number;
  message: string;
  stack?: string;
  context: ErrorContext;
  severity: ErrorSeverity;
}

export interface ErrorHandlerOptions {
  maxRecords: number;
  exposeStack: boolean; // Include stack traces in responses (development only)
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byKind: Record<string, number>;
  byType: Record<string, number>;
}

const SEVERITY_BY_KIND: Record<GatewayErrorKind, ErrorSeverity> = {
  internal: 'critical',
  upstream_timeout: 'high',
  upstream: 'high',
  path_security: 'medium',
  validation: 'low',
  not_found: 'low',
  throttled: 'low',
};

const INTERNAL_MESSAGE = 'An error occurred while processing your request. Please try again.';

/**
 * Errors raised by express.json() for bodies it cannot read
 */
function isBodyParserError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export class ErrorHandler {
  private errors: Map<string, ErrorInfo> = new Map();
  private options: ErrorHandlerOptions;

  constructor(options: Partial<ErrorHandlerOptions> = {}) {
    this.options = {
      maxRecords: 500,
      exposeStack: false,
      ...options,
    };
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const normalized = isBodyParserError(error) ? new ValidationError('Request body is not valid JSON') : error;
      const sessionHeader = req.get('X-Session-ID');
      const errorInfo = this.captureError(normalized, {
        url: req.originalUrl,
        method: req.method,
        ip: req.ip,
        sessionId: sessionHeader && sessionHeader.trim() !== '' ? sessionHeader.trim() : undefined,
      });

      if (normalized instanceof ThrottleError) {
        res.set('Retry-After', normalized.retryAfter.toString());
      }
      this.sendErrorResponse(errorInfo, res);
    };
  }

  /**
   * Record an error with its context and log it
   */
  captureError(error: unknown, context: ErrorContext = {}): ErrorInfo {
    const gatewayError: GatewayError = toGatewayError(error);
    const original = gatewayError.cause instanceof Error ? gatewayError.cause : gatewayError;

    const errorInfo: ErrorInfo = {
      id: this.generateErrorId(),
      timestamp: new Date().toISOString(),
      type: original.name,
      kind: gatewayError.kind,
      statusCode: gatewayError.statusCode,
      message: gatewayError.message,
      stack: original.stack,
      context: this.compactContext(context),
      severity: SEVERITY_BY_KIND[gatewayError.kind],
    };

    this.errors.set(errorInfo.id, errorInfo);
    this.trim();
    this.logError(errorInfo);

    return errorInfo;
  }

  private sendErrorResponse(errorInfo: ErrorInfo, res: Response): void {
    res.status(errorInfo.statusCode).json({
      success: false,
      error: errorInfo.kind === 'internal' ? 'InternalError' : errorInfo.type,
      message: errorInfo.kind === 'internal' ? INTERNAL_MESSAGE : errorInfo.message,
      errorId: errorInfo.id,
      timestamp: errorInfo.timestamp,
      ...(this.options.exposeStack && { stack: errorInfo.stack }),
    });
  }

  private compactContext(context: ErrorContext): ErrorContext {
    const compact: ErrorContext = {};
    if (context.url !== undefined) compact.url = context.url;
    if (context.method !== undefined) compact.method = context.method;
    if (context.ip !== undefined) compact.ip = context.ip;
    if (context.sessionId !== undefined) compact.sessionId = context.sessionId;
    if (context.stage !== undefined) compact.stage = context.stage;
    if (context.upstreamStatus !== undefined) compact.upstreamStatus = context.upstreamStatus;
    return compact;
  }

  // Oldest records go first once the cap is reached
  private trim(): void {
    while (this.errors.size > this.options.maxRecords) {
      const oldest = this.errors.keys().next();
      if (oldest.done) {
        return;
      }
      this.errors.delete(oldest.value);
    }
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`❌ Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`, {
      severity: errorInfo.severity,
      context: errorInfo.context,
      timestamp: errorInfo.timestamp,
    });
  }

  private generateErrorId(): string {
    return `err_${Date.now()}_${uuidv4().slice(0, 8)}`;
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.size,
      bySeverity: {},
      byKind: {},
      byType: {},
    };

    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] || 0) + 1;
      stats.byKind[error.kind] = (stats.byKind[error.kind] || 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] || 0) + 1;
    }

    return stats;
  }

  /**
   * Most recent errors first
   */
  getRecentErrors(limit: number = 20): ErrorInfo[] {
    return Array.from(this.errors.values()).reverse().slice(0, limit);
  }

  /**
   * Drop errors older than `maxAgeMs`. Returns how many were dropped.
   */
  clearOldErrors(maxAgeMs: number = 24 * 60 * 60 * 1000, now: number = Date.now()): number {
    const cutoff = now - maxAgeMs;
    let cleared = 0;

    for (const [id, error] of this.errors.entries()) {
      if (new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }

    return cleared;
  }
}
