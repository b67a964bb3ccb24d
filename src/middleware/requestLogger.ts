import { AuthConfig } from '../config';
import { logger } from '../utils/logger';

import type { LogContext, Logger } from '../utils/logger';
import type { NextFunction, Request, Response } from 'express';

// Extend Express Request interface to include logging properties
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

/**
 * Generate a unique correlation ID for request tracing.
 */
function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req-${timestamp}-${random}`;
}

/**
 * Mask sensitive header values for safe logging.
 */
function maskSensitiveValue(value: string): string {
  if (value.startsWith(AuthConfig.tokenPrefix) && value.length > 6) {
    return `${AuthConfig.tokenPrefix}****${value.slice(-4)}`;
  }
  return '****';
}

/**
 * Extract safe headers for logging (masks sensitive values).
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['content-length']) {
    headers.contentLength = req.headers['content-length'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }
  // Log presence of the token but never its value
  const token = req.headers[AuthConfig.headerName];
  if (typeof token === 'string') {
    headers.hasApiKey = true;
    headers.apiKeyPrefix = maskSensitiveValue(token);
  }

  return headers;
}

/**
 * Create request logging middleware bound to a base logger.
 * Generates a correlation ID, attaches a child logger to the request and
 * logs the request and its completion.
 */
export function createRequestLogger(baseLogger: Logger = logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    req.correlationId = generateCorrelationId();
    req.startTime = Date.now();
    req.log = baseLogger.child(req.correlationId);

    req.log.info('Incoming request', {
      headers: getSafeHeaders(req),
      ip: req.ip ?? req.socket.remoteAddress,
      method: req.method,
      path: req.path,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
    });

    res.on('finish', () => {
      const statusCode = res.statusCode;
      const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
      const context: LogContext = {
        contentLength: res.get('content-length'),
        durationMs: Date.now() - req.startTime,
        method: req.method,
        path: req.path,
        statusCode,
      };

      if (level === 'error') {
        req.log.error('Request completed', undefined, context);
      } else {
        req.log[level]('Request completed', context);
      }
    });

    next();
  };
}
