import { AuthConfig } from '../config';
import { generateCorrelationId, logger } from '../utils/logger';

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
 * Mask sensitive header values for safe logging.
 */
export function maskSensitiveValue(value: string): string {
  if (!value) return '';
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
  // Log presence of the token but never the value
  const token = req.get(AuthConfig.headerName);
  if (token) {
    headers.hasApiKey = true;
    headers.apiKeyPrefix = maskSensitiveValue(token);
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches logger to request, logs request/response.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId('req');
  req.startTime = Date.now();
  req.log = logger.child(req.correlationId);

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
  });

  res.on('finish', () => {
    const durationMs = Date.now() - req.startTime;
    const statusCode = res.statusCode;

    // Determine log level based on status code
    const logLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    const context = {
      contentLength: res.get('content-length'),
      durationMs,
      method: req.method,
      path: req.path,
      statusCode,
    };

    if (logLevel === 'error') {
      req.log.error('Request completed', undefined, context);
    } else {
      req.log[logLevel]('Request completed', context);
    }
  });

  next();
}
