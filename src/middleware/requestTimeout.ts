/**
 * Request timeout middleware.
 * Prevents requests from hanging indefinitely by setting a maximum processing time.
 */

import { HttpStatus, RequestConfig } from '../config';

import type { NextFunction, Request, Response } from 'express';

/**
 * Create a request timeout middleware with configurable timeout.
 *
 * @param timeoutMs - Maximum time allowed for request processing
 */
export function createRequestTimeout(timeoutMs: number = RequestConfig.timeoutMs) {
  return (req: Request, res: Response, next: NextFunction): void => {
    req.socket.setTimeout(timeoutMs);

    const timer = setTimeout(() => {
      if (res.headersSent) return;
      req.log.warn('Request timeout exceeded', {
        method: req.method,
        path: req.path,
        timeoutMs,
      });
      res.status(HttpStatus.REQUEST_TIMEOUT).json({
        error: 'Request timeout',
        message: `Request processing exceeded ${String(timeoutMs / 1000)} seconds`,
      });
    }, timeoutMs);

    const clear = () => {
      clearTimeout(timer);
    };
    res.on('finish', clear);
    res.on('close', clear);

    next();
  };
}

/**
 * Default request timeout middleware.
 */
export const requestTimeout = createRequestTimeout();
