import { timingSafeEqual } from 'node:crypto';

import { AuthConfig, HttpStatus } from '../config';

import type { NextFunction, Request, Response } from 'express';

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  if (!token.startsWith(AuthConfig.tokenPrefix)) return 'invalid_format';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  if (provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(provided), Buffer.from(expected));
}

/**
 * Check the configured write token at startup.
 *
 * @throws Error when the token is missing or malformed
 */
export function validateWriteToken(env: Record<string, string | undefined> = process.env): void {
  const writeToken = env[AuthConfig.tokenEnvVar];
  if (!writeToken) {
    throw new Error(`${AuthConfig.tokenEnvVar} environment variable is required`);
  }
  if (!writeToken.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`${AuthConfig.tokenEnvVar} must start with "${AuthConfig.tokenPrefix}"`);
  }
}

/**
 * Authentication middleware for write access.
 */
export function requireWriteAuth(req: Request, res: Response, next: NextFunction): void {
  const token = req.get(AuthConfig.headerName);
  const writeToken = process.env[AuthConfig.tokenEnvVar] ?? '';

  if (
    !token ||
    !writeToken ||
    !token.startsWith(AuthConfig.tokenPrefix) ||
    !isValidToken(token, writeToken)
  ) {
    req.log.warn('Write authentication failed', {
      path: req.path,
      reason: getAuthFailureReason(token),
    });
    res.status(HttpStatus.UNAUTHORIZED).json({ error: 'Unauthorized: Invalid write token' });
    return;
  }

  req.log.debug('Write authentication successful');
  next();
}
