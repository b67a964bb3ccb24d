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
 * Read the token header, ignoring repeated headers.
 */
function readToken(req: Request): string | undefined {
  const header = req.headers[AuthConfig.headerName];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Authentication middleware for the export API.
 */
export const requireApiAuth = (req: Request, res: Response, next: NextFunction): void => {
  const token = readToken(req);
  const expected = process.env[AuthConfig.tokenEnvVar] ?? '';

  if (
    !token ||
    !expected ||
    !token.startsWith(AuthConfig.tokenPrefix) ||
    !isValidToken(token, expected)
  ) {
    req.log.warn('API authentication failed', {
      path: req.path,
      reason: getAuthFailureReason(token),
    });
    res.status(HttpStatus.UNAUTHORIZED).json({ error: 'Unauthorized: Invalid API token' });
    return;
  }

  req.log.debug('API authentication successful');
  next();
};
