/**
 * Authentication Middleware
 *
 * Validates JWT tokens from Auth0 using express-oauth2-jwt-bearer and
 * attaches the acting user to the request. Storage is selected per user,
 * so every collection route runs behind this middleware.
 *
 * Environment Variables:
 * - AUTH_DISABLED: Set to 'true' to bypass authentication (development only)
 * - AUTH0_DOMAIN: Your Auth0 tenant domain (e.g., 'your-tenant.auth0.com')
 * - AUTH0_AUDIENCE: Your API identifier in Auth0
 */

import { Request, Response, NextFunction } from 'express';
import { auth, JWTPayload } from 'express-oauth2-jwt-bearer';
import type { UserIdentity } from '../../shared/types';
import { config } from '../config';
import { loggers, serializeError } from '../logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Extend Express Request to include the authenticated user
 * Note: express-oauth2-jwt-bearer already adds req.auth with the JWT payload
 */
declare global {
  namespace Express {
    interface Request {
      user?: UserIdentity;
    }
  }
}

// ============================================================================
// Auth0 JWT Validator
// ============================================================================

/**
 * Only initialized when auth is enabled and credentials are configured
 */
const jwtCheck = !config.auth.disabled && config.auth.auth0.domain && config.auth.auth0.audience
  ? auth({
      issuerBaseURL: `https://${config.auth.auth0.domain}`,
      audience: config.auth.auth0.audience,
    })
  : null;

// ============================================================================
// Middleware
// ============================================================================

/**
 * Development user for when AUTH_DISABLED=true
 */
export const MOCK_USER: UserIdentity = {
  id: 'dev-user',
  email: 'dev@local',
};

/**
 * Auth0 puts the email in the standard claim when the email scope was
 * requested; `sub` always holds the user id
 */
export function extractUserFromPayload(payload: JWTPayload): UserIdentity | null {
  if (typeof payload.sub !== 'string' || payload.sub === '') {
    return null;
  }
  return {
    id: payload.sub,
    ...(typeof payload.email === 'string' && { email: payload.email }),
  };
}

/**
 * Authenticate incoming requests and attach user to request object.
 *
 * When AUTH_DISABLED=true: Uses the development user.
 * When AUTH_DISABLED=false: Validates JWT token from Authorization header.
 */
export const authenticateRequest = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (config.auth.disabled) {
    req.user = MOCK_USER;
    next();
    return;
  }

  if (!jwtCheck) {
    loggers.auth.error(
      'Auth0 not configured. Set AUTH0_DOMAIN and AUTH0_AUDIENCE, or AUTH_DISABLED=true for development.'
    );
    res.status(500).json({
      error: 'Authentication not configured',
      message: 'Server authentication is not properly configured',
    });
    return;
  }

  jwtCheck(req, res, (err?: unknown) => {
    if (err) {
      loggers.auth.warn({ err: serializeError(err) }, 'JWT validation failed');
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid or expired token',
      });
      return;
    }

    // express-oauth2-jwt-bearer adds req.auth.payload after validation
    const user = req.auth ? extractUserFromPayload(req.auth.payload) : null;
    if (!user) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Token payload not found',
      });
      return;
    }

    req.user = user;
    next();
  });
};

export default authenticateRequest;
