import { Request, Response, NextFunction } from 'express';
import { AuthTokenService } from '../services/user/AuthTokenService.js';
import { AuthenticationError } from '../errors/index.js';
import type { User } from '../types/models.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuth / optionalAuth */
      user?: User;
      /** Raw bearer token of the current request */
      authToken?: string;
    }
  }
}

/**
 * Token from an `Authorization: Bearer <token>` header
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

/**
 * The user attached by requireAuth; throws if the route was mounted without it
 */
export function getAuthenticatedUser(req: Request): User {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return req.user;
}

export function createAuthMiddleware(tokens: AuthTokenService) {
  const resolve = async (req: Request): Promise<User | null> => {
    const token = extractBearerToken(req.get('Authorization'));
    if (!token) {
      return null;
    }
    const user = await tokens.resolveToken(token);
    if (user) {
      req.user = user;
      req.authToken = token;
    }
    return user;
  };

  /**
   * 401 unless the request carries a valid, unexpired token
   */
  const requireAuth = (req: Request, _res: Response, next: NextFunction): void => {
    const hasToken = extractBearerToken(req.get('Authorization')) !== null;
    resolve(req)
      .then(user => {
        if (user) {
          next();
          return;
        }
        next(
          new AuthenticationError(hasToken ? 'Invalid or expired token' : 'Authentication required', {
            operation: 'requireAuth',
            metadata: { path: req.path },
          })
        );
      })
      .catch(next);
  };

  /**
   * Attaches the user when a valid token is present; a missing or unknown token is not an error
   */
  const optionalAuth = (req: Request, _res: Response, next: NextFunction): void => {
    resolve(req)
      .then(() => next())
      .catch(next);
  };

  return { requireAuth, optionalAuth };
}
