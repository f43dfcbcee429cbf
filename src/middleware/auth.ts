import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthService } from '../services/authService';
import { AuthError } from '../errors';
import { Identity } from '../types';

export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) return undefined;
  return token.trim() || undefined;
}

/**
 * Bearer-token middleware.
 * - Resolves Authorization: Bearer <token> to a stored user.
 * - Attaches req.user = { id, email, user_name } on success.
 * - Forwards an AuthError (401) on missing/invalid/expired token.
 */
export function createAuthMiddleware(authService: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.user = await authService.authenticate(bearerToken(req.headers.authorization));
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * The identity attached by the auth middleware. Only valid on routes
 * mounted behind it.
 */
export function currentUser(req: Request): Identity {
  if (!req.user) {
    throw new AuthError('MissingToken', 'Not authenticated');
  }
  return req.user;
}
