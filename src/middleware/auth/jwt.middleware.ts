import { NextFunction, Request, Response } from 'express';
import { JwtPayload, verify } from 'jsonwebtoken';
import { getConfig } from '../../config';
import { AuthenticatedUser, isUserRole, UserRole } from '../../models/auth/user.model';
import { ForbiddenError, UnauthorizedError } from '../../utils/errors';
import { sendError } from '../../utils/response';

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Resolves the caller from a token's claims: `sub` is the user id, `role` one of UserRole.
 */
export const userFromToken = (token: string, secret: string): AuthenticatedUser => {
  let payload: string | JwtPayload;
  try {
    payload = verify(token, secret);
  } catch {
    throw new UnauthorizedError('Invalid or expired token');
  }

  if (typeof payload === 'string' || typeof payload.sub !== 'string' || !isUserRole(payload.role)) {
    throw new UnauthorizedError('Invalid token claims');
  }
  return { id: payload.sub, role: payload.role };
};

/**
 * Verifies the `Authorization: Bearer <token>` header and attaches the caller to `req.user`.
 */
export const authenticateToken = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    sendError(res, new UnauthorizedError('Authorization header missing or malformed'), 'authenticating request');
    return;
  }

  try {
    req.user = userFromToken(header.slice('Bearer '.length).trim(), getConfig().jwtSecret);
    next();
  } catch (error) {
    sendError(res, error, 'authenticating request');
  }
};

/**
 * Allows the request through only for the listed roles.
 */
export const requireRole =
  (roles: UserRole[], message?: string) =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      sendError(res, new UnauthorizedError(), 'authorizing request');
      return;
    }
    if (!roles.includes(req.user.role)) {
      sendError(res, new ForbiddenError(message), 'authorizing request');
      return;
    }
    next();
  };

/**
 * The authenticated caller. Throws when the route was mounted without `authenticateToken`.
 */
export const getAuthenticatedUser = (req: Request): AuthenticatedUser => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};
