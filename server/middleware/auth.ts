/**
 * Authentication Middleware
 *
 * Verifies the bearer access token on every protected route and attaches
 * the authenticated user to `req.auth`.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { UserRole } from "@shared/schema";
import { authenticateAccessToken, extractBearerToken, type AuthenticatedUser } from "../auth/authenticate";
import type { TokenLifecycleManager } from "../auth/tokenManager";
import type { ICredentialStore } from "../storage";
import { AuthenticationError, AuthorizationError } from "../utils/errorHandler";

export function requireAuth(tokens: TokenLifecycleManager, store: ICredentialStore): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      return next(new AuthenticationError());
    }
    authenticateAccessToken(tokens, store, token)
      .then((user) => {
        req.auth = user;
        next();
      })
      .catch(next);
  };
}

export function requireRole(...roles: UserRole[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.auth) {
      return next(new AuthenticationError());
    }
    if (!roles.includes(req.auth.role)) {
      return next(new AuthorizationError(`Requires role: ${roles.join(", ")}`));
    }
    next();
  };
}

/**
 * For handlers mounted behind requireAuth.
 */
export function getAuth(req: Request): AuthenticatedUser {
  if (!req.auth) {
    throw new AuthenticationError();
  }
  return req.auth;
}
