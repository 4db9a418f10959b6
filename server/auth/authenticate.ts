/**
 * Bearer Authentication
 *
 * Shared by the REST middleware and the WebSocket gateway: the access token
 * must verify, and its subject must still exist and be active.
 */

import type { UserRole } from "@shared/schema";
import type { ICredentialStore } from "../storage";
import { IdentityInactiveError, TokenInvalidError } from "../utils/errorHandler";
import type { TokenLifecycleManager } from "./tokenManager";

export interface AuthenticatedUser {
  id: string;
  role: UserRole;
  tokenJti: string;
  tokenExpiresAt: Date;
}

export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer" || !parts[1]) {
    return undefined;
  }
  return parts[1];
}

export async function authenticateAccessToken(
  tokens: TokenLifecycleManager,
  store: ICredentialStore,
  token: string,
): Promise<AuthenticatedUser> {
  const claims = await tokens.verifyAccess(token);
  const user = await store.getUser(claims.sub);
  if (!user) {
    throw new TokenInvalidError("Token subject no longer exists");
  }
  if (user.status !== "active") {
    throw new IdentityInactiveError(user.status);
  }
  return {
    id: user.id,
    role: user.role,
    tokenJti: claims.jti,
    tokenExpiresAt: new Date(claims.exp * 1000),
  };
}
