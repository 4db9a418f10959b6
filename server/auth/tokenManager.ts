/**
 * Token Lifecycle Manager
 *
 * Issues paired access/refresh JWTs, verifies them, rotates refresh tokens
 * (single use) and revokes tokens on logout.
 *
 * Design:
 * - One verification path; the `type` claim is the access/refresh tag
 * - Every token carries a jti; the revocation set is keyed by it
 * - Rotation is serialized per jti in-process (KeyedMutex) and made
 *   single-winner across processes by the store's insert-if-absent
 * - A refresh token presented after it was rotated is treated as a replay:
 *   listeners are told so live channels of that identity can be evicted
 */

import { randomUUID } from "crypto";
import { SignJWT, jwtVerify, errors as joseErrors, type JWTPayload } from "jose";
import { z } from "zod";
import { USER_ROLES, type User } from "@shared/schema";
import { AUTH_CONSTANTS } from "../config/constants";
import type { ICredentialStore } from "../storage";
import { systemClock, type Clock } from "../utils/clock";
import { KeyedMutex } from "../utils/keyedMutex";
import {
  logError,
  IdentityInactiveError,
  InvalidCredentialsError,
  TokenExpiredError,
  TokenInvalidError,
  TokenKindMismatchError,
  TokenRevokedError,
} from "../utils/errorHandler";
import { verifyPassword } from "./passwords";

export const TOKEN_KINDS = ["access", "refresh"] as const;
export type TokenKind = typeof TOKEN_KINDS[number];

export type Identity = Pick<User, "id" | "role" | "status">;

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(USER_ROLES),
  type: z.enum(TOKEN_KINDS),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
}

export interface TokenManagerConfig {
  secret: string;
  issuer: string;
  audience: string;
  accessTtlMinutes: number;
  refreshTtlMinutes: number;
}

export type RevokeOutcome = "revoked" | "already_revoked" | "expired";

export type SessionEvent =
  | { type: "revoked"; subject: string; jti: string; kind: TokenKind }
  | { type: "replay"; subject: string; jti: string };

export type SessionListener = (event: SessionEvent) => void;

export class TokenLifecycleManager {
  private readonly key: Uint8Array;
  private readonly rotationLocks = new KeyedMutex();
  private readonly listeners = new Set<SessionListener>();

  constructor(
    private readonly config: TokenManagerConfig,
    private readonly store: ICredentialStore,
    private readonly clock: Clock = systemClock,
  ) {
    this.key = new TextEncoder().encode(config.secret);
  }

  /**
   * Subscribe to revocations and detected replays.
   * @returns unsubscribe function
   */
  onSessionEvent(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async login(identifier: string, password: string): Promise<TokenPair> {
    const user = await this.store.getUserByLoginIdentifier(identifier);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      console.warn(`[TokenManager] Login failed for "${identifier}"`);
      throw new InvalidCredentialsError();
    }
    return this.issue(user);
  }

  async issue(identity: Identity): Promise<TokenPair> {
    if (identity.status !== "active") {
      console.warn(`[TokenManager] Refusing to issue tokens: user ${identity.id} is ${identity.status}`);
      throw new IdentityInactiveError(identity.status);
    }
    const now = this.clock.now();
    const access = await this.sign(identity, "access", this.config.accessTtlMinutes, now);
    const refresh = await this.sign(identity, "refresh", this.config.refreshTtlMinutes, now);
    console.log(`[TokenManager] Issued pair for user ${identity.id} (access ${access.jti}, refresh ${refresh.jti})`);
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessExpiresAt: access.expiresAt,
      refreshExpiresAt: refresh.expiresAt,
    };
  }

  async verifyAccess(token: string): Promise<TokenClaims> {
    const claims = await this.verify(token, "access");
    await this.assertNotRevoked(claims);
    return claims;
  }

  async verifyRefresh(token: string): Promise<TokenClaims> {
    const claims = await this.verify(token, "refresh");
    await this.assertNotRevoked(claims);
    return claims;
  }

  /**
   * Rotates a refresh token: the presented one is revoked and a new pair for
   * the same identity is returned. Exactly one caller can win for a given jti.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = await this.verify(refreshToken, "refresh");

    return this.rotationLocks.runExclusive(claims.jti, async () => {
      if (await this.store.isTokenRevoked(claims.jti)) {
        this.reportReplay(claims);
        throw new TokenRevokedError(claims.jti, claims.sub);
      }

      const user = await this.store.getUser(claims.sub);
      if (!user) {
        throw new TokenInvalidError("Token subject no longer exists");
      }
      if (user.status !== "active") {
        throw new IdentityInactiveError(user.status);
      }

      const won = await this.store.revokeToken({
        jti: claims.jti,
        subject: claims.sub,
        reason: "rotated",
        expiresAt: fromEpochSeconds(claims.exp),
      });
      if (!won) {
        // Another process rotated it between our check and insert
        this.reportReplay(claims);
        throw new TokenRevokedError(claims.jti, claims.sub);
      }

      console.log(`[TokenManager] Rotated refresh token ${claims.jti} for user ${claims.sub}`);
      return this.issue(user);
    });
  }

  /**
   * Adds the token's jti to the revocation set. Idempotent. An already
   * expired token needs no entry and is reported as such.
   * @param expectedSubject when given, the token must belong to this user
   */
  async revoke(token: string, expectedSubject?: string): Promise<RevokeOutcome> {
    const claims = await this.claimsForRevocation(token, expectedSubject);
    return claims ? this.revokeClaims(claims) : "expired";
  }

  /**
   * Ends a session: revokes the access token and, when given, the refresh
   * token. Both are checked before either is revoked, so a bad refresh token
   * leaves the session untouched.
   */
  async logout(accessToken: string, refreshToken: string | undefined, subject: string): Promise<RevokeOutcome[]> {
    const pending = [await this.claimsForRevocation(accessToken, subject)];
    if (refreshToken !== undefined) {
      pending.push(await this.claimsForRevocation(refreshToken, subject));
    }
    const outcomes: RevokeOutcome[] = [];
    for (const claims of pending) {
      outcomes.push(claims ? await this.revokeClaims(claims) : "expired");
    }
    return outcomes;
  }

  /**
   * Drops revocation entries whose token has expired; an expired token fails
   * verification whether or not it is in the set.
   */
  async sweep(): Promise<number> {
    const purged = await this.store.purgeExpiredRevocations(this.clock.now());
    if (purged > 0) {
      console.log(`[TokenManager] Swept ${purged} expired revocation entries`);
    }
    return purged;
  }

  startSweeper(intervalMs: number = AUTH_CONSTANTS.REVOCATION_SWEEP_INTERVAL_MS): () => void {
    const timer = setInterval(() => {
      this.sweep().catch((error) => logError("TokenManager", error));
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  /**
   * Claims of a token about to be revoked, or undefined when it has expired.
   */
  private async claimsForRevocation(token: string, expectedSubject?: string): Promise<TokenClaims | undefined> {
    let claims: TokenClaims;
    try {
      claims = await this.verify(token);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        return undefined;
      }
      throw error;
    }
    if (expectedSubject !== undefined && claims.sub !== expectedSubject) {
      throw new TokenInvalidError("Token belongs to another user");
    }
    return claims;
  }

  private async revokeClaims(claims: TokenClaims): Promise<RevokeOutcome> {
    const inserted = await this.store.revokeToken({
      jti: claims.jti,
      subject: claims.sub,
      reason: "logout",
      expiresAt: fromEpochSeconds(claims.exp),
    });
    if (!inserted) {
      return "already_revoked";
    }

    console.log(`[TokenManager] Revoked ${claims.type} token ${claims.jti} for user ${claims.sub}`);
    this.emit({ type: "revoked", subject: claims.sub, jti: claims.jti, kind: claims.type });
    return "revoked";
  }

  private async sign(identity: Identity, kind: TokenKind, ttlMinutes: number, now: Date) {
    const jti = randomUUID();
    const issuedAt = Math.floor(now.getTime() / 1000);
    const expiresAtSeconds = issuedAt + ttlMinutes * 60;
    const token = await new SignJWT({ role: identity.role, type: kind })
      .setProtectedHeader({ alg: AUTH_CONSTANTS.JWT_ALGORITHM, typ: "JWT" })
      .setSubject(identity.id)
      .setJti(jti)
      .setIssuer(this.config.issuer)
      .setAudience(this.config.audience)
      .setIssuedAt(issuedAt)
      .setNotBefore(issuedAt)
      .setExpirationTime(expiresAtSeconds)
      .sign(this.key);
    return { token, jti, expiresAt: fromEpochSeconds(expiresAtSeconds) };
  }

  /**
   * Signature, issuer, audience, expiry, claim shape and (when given) kind.
   * Does not consult the revocation set.
   */
  private async verify(token: string, expectedKind?: TokenKind): Promise<TokenClaims> {
    let payload: JWTPayload;
    try {
      const result = await jwtVerify(token, this.key, {
        algorithms: [AUTH_CONSTANTS.JWT_ALGORITHM],
        issuer: this.config.issuer,
        audience: this.config.audience,
        currentDate: this.clock.now(),
      });
      payload = result.payload;
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw new TokenExpiredError();
      }
      if (error instanceof joseErrors.JOSEError || error instanceof TypeError) {
        throw new TokenInvalidError();
      }
      throw error;
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenInvalidError("Token is missing required claims");
    }
    const claims = parsed.data;
    if (expectedKind && claims.type !== expectedKind) {
      throw new TokenKindMismatchError(expectedKind, claims.type);
    }
    return claims;
  }

  private async assertNotRevoked(claims: TokenClaims): Promise<void> {
    if (await this.store.isTokenRevoked(claims.jti)) {
      throw new TokenRevokedError(claims.jti, claims.sub);
    }
  }

  private reportReplay(claims: TokenClaims): void {
    console.warn(`[TokenManager] Replay of rotated refresh token ${claims.jti} for user ${claims.sub}`);
    this.emit({ type: "replay", subject: claims.sub, jti: claims.jti });
  }

  private emit(event: SessionEvent): void {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        logError("TokenManager", error);
      }
    });
  }
}

function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
