import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends Error implements AppError {
  statusCode = 403;
  isOperational = true;
  constructor(message = "Access denied") {
    super(message);
    this.name = "AuthorizationError";
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  constructor(message = "Rate limit exceeded") {
    super(message);
    this.name = "RateLimitError";
  }
}

export type CredentialErrorCode =
  | "IDENTITY_INACTIVE"
  | "INVALID_CREDENTIALS"
  | "TOKEN_INVALID"
  | "TOKEN_EXPIRED"
  | "TOKEN_KIND_MISMATCH"
  | "TOKEN_REVOKED";

/**
 * Base for every rejection of a presented credential. The specific subclass is
 * for logs and callers inside the process; clients only ever see a uniform 401.
 */
export class CredentialError extends AuthenticationError {
  readonly code: CredentialErrorCode;
  constructor(code: CredentialErrorCode, message: string) {
    super(message);
    this.name = "CredentialError";
    this.code = code;
  }
}

export class IdentityInactiveError extends CredentialError {
  constructor(status: string) {
    super("IDENTITY_INACTIVE", `Identity is ${status}`);
    this.name = "IdentityInactiveError";
  }
}

export class InvalidCredentialsError extends CredentialError {
  constructor() {
    super("INVALID_CREDENTIALS", "Invalid username or password");
    this.name = "InvalidCredentialsError";
  }
}

export class TokenInvalidError extends CredentialError {
  constructor(message = "Token is malformed or its signature does not verify") {
    super("TOKEN_INVALID", message);
    this.name = "TokenInvalidError";
  }
}

export class TokenExpiredError extends CredentialError {
  constructor() {
    super("TOKEN_EXPIRED", "Token has expired");
    this.name = "TokenExpiredError";
  }
}

export class TokenKindMismatchError extends CredentialError {
  constructor(expected: string, actual: string) {
    super("TOKEN_KIND_MISMATCH", `Expected ${expected} token, got ${actual}`);
    this.name = "TokenKindMismatchError";
  }
}

export class TokenRevokedError extends CredentialError {
  readonly jti: string;
  readonly subject: string;
  constructor(jti: string, subject: string) {
    super("TOKEN_REVOKED", `Token ${jti} has been revoked`);
    this.name = "TokenRevokedError";
    this.jti = jti;
    this.subject = subject;
  }
}

/**
 * A store operation failed or timed out. Safe to retry for idempotent operations.
 */
export class TransientStoreError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  readonly retryable = true;
  readonly operation: string;
  constructor(operation: string, cause?: unknown) {
    super(`Store operation "${operation}" failed: ${getErrorMessage(cause)}`, { cause });
    this.name = "TransientStoreError";
    this.operation = operation;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export interface HandleRouteErrorOptions {
  /** Include { success: false } in error response */
  includeSuccessField?: boolean;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
  options?: HandleRouteErrorOptions,
): void {
  const statusCode = getErrorStatusCode(error);
  // Credential failures all look the same from outside
  const message = error instanceof CredentialError ? "Unauthorized" : getErrorMessage(error);

  if (error instanceof CredentialError && context) {
    console.warn(`[${context}] Credential rejected: ${error.code}`);
  } else if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  if (error instanceof TransientStoreError) {
    res.set("Retry-After", "1");
  }

  if (options?.includeSuccessField) {
    res.status(statusCode).json({ success: false, error: message });
  } else {
    res.status(statusCode).json({ error: message });
  }
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}
