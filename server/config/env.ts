/**
 * Environment Configuration
 *
 * Reads and validates process environment once at startup.
 */

import { randomBytes } from "crypto";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { AUTH_CONSTANTS, TIMEOUT_CONSTANTS } from "./constants";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_URL: z.string().url().optional(),
  JWT_SECRET: z.string().min(32, "JWT_SECRET must be at least 32 characters").optional(),
  JWT_ISSUER: z.string().min(1).default(AUTH_CONSTANTS.JWT_ISSUER),
  JWT_AUDIENCE: z.string().min(1).default(AUTH_CONSTANTS.JWT_AUDIENCE),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(AUTH_CONSTANTS.ACCESS_TOKEN_TTL_MINUTES),
  REFRESH_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(AUTH_CONSTANTS.REFRESH_TOKEN_TTL_MINUTES),
  WS_HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.WS_HANDSHAKE_TIMEOUT_MS),
});

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  handshakeTimeoutMs: number;
  tokens: {
    secret: string;
    issuer: string;
    audience: string;
    accessTtlMinutes: number;
    refreshTtlMinutes: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const env = parsed.data;

  let secret = env.JWT_SECRET;
  if (!secret) {
    if (env.NODE_ENV === "production") {
      throw new Error("JWT_SECRET is not set");
    }
    // Tokens signed with this secret stop verifying on restart
    secret = randomBytes(32).toString("hex");
    console.warn("[Config] JWT_SECRET not set, using a temporary per-process secret");
  }

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    handshakeTimeoutMs: env.WS_HANDSHAKE_TIMEOUT_MS,
    tokens: {
      secret,
      issuer: env.JWT_ISSUER,
      audience: env.JWT_AUDIENCE,
      accessTtlMinutes: env.ACCESS_TOKEN_TTL_MINUTES,
      refreshTtlMinutes: env.REFRESH_TOKEN_TTL_MINUTES,
    },
  };
}
