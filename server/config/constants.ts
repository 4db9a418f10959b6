/**
 * Application Constants
 * 
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Token lifecycle configuration. Environment variables override the TTLs,
 * issuer and audience (see config/env.ts).
 */
export const AUTH_CONSTANTS = {
  /**
   * Access token lifetime (minutes).
   */
  ACCESS_TOKEN_TTL_MINUTES: 30,

  /**
   * Refresh token lifetime (minutes).
   */
  REFRESH_TOKEN_TTL_MINUTES: 43200, // 30 days

  JWT_ISSUER: "meeting-assistant",
  JWT_AUDIENCE: "meeting-assistant-clients",

  /**
   * Only HS256 is accepted when verifying.
   */
  JWT_ALGORITHM: "HS256",

  /**
   * How often expired revocation entries are purged (milliseconds).
   */
  REVOCATION_SWEEP_INTERVAL_MS: 15 * 60 * 1000, // 15 minutes
} as const;

/**
 * Real-time delivery configuration
 */
export const DELIVERY_CONSTANTS = {
  /**
   * Path the WebSocket gateway listens on.
   */
  WS_PATH: "/ws/messages",

  /**
   * Unread items read per backlog page when replaying to a channel.
   */
  REPLAY_PAGE_SIZE: 500,

  /**
   * Frames a single channel may have queued before it is treated as stalled and closed.
   */
  MAX_QUEUED_FRAMES: 1000,

  /**
   * Close code used when a channel is refused or evicted for auth reasons.
   */
  CLOSE_CODE_UNAUTHORIZED: 4001,

  /**
   * Close code used at server shutdown.
   */
  CLOSE_CODE_GOING_AWAY: 1001,
} as const;

/**
 * Message listing configuration
 */
export const PAGINATION_CONSTANTS = {
  DEFAULT_PAGE_SIZE: 20,
  MAX_PAGE_SIZE: 100,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Time a WebSocket client has to complete its authenticated handshake (milliseconds).
   */
  WS_HANDSHAKE_TIMEOUT_MS: 5000,

  /**
   * Deadline for a single store operation before it surfaces as retryable (milliseconds).
   */
  STORE_OPERATION_TIMEOUT_MS: 10000,
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMIT_CONSTANTS = {
  /**
   * Authentication rate limit window (milliseconds).
   */
  AUTH_WINDOW_MS: 15 * 60 * 1000, // 15 minutes

  /**
   * Maximum authentication attempts per window.
   */
  AUTH_MAX_ATTEMPTS: 10,
} as const;
