import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import { z } from "zod";
import type { User } from "@shared/schema";
import { createApp } from "../app";
import { hashPassword } from "../auth/passwords";
import { TokenLifecycleManager } from "../auth/tokenManager";
import { ConnectionRegistry } from "../delivery/connectionRegistry";
import { DeliveryCoordinator } from "../delivery/deliveryCoordinator";
import { resetAuthRateLimit } from "../middleware/security";
import { MemStorage } from "../storage";
import { ManualClock, MINUTE_MS, TEST_TOKEN_CONFIG, createTestUser } from "./helpers";

const PASSWORD = "test-password";

const tokenResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
});

const sentMessageSchema = z.object({ id: z.string() });

interface ApiResponse {
  status: number;
  body: unknown;
}

describe("routes", () => {
  let clock: ManualClock;
  let storage: MemStorage;
  let server: Server;
  let baseUrl: string;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    resetAuthRateLimit();

    clock = new ManualClock();
    storage = new MemStorage(clock);
    const tokens = new TokenLifecycleManager(TEST_TOKEN_CONFIG, storage, clock);
    const registry = new ConnectionRegistry(clock);
    const coordinator = new DeliveryCoordinator(storage, registry);
    tokens.onSessionEvent((event) => {
      coordinator.handleSessionEvent(event);
    });

    const passwordHash = await hashPassword(PASSWORD);
    alice = await createTestUser(storage, { username: "alice", passwordHash });
    bob = await createTestUser(storage, { username: "bob", passwordHash });

    ({ server } = await createApp({ storage, tokens, coordinator, registry }));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server has no TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    vi.restoreAllMocks();
  });

  async function call(
    method: string,
    path: string,
    options: { token?: string; body?: unknown } = {},
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = {};
    if (options.token) {
      headers.authorization = `Bearer ${options.token}`;
    }
    if (options.body !== undefined) {
      headers["content-type"] = "application/json";
    }
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  async function login(username: string) {
    const response = await call("POST", "/api/auth/login", { body: { username, password: PASSWORD } });
    expect(response.status).toBe(200);
    return tokenResponseSchema.parse(response.body);
  }

  async function sendToBob(content: string, token: string) {
    const response = await call("POST", "/api/messages/send", {
      token,
      body: { content, recipientIds: [bob.id] },
    });
    expect(response.status).toBe(201);
    return sentMessageSchema.parse(response.body);
  }

  describe("POST /api/auth/login", () => {
    it("returns a bearer pair with expiry times", async () => {
      const response = await call("POST", "/api/auth/login", { body: { username: "alice", password: PASSWORD } });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        accessToken: expect.any(String),
        refreshToken: expect.any(String),
        tokenType: "Bearer",
        accessExpiresAt: "2026-01-01T00:30:00.000Z",
        refreshExpiresAt: "2026-01-01T01:00:00.000Z",
      });
    });

    it("answers a wrong password and an unknown user the same way", async () => {
      const wrong = await call("POST", "/api/auth/login", { body: { username: "alice", password: "nope" } });
      const unknown = await call("POST", "/api/auth/login", { body: { username: "nobody", password: PASSWORD } });

      expect(wrong).toEqual({ status: 401, body: { error: "Unauthorized" } });
      expect(unknown).toEqual({ status: 401, body: { error: "Unauthorized" } });
    });

    it("rejects an empty password", async () => {
      const response = await call("POST", "/api/auth/login", { body: { username: "alice", password: "" } });

      expect(response).toEqual({ status: 400, body: { error: "password: Password is required" } });
    });
  });

  describe("POST /api/auth/refresh", () => {
    it("rotates the pair and refuses the old refresh token", async () => {
      const pair = await login("alice");

      const rotated = await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.refreshToken } });
      expect(rotated.status).toBe(200);
      const next = tokenResponseSchema.parse(rotated.body);
      expect(next.refreshToken).not.toBe(pair.refreshToken);

      const reused = await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.refreshToken } });
      expect(reused).toEqual({ status: 401, body: { error: "Unauthorized" } });
    });

    it("refuses an access token with the same uniform body", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.accessToken } });

      expect(response).toEqual({ status: 401, body: { error: "Unauthorized" } });
    });
  });

  describe("POST /api/auth/logout", () => {
    it("revokes the access and refresh tokens", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/auth/logout", {
        token: pair.accessToken,
        body: { refreshToken: pair.refreshToken },
      });

      expect(response).toEqual({ status: 200, body: { revoked: true } });
      expect((await call("GET", "/api/auth/profile", { token: pair.accessToken })).status).toBe(401);
      expect((await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.refreshToken } })).status).toBe(401);
    });

    it("leaves the session intact when the refresh token is malformed", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/auth/logout", {
        token: pair.accessToken,
        body: { refreshToken: "not-a-token" },
      });

      expect(response).toEqual({ status: 401, body: { error: "Unauthorized" } });
      expect((await call("GET", "/api/auth/profile", { token: pair.accessToken })).status).toBe(200);
    });

    it("leaves both sessions intact when the refresh token is another user's", async () => {
      const alicePair = await login("alice");
      const bobPair = await login("bob");

      const response = await call("POST", "/api/auth/logout", {
        token: alicePair.accessToken,
        body: { refreshToken: bobPair.refreshToken },
      });

      expect(response.status).toBe(401);
      expect((await call("GET", "/api/auth/profile", { token: alicePair.accessToken })).status).toBe(200);
      expect((await call("POST", "/api/auth/refresh", { body: { refreshToken: bobPair.refreshToken } })).status).toBe(200);
    });
  });

  describe("GET /api/auth/profile", () => {
    it("returns the caller without the password hash", async () => {
      const pair = await login("alice");

      const response = await call("GET", "/api/auth/profile", { token: pair.accessToken });

      expect(response).toEqual({
        status: 200,
        body: {
          id: alice.id,
          username: "alice",
          email: null,
          role: "user",
          status: "active",
          createdAt: "2026-01-01T00:00:00.000Z",
        },
      });
    });

    it("requires a bearer token", async () => {
      expect(await call("GET", "/api/auth/profile")).toEqual({
        status: 401,
        body: { error: "Authentication required" },
      });
    });
  });

  describe("POST /api/messages/send", () => {
    it("persists for known recipients and reports the unknown ones", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/messages/send", {
        token: pair.accessToken,
        body: { title: "Hello", content: "Hi there", recipientIds: [bob.id, "missing-user"] },
      });

      expect(response).toEqual({
        status: 201,
        body: {
          id: expect.any(String),
          title: "Hello",
          content: "Hi there",
          senderId: alice.id,
          createdAt: "2026-01-01T00:00:00.000Z",
          recipientIds: [bob.id],
          skippedRecipientIds: ["missing-user"],
          state: "persisted_only",
        },
      });
    });

    it("rejects an empty recipient list", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/messages/send", {
        token: pair.accessToken,
        body: { content: "Hi", recipientIds: [] },
      });

      expect(response).toEqual({ status: 400, body: { error: "recipientIds: At least one recipient is required" } });
    });
  });

  describe("GET /api/messages", () => {
    it("pages the inbox newest first and filters by read state", async () => {
      const alicePair = await login("alice");
      await sendToBob("one", alicePair.accessToken);
      const second = await sendToBob("two", alicePair.accessToken);
      const bobPair = await login("bob");

      const response = await call("GET", "/api/messages?isRead=false&pageSize=1", { token: bobPair.accessToken });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        items: [{ messageId: second.id, content: "two", isRead: false, readAt: null }],
        total: 2,
        page: 1,
        pageSize: 1,
      });
      const read = await call("GET", "/api/messages?isRead=true", { token: bobPair.accessToken });
      expect(read.body).toMatchObject({ items: [], total: 0 });
    });

    it("clamps an oversized page and rejects an unknown read filter", async () => {
      const pair = await login("bob");

      const clamped = await call("GET", "/api/messages?pageSize=1000", { token: pair.accessToken });
      expect(clamped.body).toEqual({ items: [], total: 0, page: 1, pageSize: 100 });

      const invalid = await call("GET", "/api/messages?isRead=maybe", { token: pair.accessToken });
      expect(invalid.status).toBe(400);
      expect(invalid.body).toEqual({ error: expect.stringContaining("isRead") });
    });
  });

  describe("POST /api/messages/mark-read", () => {
    it("marks one message, then the rest", async () => {
      const alicePair = await login("alice");
      const first = await sendToBob("one", alicePair.accessToken);
      await sendToBob("two", alicePair.accessToken);
      await sendToBob("three", alicePair.accessToken);
      const bobPair = await login("bob");
      const markOne = { token: bobPair.accessToken, body: { messageId: first.id } };

      expect((await call("POST", "/api/messages/mark-read", markOne)).body).toEqual({ updatedCount: 1 });
      expect((await call("POST", "/api/messages/mark-read", markOne)).body).toEqual({ updatedCount: 0 });
      const all = await call("POST", "/api/messages/mark-read", { token: bobPair.accessToken, body: {} });
      expect(all).toEqual({ status: 200, body: { updatedCount: 2 } });
    });

    it("answers 404 for a message the caller did not receive", async () => {
      const pair = await login("bob");

      const response = await call("POST", "/api/messages/mark-read", {
        token: pair.accessToken,
        body: { messageId: "no-such-message" },
      });

      expect(response).toEqual({ status: 404, body: { error: "Message not found" } });
    });
  });

  describe("POST /api/messages/delete", () => {
    it("deletes by id and by kind", async () => {
      const alicePair = await login("alice");
      const first = await sendToBob("one", alicePair.accessToken);
      const second = await sendToBob("two", alicePair.accessToken);
      await sendToBob("three", alicePair.accessToken);
      const bobPair = await login("bob");
      const token = bobPair.accessToken;
      await call("POST", "/api/messages/mark-read", { token, body: { messageId: first.id } });

      expect(await call("POST", "/api/messages/delete", { token, body: { kind: "read" } })).toEqual({
        status: 200,
        body: { deletedCount: 1 },
      });
      expect(await call("POST", "/api/messages/delete", { token, body: { messageId: second.id } })).toEqual({
        status: 200,
        body: { deletedCount: 1 },
      });
      expect((await call("POST", "/api/messages/delete", { token, body: { messageId: second.id } })).status).toBe(404);
      expect(await call("POST", "/api/messages/delete", { token, body: { kind: "all" } })).toEqual({
        status: 200,
        body: { deletedCount: 1 },
      });
    });

    it("requires exactly one of messageId and kind", async () => {
      const pair = await login("bob");

      const response = await call("POST", "/api/messages/delete", {
        token: pair.accessToken,
        body: { messageId: "m1", kind: "all" },
      });

      expect(response).toEqual({ status: 400, body: { error: "Provide exactly one of messageId or kind" } });
    });
  });

  describe("POST /api/admin/tokens/sweep", () => {
    it("is refused to a non-admin", async () => {
      const pair = await login("alice");

      const response = await call("POST", "/api/admin/tokens/sweep", { token: pair.accessToken });

      expect(response).toEqual({ status: 403, body: { error: "Requires role: admin" } });
    });

    it("purges revocations of expired tokens", async () => {
      await createTestUser(storage, { username: "root", role: "admin", passwordHash: await hashPassword(PASSWORD) });
      const alicePair = await login("alice");
      await call("POST", "/api/auth/logout", { token: alicePair.accessToken });
      clock.advance(31 * MINUTE_MS);
      const adminPair = await login("root");

      const response = await call("POST", "/api/admin/tokens/sweep", { token: adminPair.accessToken });

      expect(response).toEqual({ status: 200, body: { purged: 1 } });
    });
  });

  describe("GET /api/health", () => {
    it("reports live connection counts without auth", async () => {
      expect(await call("GET", "/api/health")).toEqual({
        status: 200,
        body: { status: "ok", connections: 0, onlineUsers: 0 },
      });
    });
  });

  it("answers unknown API paths with a JSON 404", async () => {
    expect(await call("GET", "/api/nope")).toEqual({ status: 404, body: { error: "Not found" } });
  });
});
