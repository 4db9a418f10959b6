import type { User } from "@shared/schema";
import type { Clock } from "../utils/clock";
import type { MemStorage } from "../storage";
import type { ChannelTransport, ServerFrame, PushFrame } from "../delivery/channel";
import type { TokenManagerConfig } from "../auth/tokenManager";

export const TEST_TOKEN_CONFIG: TokenManagerConfig = {
  secret: "test-secret-test-secret-test-secret",
  issuer: "test-issuer",
  audience: "test-clients",
  accessTtlMinutes: 30,
  refreshTtlMinutes: 60,
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = new Date("2026-01-01T00:00:00Z")) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const MINUTE_MS = 60 * 1000;

/**
 * In-memory transport. Writes complete immediately unless `hold()` was called,
 * in which case they wait for `release()`.
 */
export class FakeTransport implements ChannelTransport {
  readonly sent: string[] = [];
  closedWith: { code: number; reason: string } | undefined;
  failWrites = false;
  private open = true;
  private gate: Promise<void> | undefined;
  private openGate: (() => void) | undefined;

  get isOpen(): boolean {
    return this.open;
  }

  async send(data: string): Promise<void> {
    if (this.gate) {
      await this.gate;
    }
    if (this.failWrites) {
      throw new Error("socket write failed");
    }
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  /** Simulates the peer going away without the server closing. */
  drop(): void {
    this.open = false;
  }

  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = undefined;
    this.openGate = undefined;
  }

  frames(): ServerFrame[] {
    return this.sent.map((data): ServerFrame => JSON.parse(data));
  }

  messageFrames(): PushFrame[] {
    return this.frames().filter((frame): frame is PushFrame => frame.type === "message");
  }
}

let userSeq = 0;

export async function createTestUser(
  storage: MemStorage,
  overrides: Partial<Pick<User, "username" | "email" | "role" | "status" | "passwordHash">> = {},
): Promise<User> {
  userSeq++;
  return storage.createUser({
    username: overrides.username ?? `user${userSeq}`,
    email: overrides.email ?? null,
    passwordHash: overrides.passwordHash ?? "scrypt$placeholder$placeholder",
    role: overrides.role ?? "user",
    status: overrides.status ?? "active",
  });
}
