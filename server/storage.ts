import {
  type User,
  type InsertUser,
  type RevokedToken,
  type RevocationReason,
  type Message,
  type DeliveryRecord,
  type DeleteKind,
  type InboxItem,
  type InboxPage,
  users as usersTable,
  revokedTokens as revokedTokensTable,
  messages as messagesTable,
  messageRecipients as messageRecipientsTable,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { and, asc, count, desc, eq, gt, inArray, lt, or, type SQL } from "drizzle-orm";
import type { Database } from "./db";
import { PAGINATION_CONSTANTS, TIMEOUT_CONSTANTS } from "./config/constants";
import { systemClock, type Clock } from "./utils/clock";
import { withTimeout } from "./utils/timeout";
import {
  NotFoundError,
  TransientStoreError,
  ValidationError,
} from "./utils/errorHandler";

export interface RevocationInput {
  jti: string;
  subject: string;
  reason: RevocationReason;
  expiresAt: Date;
}

/**
 * Persistence consumed by the token lifecycle manager: user records (read side)
 * and the revocation set.
 */
export interface ICredentialStore {
  getUser(id: string): Promise<User | undefined>;
  getUserByLoginIdentifier(identifier: string): Promise<User | undefined>;
  createUser(user: InsertUser): Promise<User>;

  /**
   * Atomically inserts the entry if its jti is absent.
   * @returns true if this call inserted it, false if it was already revoked
   */
  revokeToken(entry: RevocationInput): Promise<boolean>;
  isTokenRevoked(jti: string): Promise<boolean>;
  purgeExpiredRevocations(now: Date): Promise<number>;
}

export interface CreateMessageResult {
  message: Message;
  deliveredTo: string[];
  skipped: string[];
}

export interface ListMessagesOptions {
  page?: number;
  pageSize?: number;
  isRead?: boolean;
}

/**
 * Messages and their per-recipient delivery records. Every recipient-scoped
 * operation filters on recipient id.
 */
export interface IMessageStore {
  createWithRecipients(
    senderId: string,
    title: string | null,
    content: string,
    recipientIds: string[],
  ): Promise<CreateMessageResult>;
  listForRecipient(recipientId: string, options?: ListMessagesOptions): Promise<InboxPage>;
  /** Unread items, oldest first. */
  /**
   * Unread items oldest first. Pass the last item of the previous page as
   * `after` to read the next one.
   */
  listUnreadChronological(recipientId: string, limit: number, after?: BacklogCursor): Promise<InboxItem[]>;
  markRead(recipientId: string, messageId: string): Promise<number>;
  markAllRead(recipientId: string): Promise<number>;
  delete(recipientId: string, messageId: string): Promise<void>;
  deleteByType(recipientId: string, kind: DeleteKind): Promise<number>;
}

export interface BacklogCursor {
  createdAt: Date;
  messageId: string;
}

export interface IStorage extends ICredentialStore, IMessageStore {}

export function normalizePagination(options: ListMessagesOptions = {}): { page: number; pageSize: number } {
  const page = Math.max(1, Math.floor(options.page ?? 1));
  const requested = Math.floor(options.pageSize ?? PAGINATION_CONSTANTS.DEFAULT_PAGE_SIZE);
  const pageSize = Math.min(PAGINATION_CONSTANTS.MAX_PAGE_SIZE, Math.max(1, requested));
  return { page, pageSize };
}

function assertDeleteKind(kind: string): asserts kind is DeleteKind {
  if (kind !== "read" && kind !== "unread" && kind !== "all") {
    throw new ValidationError("kind must be one of read, unread, all");
  }
}

function logSkippedRecipients(messageId: string, skipped: string[]): void {
  if (skipped.length > 0) {
    console.warn(`[MessageStore] Message ${messageId}: skipped unknown recipients ${skipped.join(", ")}`);
  }
}

export class MemStorage implements IStorage {
  private users: Map<string, User>;
  private revocations: Map<string, RevokedToken>;
  private messages: Map<string, Message>;
  private records: DeliveryRecord[];
  // Insertion order, used to break createdAt ties
  private messageSeq: Map<string, number>;
  private nextSeq = 0;

  constructor(private readonly clock: Clock = systemClock) {
    this.users = new Map();
    this.revocations = new Map();
    this.messages = new Map();
    this.records = [];
    this.messageSeq = new Map();
  }

  // Users

  async getUser(id: string): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByLoginIdentifier(identifier: string): Promise<User | undefined> {
    const needle = identifier.trim().toLowerCase();
    return Array.from(this.users.values()).find(
      (user) => user.username.toLowerCase() === needle || user.email?.toLowerCase() === needle,
    );
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    const existing = await this.getUserByLoginIdentifier(insertUser.username);
    if (existing) {
      throw new ValidationError(`Username ${insertUser.username} is taken`);
    }
    const now = this.clock.now();
    const user: User = {
      id: randomUUID(),
      username: insertUser.username,
      email: insertUser.email ?? null,
      passwordHash: insertUser.passwordHash,
      role: insertUser.role ?? "user",
      status: insertUser.status ?? "active",
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return user;
  }

  /** Test and seeding helper; user management owns status changes in production. */
  async setUserStatus(id: string, status: User["status"]): Promise<void> {
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError("User");
    }
    this.users.set(id, { ...user, status, updatedAt: this.clock.now() });
  }

  // Revocations

  async revokeToken(entry: RevocationInput): Promise<boolean> {
    // Check and insert happen in one synchronous step
    if (this.revocations.has(entry.jti)) {
      return false;
    }
    this.revocations.set(entry.jti, { ...entry, revokedAt: this.clock.now() });
    return true;
  }

  async isTokenRevoked(jti: string): Promise<boolean> {
    return this.revocations.has(jti);
  }

  async purgeExpiredRevocations(now: Date): Promise<number> {
    let purged = 0;
    this.revocations.forEach((entry, jti) => {
      if (entry.expiresAt.getTime() < now.getTime()) {
        this.revocations.delete(jti);
        purged++;
      }
    });
    return purged;
  }

  // Messages

  async createWithRecipients(
    senderId: string,
    title: string | null,
    content: string,
    recipientIds: string[],
  ): Promise<CreateMessageResult> {
    const unique = Array.from(new Set(recipientIds));
    const deliveredTo = unique.filter((id) => this.users.has(id));
    const skipped = unique.filter((id) => !this.users.has(id));

    // Everything is built before anything is stored, so a throw leaves no partial fan-out
    const createdAt = this.clock.now();
    const message: Message = { id: randomUUID(), title, content, senderId, createdAt };
    const newRecords: DeliveryRecord[] = deliveredTo.map((recipientId) => ({
      id: randomUUID(),
      messageId: message.id,
      recipientId,
      isRead: false,
      readAt: null,
      createdAt,
    }));

    this.messages.set(message.id, message);
    this.messageSeq.set(message.id, this.nextSeq++);
    this.records.push(...newRecords);

    logSkippedRecipients(message.id, skipped);
    return { message, deliveredTo, skipped };
  }

  async listForRecipient(recipientId: string, options: ListMessagesOptions = {}): Promise<InboxPage> {
    const { page, pageSize } = normalizePagination(options);
    const matching = this.inboxFor(recipientId)
      .filter((item) => options.isRead === undefined || item.isRead === options.isRead)
      .sort((a, b) => this.compareChronological(b, a));
    const start = (page - 1) * pageSize;
    return {
      items: matching.slice(start, start + pageSize),
      total: matching.length,
      page,
      pageSize,
    };
  }

  async listUnreadChronological(recipientId: string, limit: number, after?: BacklogCursor): Promise<InboxItem[]> {
    return this.inboxFor(recipientId)
      .filter((item) => !item.isRead && (!after || this.compareChronological(item, after) > 0))
      .sort((a, b) => this.compareChronological(a, b))
      .slice(0, limit);
  }

  async markRead(recipientId: string, messageId: string): Promise<number> {
    const record = this.findRecord(recipientId, messageId);
    if (!record) {
      throw new NotFoundError("Message");
    }
    if (record.isRead) {
      return 0;
    }
    record.isRead = true;
    record.readAt = this.clock.now();
    return 1;
  }

  async markAllRead(recipientId: string): Promise<number> {
    const now = this.clock.now();
    let updated = 0;
    for (const record of this.records) {
      if (record.recipientId === recipientId && !record.isRead) {
        record.isRead = true;
        record.readAt = now;
        updated++;
      }
    }
    return updated;
  }

  async delete(recipientId: string, messageId: string): Promise<void> {
    const index = this.records.findIndex(
      (record) => record.recipientId === recipientId && record.messageId === messageId,
    );
    if (index === -1) {
      throw new NotFoundError("Message");
    }
    this.records.splice(index, 1);
  }

  async deleteByType(recipientId: string, kind: DeleteKind): Promise<number> {
    assertDeleteKind(kind);
    const before = this.records.length;
    this.records = this.records.filter((record) => {
      if (record.recipientId !== recipientId) return true;
      if (kind === "read") return !record.isRead;
      if (kind === "unread") return record.isRead;
      return false;
    });
    return before - this.records.length;
  }

  private findRecord(recipientId: string, messageId: string): DeliveryRecord | undefined {
    return this.records.find(
      (record) => record.recipientId === recipientId && record.messageId === messageId,
    );
  }

  private inboxFor(recipientId: string): InboxItem[] {
    const items: InboxItem[] = [];
    for (const record of this.records) {
      if (record.recipientId !== recipientId) continue;
      const message = this.messages.get(record.messageId);
      if (!message) continue;
      items.push({
        messageId: message.id,
        title: message.title,
        content: message.content,
        senderId: message.senderId,
        createdAt: message.createdAt,
        isRead: record.isRead,
        readAt: record.readAt,
      });
    }
    return items;
  }

  private compareChronological(a: BacklogCursor, b: BacklogCursor): number {
    const byTime = a.createdAt.getTime() - b.createdAt.getTime();
    if (byTime !== 0) return byTime;
    return (this.messageSeq.get(a.messageId) ?? 0) - (this.messageSeq.get(b.messageId) ?? 0);
  }
}

const inboxColumns = {
  messageId: messagesTable.id,
  title: messagesTable.title,
  content: messagesTable.content,
  senderId: messagesTable.senderId,
  createdAt: messagesTable.createdAt,
  isRead: messageRecipientsTable.isRead,
  readAt: messageRecipientsTable.readAt,
};

export class DbStorage implements IStorage {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  // Users

  async getUser(id: string): Promise<User | undefined> {
    return this.run("getUser", async () => {
      const results = await this.db.select().from(usersTable).where(eq(usersTable.id, id)).limit(1);
      return results[0];
    });
  }

  async getUserByLoginIdentifier(identifier: string): Promise<User | undefined> {
    return this.run("getUserByLoginIdentifier", async () => {
      const needle = identifier.trim();
      const results = await this.db
        .select()
        .from(usersTable)
        .where(or(eq(usersTable.username, needle), eq(usersTable.email, needle)))
        .limit(1);
      return results[0];
    });
  }

  async createUser(insertUser: InsertUser): Promise<User> {
    return this.run("createUser", async () => {
      const results = await this.db.insert(usersTable).values(insertUser).returning();
      return results[0];
    });
  }

  // Revocations

  async revokeToken(entry: RevocationInput): Promise<boolean> {
    return this.run("revokeToken", async () => {
      // INSERT ... ON CONFLICT DO NOTHING: a returned row means this call won
      const inserted = await this.db
        .insert(revokedTokensTable)
        .values({ ...entry, revokedAt: this.clock.now() })
        .onConflictDoNothing({ target: revokedTokensTable.jti })
        .returning({ jti: revokedTokensTable.jti });
      return inserted.length > 0;
    });
  }

  async isTokenRevoked(jti: string): Promise<boolean> {
    return this.run("isTokenRevoked", async () => {
      const results = await this.db
        .select({ jti: revokedTokensTable.jti })
        .from(revokedTokensTable)
        .where(eq(revokedTokensTable.jti, jti))
        .limit(1);
      return results.length > 0;
    });
  }

  async purgeExpiredRevocations(now: Date): Promise<number> {
    return this.run("purgeExpiredRevocations", async () => {
      const deleted = await this.db
        .delete(revokedTokensTable)
        .where(lt(revokedTokensTable.expiresAt, now))
        .returning({ jti: revokedTokensTable.jti });
      return deleted.length;
    });
  }

  // Messages

  async createWithRecipients(
    senderId: string,
    title: string | null,
    content: string,
    recipientIds: string[],
  ): Promise<CreateMessageResult> {
    const result = await this.run("createWithRecipients", () =>
      this.db.transaction(async (tx) => {
        const unique = Array.from(new Set(recipientIds));
        const known = unique.length > 0
          ? await tx.select({ id: usersTable.id }).from(usersTable).where(inArray(usersTable.id, unique))
          : [];
        const knownIds = new Set(known.map((row) => row.id));
        const deliveredTo = unique.filter((id) => knownIds.has(id));
        const skipped = unique.filter((id) => !knownIds.has(id));

        const inserted = await tx
          .insert(messagesTable)
          .values({ title, content, senderId, createdAt: this.clock.now() })
          .returning();
        const message = inserted[0];

        if (deliveredTo.length > 0) {
          await tx.insert(messageRecipientsTable).values(
            deliveredTo.map((recipientId) => ({
              messageId: message.id,
              recipientId,
              createdAt: message.createdAt,
            })),
          );
        }
        return { message, deliveredTo, skipped };
      }),
    );
    logSkippedRecipients(result.message.id, result.skipped);
    return result;
  }

  async listForRecipient(recipientId: string, options: ListMessagesOptions = {}): Promise<InboxPage> {
    const { page, pageSize } = normalizePagination(options);
    return this.run("listForRecipient", async () => {
      const conditions: SQL[] = [eq(messageRecipientsTable.recipientId, recipientId)];
      if (options.isRead !== undefined) {
        conditions.push(eq(messageRecipientsTable.isRead, options.isRead));
      }
      const where = and(...conditions);

      const items = await this.db
        .select(inboxColumns)
        .from(messageRecipientsTable)
        .innerJoin(messagesTable, eq(messageRecipientsTable.messageId, messagesTable.id))
        .where(where)
        .orderBy(desc(messagesTable.createdAt), desc(messagesTable.id))
        .limit(pageSize)
        .offset((page - 1) * pageSize);

      const totals = await this.db
        .select({ total: count() })
        .from(messageRecipientsTable)
        .where(where);

      return { items, total: totals[0]?.total ?? 0, page, pageSize };
    });
  }

  async listUnreadChronological(recipientId: string, limit: number, after?: BacklogCursor): Promise<InboxItem[]> {
    const afterCursor = after
      ? or(
          gt(messagesTable.createdAt, after.createdAt),
          and(eq(messagesTable.createdAt, after.createdAt), gt(messagesTable.id, after.messageId)),
        )
      : undefined;
    return this.run("listUnreadChronological", async () =>
      this.db
        .select(inboxColumns)
        .from(messageRecipientsTable)
        .innerJoin(messagesTable, eq(messageRecipientsTable.messageId, messagesTable.id))
        .where(
          and(
            eq(messageRecipientsTable.recipientId, recipientId),
            eq(messageRecipientsTable.isRead, false),
            afterCursor,
          ),
        )
        .orderBy(asc(messagesTable.createdAt), asc(messagesTable.id))
        .limit(limit),
    );
  }

  async markRead(recipientId: string, messageId: string): Promise<number> {
    return this.run("markRead", async () => {
      const ownRecord = and(
        eq(messageRecipientsTable.recipientId, recipientId),
        eq(messageRecipientsTable.messageId, messageId),
      );
      const updated = await this.db
        .update(messageRecipientsTable)
        .set({ isRead: true, readAt: this.clock.now() })
        .where(and(ownRecord, eq(messageRecipientsTable.isRead, false)))
        .returning({ id: messageRecipientsTable.id });
      if (updated.length > 0) {
        return updated.length;
      }

      const existing = await this.db
        .select({ id: messageRecipientsTable.id })
        .from(messageRecipientsTable)
        .where(ownRecord)
        .limit(1);
      if (existing.length === 0) {
        throw new NotFoundError("Message");
      }
      return 0;
    });
  }

  async markAllRead(recipientId: string): Promise<number> {
    return this.run("markAllRead", async () => {
      const updated = await this.db
        .update(messageRecipientsTable)
        .set({ isRead: true, readAt: this.clock.now() })
        .where(
          and(
            eq(messageRecipientsTable.recipientId, recipientId),
            eq(messageRecipientsTable.isRead, false),
          ),
        )
        .returning({ id: messageRecipientsTable.id });
      return updated.length;
    });
  }

  async delete(recipientId: string, messageId: string): Promise<void> {
    await this.run("delete", async () => {
      const deleted = await this.db
        .delete(messageRecipientsTable)
        .where(
          and(
            eq(messageRecipientsTable.recipientId, recipientId),
            eq(messageRecipientsTable.messageId, messageId),
          ),
        )
        .returning({ id: messageRecipientsTable.id });
      if (deleted.length === 0) {
        throw new NotFoundError("Message");
      }
    });
  }

  async deleteByType(recipientId: string, kind: DeleteKind): Promise<number> {
    assertDeleteKind(kind);
    return this.run("deleteByType", async () => {
      const conditions: SQL[] = [eq(messageRecipientsTable.recipientId, recipientId)];
      if (kind === "read") conditions.push(eq(messageRecipientsTable.isRead, true));
      if (kind === "unread") conditions.push(eq(messageRecipientsTable.isRead, false));
      const deleted = await this.db
        .delete(messageRecipientsTable)
        .where(and(...conditions))
        .returning({ id: messageRecipientsTable.id });
      return deleted.length;
    });
  }

  /**
   * Applies the store deadline and turns driver failures into TransientStoreError.
   * Domain errors thrown inside the task pass through untouched.
   */
  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(task(), TIMEOUT_CONSTANTS.STORE_OPERATION_TIMEOUT_MS, operation);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof ValidationError) {
        throw error;
      }
      console.error(`[Storage] ${operation} failed:`, error);
      throw new TransientStoreError(operation, error);
    }
  }
}

export function createStorage(db: Database | undefined, clock: Clock = systemClock): IStorage {
  if (db) {
    return new DbStorage(db, clock);
  }
  console.warn("[Storage] DATABASE_URL not set, using in-memory storage (data is lost on restart)");
  return new MemStorage(clock);
}
