import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  boolean,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const USER_ROLES = ["admin", "user"] as const;
export type UserRole = typeof USER_ROLES[number];

export const USER_STATUSES = ["active", "inactive", "suspended"] as const;
export type UserStatus = typeof USER_STATUSES[number];

export const REVOCATION_REASONS = ["rotated", "logout"] as const;
export type RevocationReason = typeof REVOCATION_REASONS[number];

export const DELETE_KINDS = ["read", "unread", "all"] as const;
export type DeleteKind = typeof DELETE_KINDS[number];

export const MESSAGE_TITLE_MAX_LENGTH = 100;

// Owned by user management; the notification core only reads it
export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  username: varchar("username").notNull().unique(),
  email: varchar("email").unique(),
  passwordHash: text("password_hash").notNull(),
  role: text("role", { enum: USER_ROLES }).default("user").notNull(),
  status: text("status", { enum: USER_STATUSES }).default("active").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// One row per revoked token id. Rows may be purged once expires_at has passed.
export const revokedTokens = pgTable(
  "revoked_tokens",
  {
    jti: varchar("jti").primaryKey(),
    subject: varchar("subject").notNull(),
    reason: text("reason", { enum: REVOCATION_REASONS }).notNull(),
    expiresAt: timestamp("expires_at").notNull(),
    revokedAt: timestamp("revoked_at").defaultNow().notNull(),
  },
  (table) => [index("IDX_revoked_tokens_expires_at").on(table.expiresAt)],
);

export const messages = pgTable(
  "messages",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    title: varchar("title", { length: MESSAGE_TITLE_MAX_LENGTH }),
    content: text("content").notNull(),
    senderId: varchar("sender_id").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    index("IDX_messages_sender_id").on(table.senderId),
    index("IDX_messages_created_at").on(table.createdAt),
  ],
);

export const messageRecipients = pgTable(
  "message_recipients",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    messageId: varchar("message_id")
      .notNull()
      .references(() => messages.id),
    recipientId: varchar("recipient_id").notNull(),
    isRead: boolean("is_read").default(false).notNull(),
    readAt: timestamp("read_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("UQ_message_recipients_message_recipient").on(table.messageId, table.recipientId),
    index("IDX_message_recipients_recipient_read").on(table.recipientId, table.isRead),
  ],
);

export const insertUserSchema = createInsertSchema(users).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const sendMessageSchema = createInsertSchema(messages)
  .pick({ title: true, content: true })
  .extend({
    title: z.string().max(MESSAGE_TITLE_MAX_LENGTH).nullable().optional(),
    content: z.string().min(1, "Content is required"),
    recipientIds: z
      .array(z.coerce.string().min(1))
      .min(1, "At least one recipient is required"),
  });

export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;
export type RevokedToken = typeof revokedTokens.$inferSelect;
export type Message = typeof messages.$inferSelect;
export type DeliveryRecord = typeof messageRecipients.$inferSelect;
export type SendMessageInput = z.infer<typeof sendMessageSchema>;

/**
 * A delivery record joined with the message it points at, as seen by its recipient.
 */
export interface InboxItem {
  messageId: string;
  title: string | null;
  content: string;
  senderId: string;
  createdAt: Date;
  isRead: boolean;
  readAt: Date | null;
}

export interface InboxPage {
  items: InboxItem[];
  total: number;
  page: number;
  pageSize: number;
}
