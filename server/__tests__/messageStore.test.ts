import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { User } from "@shared/schema";
import { MemStorage } from "../storage";
import { NotFoundError } from "../utils/errorHandler";
import { ManualClock, MINUTE_MS, createTestUser } from "./helpers";

describe("MemStorage message store", () => {
  let clock: ManualClock;
  let storage: MemStorage;
  let sender: User;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    clock = new ManualClock();
    storage = new MemStorage(clock);
    sender = await createTestUser(storage, { username: "sender" });
    alice = await createTestUser(storage, { username: "alice" });
    bob = await createTestUser(storage, { username: "bob" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function sendTo(recipientIds: string[], content: string) {
    const result = await storage.createWithRecipients(sender.id, null, content, recipientIds);
    clock.advance(MINUTE_MS);
    return result.message;
  }

  describe("createWithRecipients", () => {
    it("creates one unread record per known recipient and skips the rest", async () => {
      const result = await storage.createWithRecipients(
        sender.id,
        "Standup",
        "Moved to 10:00",
        [alice.id, bob.id, "ghost", alice.id],
      );

      expect(result.deliveredTo).toEqual([alice.id, bob.id]);
      expect(result.skipped).toEqual(["ghost"]);
      expect(result.message).toMatchObject({ title: "Standup", content: "Moved to 10:00", senderId: sender.id });
      expect(console.warn).toHaveBeenCalledWith(
        `[MessageStore] Message ${result.message.id}: skipped unknown recipients ghost`,
      );

      for (const recipient of [alice, bob]) {
        const page = await storage.listForRecipient(recipient.id);
        expect(page.total).toBe(1);
        expect(page.items[0]).toMatchObject({ messageId: result.message.id, isRead: false, readAt: null });
      }
    });

    it("stores a message with no delivery records when every recipient is unknown", async () => {
      const result = await storage.createWithRecipients(sender.id, null, "hello", ["ghost-1", "ghost-2"]);

      expect(result.deliveredTo).toEqual([]);
      expect(result.skipped).toEqual(["ghost-1", "ghost-2"]);
    });
  });

  describe("listForRecipient", () => {
    it("never returns another recipient's records", async () => {
      await sendTo([alice.id], "for alice");
      await sendTo([bob.id], "for bob");
      await sendTo([alice.id, bob.id], "for both");

      const page = await storage.listForRecipient(alice.id);

      expect(page.items.map((item) => item.content)).toEqual(["for both", "for alice"]);
      expect(page.total).toBe(2);
    });

    it("pages newest first and filters by read state", async () => {
      const first = await sendTo([alice.id], "one");
      await sendTo([alice.id], "two");
      await sendTo([alice.id], "three");
      await storage.markRead(alice.id, first.id);

      const firstPage = await storage.listForRecipient(alice.id, { page: 1, pageSize: 2 });
      expect(firstPage).toMatchObject({ total: 3, page: 1, pageSize: 2 });
      expect(firstPage.items.map((item) => item.content)).toEqual(["three", "two"]);

      const secondPage = await storage.listForRecipient(alice.id, { page: 2, pageSize: 2 });
      expect(secondPage.items.map((item) => item.content)).toEqual(["one"]);

      const unread = await storage.listForRecipient(alice.id, { isRead: false });
      expect(unread.items.map((item) => item.content)).toEqual(["three", "two"]);

      const read = await storage.listForRecipient(alice.id, { isRead: true });
      expect(read.items.map((item) => item.content)).toEqual(["one"]);
    });

    it("clamps page and page size", async () => {
      await sendTo([alice.id], "one");

      expect(await storage.listForRecipient(alice.id, { page: 0, pageSize: 500 })).toMatchObject({ page: 1, pageSize: 100 });
      expect(await storage.listForRecipient(alice.id, { pageSize: 0 })).toMatchObject({ page: 1, pageSize: 1 });
      expect(await storage.listForRecipient(alice.id)).toMatchObject({ page: 1, pageSize: 20 });
    });
  });

  describe("listUnreadChronological", () => {
    it("returns unread items oldest first, up to the limit", async () => {
      await sendTo([alice.id], "one");
      const second = await sendTo([alice.id], "two");
      await sendTo([alice.id], "three");
      await sendTo([alice.id], "four");
      await storage.markRead(alice.id, second.id);

      const items = await storage.listUnreadChronological(alice.id, 2);

      expect(items.map((item) => item.content)).toEqual(["one", "three"]);
    });

    it("keeps creation order for messages with the same timestamp", async () => {
      await storage.createWithRecipients(sender.id, null, "first", [alice.id]);
      await storage.createWithRecipients(sender.id, null, "second", [alice.id]);
      await storage.createWithRecipients(sender.id, null, "third", [alice.id]);

      const items = await storage.listUnreadChronological(alice.id, 10);

      expect(items.map((item) => item.content)).toEqual(["first", "second", "third"]);
    });

    it("continues after a cursor, including ties on the timestamp", async () => {
      await storage.createWithRecipients(sender.id, null, "first", [alice.id]);
      await storage.createWithRecipients(sender.id, null, "second", [alice.id]);
      await storage.createWithRecipients(sender.id, null, "third", [alice.id]);

      const [head] = await storage.listUnreadChronological(alice.id, 1);
      const rest = await storage.listUnreadChronological(alice.id, 10, head);

      expect(head.content).toBe("first");
      expect(rest.map((item) => item.content)).toEqual(["second", "third"]);
    });
  });

  describe("markRead", () => {
    it("marks once and keeps the first read time", async () => {
      const message = await sendTo([alice.id], "one");

      expect(await storage.markRead(alice.id, message.id)).toBe(1);
      const readAt = (await storage.listForRecipient(alice.id)).items[0].readAt;
      clock.advance(MINUTE_MS);
      expect(await storage.markRead(alice.id, message.id)).toBe(0);

      const item = (await storage.listForRecipient(alice.id)).items[0];
      expect(item.isRead).toBe(true);
      expect(item.readAt).toEqual(readAt);
    });

    it("does not let one recipient mark another's record", async () => {
      const message = await sendTo([alice.id], "for alice");

      await expect(storage.markRead(bob.id, message.id)).rejects.toBeInstanceOf(NotFoundError);
      expect((await storage.listForRecipient(alice.id)).items[0].isRead).toBe(false);
    });

    it("fails for an unknown message", async () => {
      await expect(storage.markRead(alice.id, "missing")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("markAllRead", () => {
    it("updates the unread records the first time and nothing the second", async () => {
      await sendTo([alice.id], "one");
      await sendTo([alice.id, bob.id], "two");

      expect(await storage.markAllRead(alice.id)).toBe(2);
      expect(await storage.markAllRead(alice.id)).toBe(0);

      const page = await storage.listForRecipient(alice.id);
      expect(page.items.every((item) => item.isRead && item.readAt !== null)).toBe(true);
      expect((await storage.listForRecipient(bob.id, { isRead: false })).total).toBe(1);
    });
  });

  describe("delete", () => {
    it("removes only the caller's record", async () => {
      const message = await sendTo([alice.id, bob.id], "shared");

      await storage.delete(alice.id, message.id);

      expect((await storage.listForRecipient(alice.id)).total).toBe(0);
      expect((await storage.listForRecipient(bob.id)).total).toBe(1);
      await expect(storage.delete(alice.id, message.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("does not let one recipient delete another's record", async () => {
      const message = await sendTo([alice.id], "for alice");

      await expect(storage.delete(bob.id, message.id)).rejects.toBeInstanceOf(NotFoundError);
      expect((await storage.listForRecipient(alice.id)).total).toBe(1);
    });
  });

  describe("deleteByType", () => {
    beforeEach(async () => {
      const read = await sendTo([alice.id, bob.id], "read");
      await sendTo([alice.id, bob.id], "unread-1");
      await sendTo([alice.id], "unread-2");
      await storage.markRead(alice.id, read.id);
    });

    it("deletes read records", async () => {
      expect(await storage.deleteByType(alice.id, "read")).toBe(1);
      expect((await storage.listForRecipient(alice.id)).items.map((item) => item.content)).toEqual(["unread-2", "unread-1"]);
    });

    it("deletes unread records", async () => {
      expect(await storage.deleteByType(alice.id, "unread")).toBe(2);
      expect((await storage.listForRecipient(alice.id)).items.map((item) => item.content)).toEqual(["read"]);
    });

    it("deletes everything for the recipient only", async () => {
      expect(await storage.deleteByType(alice.id, "all")).toBe(3);
      expect((await storage.listForRecipient(alice.id)).total).toBe(0);
      expect((await storage.listForRecipient(bob.id)).total).toBe(2);
    });
  });
});
