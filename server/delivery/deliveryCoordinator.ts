/**
 * Delivery Coordinator
 *
 * Purpose:
 * Keeps persisted notifications and live pushes consistent.
 *
 * Send path: Created -> Persisted -> Pushed | PersistedOnly. Persistence is
 * the durability guarantee; pushing is best effort on top of it, and a
 * failed push leaves the record unread for the next connect or list.
 *
 * Connect path: register, replay every unread item oldest first (one page
 * at a time, waiting for each page to be written), then release live frames
 * held during the replay.
 *
 * Delivery is at-least-once. Within one connection a message id is written
 * at most once; across reconnects the same unread item can arrive again, so
 * clients deduplicate by messageId.
 *
 * Layer: Service
 */

import type { Message } from "@shared/schema";
import { DELIVERY_CONSTANTS } from "../config/constants";
import type { BacklogCursor, CreateMessageResult, IMessageStore } from "../storage";
import type { SessionEvent } from "../auth/tokenManager";
import { logError } from "../utils/errorHandler";
import { toPushFrame, type PushChannel } from "./channel";
import type { Connection, ConnectionRegistry } from "./connectionRegistry";

export type SendState = "pushed" | "persisted_only";

export interface SendInput {
  title: string | null;
  content: string;
  recipientIds: string[];
}

export interface SendResult extends CreateMessageResult {
  state: SendState;
  pushedChannels: number;
}

export interface ConnectResult {
  connection: Connection;
  replayed: number;
}

export interface DeliveryCoordinatorOptions {
  replayPageSize?: number;
}

function messageSource(message: Message) {
  return {
    messageId: message.id,
    title: message.title,
    content: message.content,
    senderId: message.senderId,
    createdAt: message.createdAt,
  };
}

export class DeliveryCoordinator {
  private readonly replayPageSize: number;

  constructor(
    private readonly store: IMessageStore,
    private readonly registry: ConnectionRegistry,
    options: DeliveryCoordinatorOptions = {},
  ) {
    this.replayPageSize = options.replayPageSize ?? DELIVERY_CONSTANTS.REPLAY_PAGE_SIZE;
  }

  async send(senderId: string, input: SendInput): Promise<SendResult> {
    const result = await this.store.createWithRecipients(
      senderId,
      input.title,
      input.content,
      input.recipientIds,
    );

    const frame = toPushFrame(messageSource(result.message), false);
    let pushedChannels = 0;
    for (const recipientId of result.deliveredTo) {
      if (!this.registry.isOnline(recipientId)) continue;
      pushedChannels += this.registry.forEachChannel(recipientId, (channel) => channel.push(frame));
    }

    const state: SendState = pushedChannels > 0 ? "pushed" : "persisted_only";
    console.log(
      `[Delivery] Message ${result.message.id} from ${senderId}: ${result.deliveredTo.length} recipient(s), ` +
      `${pushedChannels} live channel(s)`,
    );
    return { ...result, state, pushedChannels };
  }

  async onConnect(identityId: string, channel: PushChannel): Promise<ConnectResult> {
    const connection = this.registry.register(identityId, channel);
    let replayed = 0;
    try {
      replayed = await this.replayBacklog(identityId, channel);
      if (replayed > 0) {
        console.log(`[Delivery] Replayed ${replayed} unread message(s) to user ${identityId}`);
      }
    } catch (error) {
      logError("Delivery", error);
      channel.sendControl({ type: "error", message: "Failed to load unread messages" });
    } finally {
      channel.endReplay();
    }
    return { connection, replayed };
  }

  onDisconnect(connectionId: string): void {
    this.registry.unregister(connectionId);
  }

  /**
   * Re-sends unread items this connection has not been sent yet.
   */
  refreshBacklog(connection: Connection): Promise<number> {
    return this.replayBacklog(connection.identityId, connection.channel);
  }

  /**
   * Closes every live channel of the identity.
   */
  evict(identityId: string, reason: string): number {
    return this.registry.evictAll(identityId, reason);
  }

  /**
   * Closes live channels affected by a revocation or a detected replay.
   */
  handleSessionEvent(event: SessionEvent): number {
    if (event.type === "replay") {
      return this.evict(event.subject, "Session revoked");
    }
    if (event.kind === "access") {
      return this.registry.evictByCredential(event.subject, event.jti, "Token revoked");
    }
    return 0;
  }

  private async replayBacklog(identityId: string, channel: PushChannel): Promise<number> {
    let written = 0;
    let after: BacklogCursor | undefined;
    while (channel.isOpen) {
      const page = await this.store.listUnreadChronological(identityId, this.replayPageSize, after);
      const pending = page.filter((item) => !channel.hasSent(item.messageId));
      written += channel.replay(pending.map((item) => toPushFrame(item, true)));
      const last = page.at(-1);
      if (!last || page.length < this.replayPageSize) break;
      after = { createdAt: last.createdAt, messageId: last.messageId };
      // Keep the writer queue under its cap
      await channel.flushed();
    }
    return written;
  }
}
