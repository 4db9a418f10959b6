/**
 * Push Channel
 *
 * One per live connection. Frames are written by a single writer loop so
 * concurrent pushes to the same connection never interleave. While the
 * channel is replaying its backlog, live pushes are held and flushed after it.
 * Message ids already written on this connection are not written again.
 */

import { randomUUID } from "crypto";
import { DELIVERY_CONSTANTS } from "../config/constants";
import { getErrorMessage, logError } from "../utils/errorHandler";

export interface PushFrame {
  type: "message";
  replay: boolean;
  messageId: string;
  title: string | null;
  content: string;
  senderId: string;
  createdAt: string;
}

export type ControlFrame =
  | { type: "pong"; timestamp: string }
  | { type: "error"; message: string };

export type ServerFrame = PushFrame | ControlFrame;

export interface PushSource {
  messageId: string;
  title: string | null;
  content: string;
  senderId: string;
  createdAt: Date;
}

export function toPushFrame(source: PushSource, replay: boolean): PushFrame {
  return {
    type: "message",
    replay,
    messageId: source.messageId,
    title: source.title,
    content: source.content,
    senderId: source.senderId,
    createdAt: source.createdAt.toISOString(),
  };
}

/**
 * The byte pipe under a channel. Implemented over a WebSocket by the gateway.
 */
export interface ChannelTransport {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}

type CloseHandler = (code: number, reason: string) => void;

export class PushChannel {
  readonly id = randomUUID();
  private queue: string[] = [];
  private writing = false;
  private closed = false;
  private replaying = true;
  private held: PushFrame[] = [];
  private readonly sentMessageIds = new Set<string>();
  private readonly closeHandlers = new Set<CloseHandler>();
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly transport: ChannelTransport,
    readonly identityId: string,
    /** jti of the access token this channel authenticated with */
    readonly credentialJti: string,
  ) {}

  get isOpen(): boolean {
    return !this.closed && this.transport.isOpen;
  }

  /**
   * Live push. Returns false if the channel can no longer accept frames.
   */
  push(frame: PushFrame): boolean {
    if (!this.isOpen) {
      return false;
    }
    if (this.replaying) {
      this.held.push(frame);
      return true;
    }
    return this.deliver(frame);
  }

  /**
   * Writes backlog frames in the order given.
   */
  replay(frames: PushFrame[]): number {
    let written = 0;
    for (const frame of frames) {
      if (!this.isOpen) break;
      if (this.deliver(frame)) written++;
    }
    return written;
  }

  /**
   * Ends the replay phase and writes live frames held during it, oldest first.
   */
  endReplay(): void {
    if (!this.replaying) return;
    this.replaying = false;
    const held = this.held.sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
    this.held = [];
    held.forEach((frame) => this.deliver(frame));
  }

  hasSent(messageId: string): boolean {
    return this.sentMessageIds.has(messageId);
  }

  sendControl(frame: ControlFrame): boolean {
    return this.enqueue(JSON.stringify(frame));
  }

  onClose(handler: CloseHandler): void {
    this.closeHandlers.add(handler);
  }

  /**
   * Resolves once everything queued so far has been written, or the channel closed.
   */
  flushed(): Promise<void> {
    if (!this.writing && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  close(code: number, reason: string): void {
    if (this.markClosed(code, reason)) {
      this.transport.close(code, reason);
    }
  }

  /** The peer or the network closed the transport. */
  handleTransportClosed(code: number, reason: string): void {
    this.markClosed(code, reason);
  }

  private deliver(frame: PushFrame): boolean {
    if (this.sentMessageIds.has(frame.messageId)) {
      return true;
    }
    const accepted = this.enqueue(JSON.stringify(frame));
    if (accepted) {
      this.sentMessageIds.add(frame.messageId);
    }
    return accepted;
  }

  private enqueue(data: string): boolean {
    if (!this.isOpen) {
      return false;
    }
    if (this.queue.length >= DELIVERY_CONSTANTS.MAX_QUEUED_FRAMES) {
      console.warn(`[Channel] ${this.id} for user ${this.identityId} stalled, closing`);
      this.close(1013, "Send queue full");
      return false;
    }
    this.queue.push(data);
    if (!this.writing) {
      this.drain().catch((error) => logError("Channel", error));
    }
    return true;
  }

  private async drain(): Promise<void> {
    this.writing = true;
    try {
      while (this.isOpen) {
        const data = this.queue.shift();
        if (data === undefined) break;
        await this.transport.send(data);
      }
    } catch (error) {
      console.warn(`[Channel] Write failed on ${this.id} for user ${this.identityId}: ${getErrorMessage(error)}`);
      this.close(1011, "Write failed");
    } finally {
      this.writing = false;
      this.notifyIdle();
    }
  }

  private markClosed(code: number, reason: string): boolean {
    if (this.closed) {
      return false;
    }
    this.closed = true;
    this.queue = [];
    this.held = [];
    this.closeHandlers.forEach((handler) => handler(code, reason));
    this.closeHandlers.clear();
    if (!this.writing) {
      this.notifyIdle();
    }
    return true;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
