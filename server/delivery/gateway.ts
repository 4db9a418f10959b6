/**
 * WebSocket Gateway
 *
 * Push channel endpoint at /ws/messages. Authenticates during the HTTP
 * upgrade (bearer header, or `?token=` for browsers that cannot set
 * headers); a socket that fails or does not finish authentication within the
 * handshake window is refused before a WebSocket exists, so nothing is
 * registered for it.
 */

import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import { authenticateAccessToken, extractBearerToken, type AuthenticatedUser } from "../auth/authenticate";
import type { TokenLifecycleManager } from "../auth/tokenManager";
import { DELIVERY_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import type { ICredentialStore } from "../storage";
import {
  AuthenticationError,
  CredentialError,
  TransientStoreError,
  getErrorMessage,
  logError,
} from "../utils/errorHandler";
import { TimeoutError, withTimeout } from "../utils/timeout";
import { PushChannel, type ChannelTransport } from "./channel";
import type { Connection } from "./connectionRegistry";
import type { DeliveryCoordinator } from "./deliveryCoordinator";

const MAX_CLIENT_FRAME_BYTES = 4 * 1024;

const clientFrameSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("refresh_unread") }),
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;

export interface GatewayDependencies {
  tokens: TokenLifecycleManager;
  store: ICredentialStore;
  coordinator: DeliveryCoordinator;
  handshakeTimeoutMs?: number;
}

export function extractUpgradeToken(request: IncomingMessage): string | undefined {
  const fromHeader = extractBearerToken(request.headers.authorization);
  if (fromHeader) {
    return fromHeader;
  }
  const url = new URL(request.url ?? "/", "http://localhost");
  return url.searchParams.get("token") || undefined;
}

export function parseClientFrame(data: string): ClientFrame | undefined {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = clientFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * ChannelTransport over a ws socket. `send` resolves once ws has handed the
 * frame to the network.
 */
export class WebSocketTransport implements ChannelTransport {
  constructor(private readonly socket: WebSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}

function rejectUpgrade(socket: Duplex, status: number, statusText: string): void {
  if (!socket.destroyed) {
    socket.write(`HTTP/1.1 ${status} ${statusText}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  }
  socket.destroy();
}

export class MessageGateway {
  private readonly wss = new WebSocketServer({ noServer: true, maxPayload: MAX_CLIENT_FRAME_BYTES });
  private readonly handshakeTimeoutMs: number;

  constructor(private readonly deps: GatewayDependencies) {
    this.handshakeTimeoutMs = deps.handshakeTimeoutMs ?? TIMEOUT_CONSTANTS.WS_HANDSHAKE_TIMEOUT_MS;
    this.wss.on("error", (error) => logError("WS", error));
  }

  attach(server: Server): void {
    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head).catch((error) => {
        logError("WS", error);
        rejectUpgrade(socket, 500, "Internal Server Error");
      });
    });
    console.log(`[WS] Gateway listening on ${DELIVERY_CONSTANTS.WS_PATH}`);
  }

  /**
   * Resolves the identity for an upgrade request. Fails with a credential
   * error, or a retryable error when the store is slow or down.
   */
  async authenticate(request: IncomingMessage): Promise<AuthenticatedUser> {
    const token = extractUpgradeToken(request);
    if (!token) {
      throw new AuthenticationError("Missing access token");
    }
    return withTimeout(
      authenticateAccessToken(this.deps.tokens, this.deps.store, token),
      this.handshakeTimeoutMs,
      "WebSocket handshake",
    );
  }

  /**
   * Closes the server side. Live channels are closed by the registry.
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(request.url ?? "/", "http://localhost");
    if (url.pathname !== DELIVERY_CONSTANTS.WS_PATH) {
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }

    let user: AuthenticatedUser;
    try {
      user = await this.authenticate(request);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        const code = error instanceof CredentialError ? error.code : "MISSING_TOKEN";
        console.warn(`[WS] Handshake rejected: ${code}`);
        rejectUpgrade(socket, 401, "Unauthorized");
        return;
      }
      if (error instanceof TimeoutError || error instanceof TransientStoreError) {
        console.warn(`[WS] Handshake failed: ${getErrorMessage(error)}`);
        rejectUpgrade(socket, 503, "Service Unavailable");
        return;
      }
      throw error;
    }

    if (socket.destroyed) {
      console.log(`[WS] Client for user ${user.id} went away during handshake`);
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.accept(ws, user).catch((error) => {
        logError("WS", error);
        ws.close(1011, "Internal error");
      });
    });
  }

  private async accept(ws: WebSocket, user: AuthenticatedUser): Promise<void> {
    const { coordinator } = this.deps;
    const channel = new PushChannel(new WebSocketTransport(ws), user.id, user.tokenJti);
    let connection: Connection | undefined;

    ws.on("close", (code: number, reason: Buffer) => {
      channel.handleTransportClosed(code, reason.toString());
      coordinator.onDisconnect(channel.id);
    });
    ws.on("error", (error: Error) => {
      console.warn(`[WS] Socket error for user ${user.id}: ${error.message}`);
      channel.close(1011, "Socket error");
    });
    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        console.warn(`[WS] Ignoring binary frame from user ${user.id}`);
        return;
      }
      this.handleClientFrame(channel, connection, data.toString());
    });

    const result = await coordinator.onConnect(user.id, channel);
    connection = result.connection;
  }

  private handleClientFrame(channel: PushChannel, connection: Connection | undefined, data: string): void {
    const frame = parseClientFrame(data);
    if (!frame) {
      console.warn(`[WS] Unrecognized frame from user ${channel.identityId}`);
      return;
    }
    switch (frame.type) {
      case "ping":
        channel.sendControl({ type: "pong", timestamp: new Date().toISOString() });
        break;
      case "refresh_unread":
        if (!connection) {
          // Still replaying the backlog
          return;
        }
        this.deps.coordinator.refreshBacklog(connection).catch((error) => {
          logError("WS", error);
          channel.sendControl({ type: "error", message: "Failed to load unread messages" });
        });
        break;
    }
  }
}
