/**
 * Connection Registry
 *
 * Addressing structure from identity to its live push channels (several per
 * identity for multi-device). Constructed once at startup and injected.
 *
 * Every mutation and the fan-out walk run to completion without awaiting,
 * so on the event loop they are mutually exclusive per identity. Pushing
 * only enqueues on the channel's writer; nothing here waits on I/O.
 */

import { DELIVERY_CONSTANTS } from "../config/constants";
import { systemClock, type Clock } from "../utils/clock";
import { logError } from "../utils/errorHandler";
import type { PushChannel } from "./channel";

export interface Connection {
  id: string;
  identityId: string;
  channel: PushChannel;
  connectedAt: Date;
}

export class ConnectionRegistry {
  private readonly byIdentity = new Map<string, Map<string, Connection>>();
  private readonly byId = new Map<string, Connection>();

  constructor(private readonly clock: Clock = systemClock) {}

  register(identityId: string, channel: PushChannel): Connection {
    const connection: Connection = {
      id: channel.id,
      identityId,
      channel,
      connectedAt: this.clock.now(),
    };

    let channels = this.byIdentity.get(identityId);
    if (!channels) {
      channels = new Map();
      this.byIdentity.set(identityId, channels);
    }
    channels.set(connection.id, connection);
    this.byId.set(connection.id, connection);

    channel.onClose(() => {
      this.unregister(connection.id);
    });

    console.log(`[Registry] User ${identityId} connected (${connection.id}, ${channels.size} active)`);
    return connection;
  }

  /**
   * Idempotent: disconnect and eviction can race.
   * @returns whether the connection was registered
   */
  unregister(connectionId: string): boolean {
    const connection = this.byId.get(connectionId);
    if (!connection) {
      return false;
    }
    this.byId.delete(connectionId);

    const channels = this.byIdentity.get(connection.identityId);
    if (channels) {
      channels.delete(connectionId);
      if (channels.size === 0) {
        this.byIdentity.delete(connection.identityId);
      }
    }
    console.log(`[Registry] User ${connection.identityId} disconnected (${connectionId})`);
    return true;
  }

  isOnline(identityId: string): boolean {
    return (this.byIdentity.get(identityId)?.size ?? 0) > 0;
  }

  getConnection(connectionId: string): Connection | undefined {
    return this.byId.get(connectionId);
  }

  connectionsOf(identityId: string): Connection[] {
    return Array.from(this.byIdentity.get(identityId)?.values() ?? []);
  }

  /**
   * Calls `fn` for each channel of the identity. A channel for which `fn`
   * returns false or throws is unregistered.
   * @returns number of channels that accepted
   */
  forEachChannel(identityId: string, fn: (channel: PushChannel) => boolean): number {
    let accepted = 0;
    for (const connection of this.connectionsOf(identityId)) {
      let ok = false;
      try {
        ok = fn(connection.channel);
      } catch (error) {
        logError("Registry", error);
      }
      if (ok) {
        accepted++;
      } else {
        this.unregister(connection.id);
      }
    }
    return accepted;
  }

  /**
   * Forcibly closes and unregisters every channel of an identity.
   */
  evictAll(identityId: string, reason: string): number {
    return this.evict(this.connectionsOf(identityId), reason, DELIVERY_CONSTANTS.CLOSE_CODE_UNAUTHORIZED);
  }

  /**
   * Closes the channels that authenticated with the given access token id.
   */
  evictByCredential(identityId: string, credentialJti: string, reason: string): number {
    const matching = this.connectionsOf(identityId).filter(
      (connection) => connection.channel.credentialJti === credentialJti,
    );
    return this.evict(matching, reason, DELIVERY_CONSTANTS.CLOSE_CODE_UNAUTHORIZED);
  }

  /** Shutdown: closes everything. */
  closeAll(reason: string): number {
    return this.evict(Array.from(this.byId.values()), reason, DELIVERY_CONSTANTS.CLOSE_CODE_GOING_AWAY);
  }

  get connectionCount(): number {
    return this.byId.size;
  }

  get onlineIdentityCount(): number {
    return this.byIdentity.size;
  }

  private evict(connections: Connection[], reason: string, code: number): number {
    for (const connection of connections) {
      this.unregister(connection.id);
      connection.channel.close(code, reason);
    }
    if (connections.length > 0) {
      console.log(`[Registry] Evicted ${connections.length} connection(s): ${reason}`);
    }
    return connections.length;
  }
}
