import { loadConfig } from "./config/env";
import { createDb } from "./db";
import { createStorage } from "./storage";
import { TokenLifecycleManager } from "./auth/tokenManager";
import { ConnectionRegistry } from "./delivery/connectionRegistry";
import { DeliveryCoordinator } from "./delivery/deliveryCoordinator";
import { MessageGateway } from "./delivery/gateway";
import { createApp } from "./app";
import { logError } from "./utils/errorHandler";

async function main(): Promise<void> {
  const config = loadConfig();
  const database = config.databaseUrl ? createDb(config.databaseUrl) : undefined;
  const storage = createStorage(database?.db);

  const tokens = new TokenLifecycleManager(config.tokens, storage);
  const registry = new ConnectionRegistry();
  const coordinator = new DeliveryCoordinator(storage, registry);
  tokens.onSessionEvent((event) => {
    coordinator.handleSessionEvent(event);
  });
  const stopSweeper = tokens.startSweeper();

  const { server } = await createApp({ storage, tokens, coordinator, registry });
  const gateway = new MessageGateway({
    tokens,
    store: storage,
    coordinator,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
  });
  gateway.attach(server);

  server.listen(config.port, "0.0.0.0", () => {
    console.log(`[Server] Listening on port ${config.port} (${config.nodeEnv})`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);
    stopSweeper();
    registry.closeAll("Server shutting down");
    await gateway.close();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await database?.pool.end();
    console.log("[Server] Shutdown complete");
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          logError("Server", error);
          process.exit(1);
        });
    });
  }
}

main().catch((error) => {
  logError("Server", error);
  process.exit(1);
});
