/**
 * Database Connection
 *
 * Purpose:
 * Creates a pooled database connection using Drizzle ORM with Neon.
 * Message fan-out runs in an interactive transaction, which needs the
 * pooled (WebSocket) driver.
 *
 * Layer: Infrastructure
 */

import { Pool, neonConfig } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-serverless";
import ws from "ws";
import * as schema from "@shared/schema";

neonConfig.webSocketConstructor = ws;

export function createDb(databaseUrl: string) {
  const pool = new Pool({ connectionString: databaseUrl });
  const db = drizzle({ client: pool, schema });
  return { db, pool };
}

export type Database = ReturnType<typeof createDb>["db"];
