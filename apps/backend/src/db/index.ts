import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import { loadDiscoveryConfig } from "../lib/discovery/config";
import * as schema from "./schema";

let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) return pool;

  const { databaseUrl } = loadDiscoveryConfig();
  if (!databaseUrl) {
    throw new Error("DATABASE_URL must be set to use the Postgres entity store");
  }
  pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", (error) => {
    console.error("[Registry] Postgres pool error:", error);
  });
  return pool;
}

function createDb(connection: Pool) {
  return drizzle(connection, { schema });
}

export type Database = ReturnType<typeof createDb>;

let db: Database | null = null;

export function getDb(): Database {
  if (!db) db = createDb(getPool());
  return db;
}

export async function closeDb(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  db = null;
  await current.end();
}
