import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
  idleTimeoutSeconds?: number;
}

const DEFAULT_POOL = { max: 10, idleTimeout: 20 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL.max,
    idle_timeout: options.idleTimeoutSeconds ?? DEFAULT_POOL.idleTimeout,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end();
}
