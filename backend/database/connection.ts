import { existsSync, readFileSync } from "fs";
import { resolve as pathResolve } from "path";
import { Pool, type PoolClient, type PoolConfig, type QueryResult, type QueryResultRow } from "pg";
import { getConfig } from "../config";

// Database connection manager.
// Single pool instance shared across the application, created on first use.

let pool: Pool | undefined;

export function getDatabasePool(): Pool {
  if (!pool) {
    const db = getConfig().database;
    const config: PoolConfig = {
      connectionString: db.url,
      max: db.poolMax,
      idleTimeoutMillis: db.idleTimeoutMs,
      connectionTimeoutMillis: db.connectTimeoutMs,
      ssl: db.ssl,
    };

    pool = new Pool(config);

    pool.on("error", (err: Error) => {
      console.error("[DB] Unexpected error on idle client:", err.message);
    });

    console.log("[DB] Connection pool created");
  }
  return pool;
}

export async function query<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const p = getDatabasePool();
  const start = Date.now();
  const result = await p.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > 1000) {
    console.warn(`[DB] Slow query (${duration}ms):`, text.substring(0, 100));
  }

  return result;
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const p = getDatabasePool();
  const client = await p.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

// schema.sql sits beside this file in the source tree; the build does not copy it into dist/.
const schemaPathCandidates = [
  pathResolve(__dirname, "schema.sql"),
  pathResolve(__dirname, "..", "..", "..", "backend", "database", "schema.sql"),
];

export async function applySchema(): Promise<void> {
  const schemaPath = schemaPathCandidates.find((p) => existsSync(p));
  if (!schemaPath) throw new Error("schema.sql not found next to the database module.");

  await query(readFileSync(schemaPath, "utf8"));
  console.log("[DB] Schema applied");
}

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    console.log("[DB] Connection pool closed");
  }
}
