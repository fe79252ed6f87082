import pg, { type PoolConfig } from "pg";
import { loadConfig } from "../config.js";

/** TLS is required everywhere except a database on this machine. */
export function poolConfigFor(databaseUrl: string, max: number): PoolConfig {
  const { hostname } = new URL(databaseUrl);
  const local = hostname === "localhost" || hostname === "127.0.0.1";
  return {
    connectionString: databaseUrl,
    ssl: local ? false : { rejectUnauthorized: true },
    max,
  };
}

const { DATABASE_URL, DB_POOL_MAX } = loadConfig();
if (!DATABASE_URL) {
  throw new Error("DATABASE_URL environment variable is required");
}

const pool = new pg.Pool(poolConfigFor(DATABASE_URL, DB_POOL_MAX));

// An idle client losing its connection must not take the process down.
pool.on("error", (err) => {
  console.error("[db] Idle client error:", err.message);
});

export default pool;
