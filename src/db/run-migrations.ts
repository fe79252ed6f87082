import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { Pool } from "pg";
import type { MigrationRow } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_DIR = path.join(__dirname, "migrations");

/**
 * Applies every pending migrations/*.sql file in name order, each inside its
 * own transaction. A failing file is rolled back and the error rethrown.
 * Returns the names of the files applied by this call.
 */
export async function runMigrations(
  pool: Pick<Pool, "connect">,
  migrationsDir: string = MIGRATIONS_DIR
): Promise<string[]> {
  const client = await pool.connect();
  const appliedNow: string[] = [];
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const files = fs.readdirSync(migrationsDir).filter((f) => f.endsWith(".sql")).sort();

    const { rows: applied } = await client.query<MigrationRow>("SELECT name FROM _migrations");
    const appliedSet = new Set(applied.map((r) => r.name));

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
      console.log(`[migrations] Applying ${file}`);

      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
        appliedNow.push(file);
      } catch (err) {
        await client.query("ROLLBACK");
        console.error(`[migrations] ${file} failed:`, err);
        throw err;
      }
    }

    console.log(`[migrations] Complete (${appliedNow.length} applied).`);
    return appliedNow;
  } finally {
    client.release();
  }
}
