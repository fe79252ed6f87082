import "dotenv/config";
import pool from "./connection.js";
import { runMigrations } from "./run-migrations.js";

async function migrate() {
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
