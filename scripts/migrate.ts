/**
 * Apply sql/schema.sql to DATABASE_URL.
 * Run: npm run migrate
 */
import "dotenv/config";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { createPool } from "../src/db/client.ts";
import { createLogger } from "../src/utils/logger.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SCHEMA_PATH = join(__dirname, "../sql/schema.sql");

const logger = createLogger({ logDir: null, debug: Boolean(process.env.DEBUG) }, "migrate");

async function migrate(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  logger.info("Starting database migration...");
  const pool = createPool(databaseUrl, logger);
  try {
    await pool.query(readFileSync(SCHEMA_PATH, "utf-8"));
    logger.info("Database migration completed successfully");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  logger.error("Database migration failed", err);
  process.exit(1);
});
