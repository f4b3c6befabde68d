import pg from "pg";
import type { Logger } from "../utils/logger.ts";

/** The slice of a pg client the stores use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export interface TransactionClient extends Queryable {
  release(): void;
}

/** Anything that hands out clients: a pg Pool, or a fake in tests. */
export interface ConnectionSource {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
}

const SSL_PARAMS = ["sslmode", "ssl", "sslcert", "sslkey", "sslrootcert", "sslcrl"];

/**
 * SSL is on unless DATABASE_SSL=false. SSL query params are stripped from
 * the url so the explicit setting wins.
 */
export function createPool(databaseUrl: string, logger: Logger): pg.Pool {
  const sslDisabled = process.env.DATABASE_SSL === "false";

  let connectionString = databaseUrl;
  try {
    const url = new URL(databaseUrl);
    for (const param of SSL_PARAMS) url.searchParams.delete(param);
    connectionString = url.toString();
  } catch {
    logger.debug("DATABASE_URL is not a standard URL, using it as given");
  }

  const pool = new pg.Pool({
    connectionString,
    ssl: sslDisabled ? false : { rejectUnauthorized: false },
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", err);
  });

  return pool;
}

export async function withTransaction<T>(
  source: ConnectionSource,
  callback: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query("BEGIN");
    const result = await callback(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
