import { Pool } from "pg";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("postgres");

export function createPostgresPool(databaseUrl: string): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
  pool.on("error", (error) => {
    logger.error("Idle PostgreSQL client error", error);
  });
  return pool;
}
