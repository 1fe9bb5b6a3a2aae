import pg from "pg";
import { ConfigurationError, ConnectivityError, errorMessage } from "./errors.js";
import type { ProjectQuery } from "./query.js";
import type { RawRow } from "./record.js";

const { Pool } = pg;

export type RowSource = {
  fetchRows: (query: ProjectQuery) => Promise<RawRow[]>;
};

const sslModeFromUrl = (dbUrl: string): string => {
  try {
    return new URL(dbUrl).searchParams.get("sslmode") ?? "";
  } catch {
    return "";
  }
};

export const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  const sslMode = process.env.DATABASE_SSLMODE || process.env.PGSSLMODE || sslModeFromUrl(dbUrl);
  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full" || sslMode === "verify-ca") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

/**
 * Opens a pool for the duration of `fn` and always ends it, including when `fn` throws.
 */
export const withPool = async <T>(dbUrl: string, fn: (pool: pg.Pool) => Promise<T>): Promise<T> => {
  if (!dbUrl) {
    throw new ConfigurationError("DATABASE_URL is required");
  }
  const pool = new Pool({
    connectionString: dbUrl,
    ssl: getSslConfig(dbUrl)
  });
  try {
    return await fn(pool);
  } finally {
    await pool.end().catch((error: unknown) => {
      console.error(`Failed to close database pool: ${errorMessage(error)}`);
    });
  }
};

export const createPgRowSource = (dbUrl: string): RowSource => ({
  fetchRows: (query) =>
    withPool(dbUrl, async (pool) => {
      try {
        const result = await pool.query<unknown[]>({
          text: query.text,
          values: query.values,
          rowMode: "array"
        });
        return result.rows;
      } catch (error) {
        throw new ConnectivityError(`Project query failed: ${errorMessage(error)}`, { cause: error });
      }
    })
});
