import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import pg from "pg";

const { Pool } = pg;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

let pool: pg.Pool | null = null;

const sslModeOf = (dbUrl: string): string => {
  const fromEnv = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE;
  if (fromEnv) return fromEnv;
  try {
    return new URL(dbUrl).searchParams.get("sslmode") ?? "";
  } catch {
    // Not a URL (e.g. a key=value connection string); pg reads sslmode itself.
    return "";
  }
};

export const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  const sslMode = sslModeOf(dbUrl);
  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full" || sslMode === "verify-ca") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const getPool = (dbUrl: string): pg.Pool => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  if (!pool) {
    pool = new Pool({
      connectionString: dbUrl,
      ssl: getSslConfig(dbUrl)
    });
  }
  return pool;
};

export const closePool = async () => {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
};

/** Applies data/schema.sql; every statement in it is idempotent. */
export const ensureSchema = async (dbUrl: string) => {
  const schemaPath = path.resolve(__dirname, "..", "..", "data", "schema.sql");
  const schema = fs.readFileSync(schemaPath, "utf-8");
  const db = getPool(dbUrl);
  await db.query(schema);
};
