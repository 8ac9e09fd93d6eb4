import fs from "fs";
import path from "path";
import pg from "pg";

const { Pool } = pg;

let pool: pg.Pool | null = null;

const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE ?? "";

  try {
    sslMode = sslMode || new URL(dbUrl).searchParams.get("sslmode") || "";
  } catch {
    // Not a URL (e.g. a libpq keyword string); env decides alone.
  }

  if (!sslMode || sslMode === "disable") return sslMode ? false : undefined;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
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

export const schemaPath = () => path.resolve(process.cwd(), "data", "schema.sql");

export const ensureSchema = async (dbUrl: string) => {
  const schema = fs.readFileSync(schemaPath(), "utf-8");
  const db = getPool(dbUrl);
  await db.query(schema);
};

export const closePool = async () => {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
};
