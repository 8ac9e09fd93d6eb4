import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import type { DateMode } from "./record.js";

const isProdEnv = process.env.BAILEY_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

export const envHint = () =>
  envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;

const parsePositiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
};

const parseDateMode = (value: string | undefined): DateMode => (value === "strict" ? "strict" : "lenient");

export const config = {
  searchUrl: process.env.SEARCH_URL ?? "https://www.dhi.ac.uk/api/data/oldbailey_record",
  detailUrl: process.env.DETAIL_URL ?? "https://www.dhi.ac.uk/api/data/oldbailey_record_single",
  pageSize: parsePositiveInt(process.env.PAGE_SIZE, 10),
  dateMode: parseDateMode(process.env.DATE_MODE),
  port: Number(process.env.PORT ?? 3000),
  sessionLimit: parsePositiveInt(process.env.SESSION_LIMIT, 100),
  sessionIdleMs: parsePositiveInt(process.env.SESSION_IDLE_MINUTES, 30) * 60_000,
  dbUrl:
    process.env.DATABASE_URL ??
    process.env.POSTGRES_URL ??
    process.env.POSTGRES_URL_NON_POOLING ??
    ""
};
