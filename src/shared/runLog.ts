import crypto from "crypto";
import { ensureSchema, getPool } from "./db.js";
import { errorMessage } from "./errors.js";

export type RunStart = {
  term: string;
  maxResults: number | null;
  startedAt: string; // ISO timestamp
};

export type RunCompletion =
  | { status: "ok" | "empty"; totalHits: number; rowCount: number; completedAt: string }
  | { status: "failed"; error: string; completedAt: string };

export interface RunLog {
  start(run: RunStart): Promise<string>;
  complete(runId: string, completion: RunCompletion): Promise<void>;
}

// The subset of pg.Pool the ledger needs.
export type Queryable = {
  query(text: string, values?: unknown[]): Promise<unknown>;
};

export const runIdFor = (run: RunStart) =>
  crypto.createHash("sha256").update(`${run.term}:${run.startedAt}`).digest("hex");

export class PgRunLog implements RunLog {
  constructor(private readonly db: Queryable) {}

  async start(run: RunStart) {
    const id = runIdFor(run);
    await this.db.query(
      `INSERT INTO search_runs (id, term, max_results, status, started_at)
       VALUES ($1, $2, $3, 'running', $4)`,
      [id, run.term, run.maxResults, run.startedAt]
    );
    return id;
  }

  async complete(runId: string, completion: RunCompletion) {
    if (completion.status === "failed") {
      await this.db.query(
        "UPDATE search_runs SET status = $1, error = $2, completed_at = $3 WHERE id = $4",
        [completion.status, completion.error, completion.completedAt, runId]
      );
      return;
    }
    await this.db.query(
      `UPDATE search_runs
       SET status = $1, total_hits = $2, row_count = $3, completed_at = $4
       WHERE id = $5`,
      [completion.status, completion.totalHits, completion.rowCount, completion.completedAt, runId]
    );
  }
}

export type RunLogSetup = {
  ensureSchema: (dbUrl: string) => Promise<void>;
  getPool: (dbUrl: string) => Queryable;
};

/**
 * Ledger for `dbUrl`, or undefined when no database is configured or the
 * schema cannot be applied. Searches run either way.
 */
export const connectRunLog = async (
  dbUrl: string,
  setup: RunLogSetup = { ensureSchema, getPool }
): Promise<RunLog | undefined> => {
  if (!dbUrl) return undefined;
  try {
    await setup.ensureSchema(dbUrl);
    return new PgRunLog(setup.getPool(dbUrl));
  } catch (error) {
    console.error("Run log unavailable, continuing without it:", errorMessage(error));
    return undefined;
  }
};
