import express from "express";
import { z } from "zod";
import { ArchiveClient, type FetchLike } from "../collector/client.js";
import { XLSX_MIME } from "../collector/export.js";
import { SearchSession, SessionStateError, SessionSupersededError } from "../collector/session.js";
import { filterByYearRange, yearBounds, yearHistogram } from "../collector/years.js";
import { config } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import type { RunLog } from "../shared/runLog.js";
import { SessionStore } from "./sessions.js";

export type AppDeps = {
  fetchImpl?: FetchLike;
  runLog?: RunLog;
  now?: () => Date;
  maxSessions?: number;
  sessionIdleMs?: number;
};

const searchBodySchema = z.object({
  term: z.string().trim().min(1),
  maxResults: z.number().int().nonnegative().nullish()
});

const yearSchema = z.coerce.number().int();

const rangeSchema = z
  .object({ yearFrom: yearSchema.optional(), yearTo: yearSchema.optional() })
  .refine((range) => (range.yearFrom === undefined) === (range.yearTo === undefined), {
    message: "yearFrom and yearTo must be given together"
  });

const exportBodySchema = z.object({ withDetails: z.boolean().optional() }).and(rangeSchema);

const applyRange = (session: SearchSession, range: z.infer<typeof rangeSchema>) => {
  if (range.yearFrom !== undefined && range.yearTo !== undefined) {
    return session.setYearRange(range.yearFrom, range.yearTo);
  }
  session.clearYearRange();
  return session.selectedRows;
};

const sendError = (res: express.Response, error: unknown) => {
  if (error instanceof SessionStateError || error instanceof SessionSupersededError) {
    return res.status(409).json({ error: error.message });
  }
  if (error instanceof RangeError) {
    return res.status(400).json({ error: error.message });
  }
  return res.status(500).json({ error: errorMessage(error) });
};

export const createApp = (deps: AppDeps = {}) => {
  const app = express();
  const now = deps.now ?? (() => new Date());
  const sessions = new SessionStore({
    maxSessions: deps.maxSessions ?? config.sessionLimit,
    idleMs: deps.sessionIdleMs ?? config.sessionIdleMs,
    clock: () => now().getTime()
  });
  const client = new ArchiveClient({ searchUrl: config.searchUrl, detailUrl: config.detailUrl }, deps.fetchImpl);

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.post("/sessions", (_req, res) => {
    const id = sessions.create(
      new SearchSession({
        client,
        pageSize: config.pageSize,
        dateMode: config.dateMode,
        runLog: deps.runLog,
        now
      })
    );
    res.status(201).json({ id });
  });

  app.delete("/sessions/:id", (req, res) => {
    if (!sessions.delete(req.params.id)) {
      return res.status(404).json({ error: "Unknown session" });
    }
    return res.status(204).end();
  });

  const getSession = (req: express.Request<{ id: string }>, res: express.Response) => {
    const session = sessions.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: "Unknown session" });
      return null;
    }
    return session;
  };

  app.post("/sessions/:id/search", async (req, res) => {
    const session = getSession(req, res);
    if (!session) return;
    const body = searchBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: body.error.issues.map((issue) => issue.message).join("; ") });
    }

    try {
      const outcome = await session.search(body.data.term, { maxResults: body.data.maxResults });
      if (outcome.status === "failed") {
        if (outcome.error instanceof SessionSupersededError) {
          return res.status(409).json({ error: outcome.message });
        }
        return res.status(502).json({ error: outcome.message });
      }
      const { term, totalHits, rows } = outcome.results;
      return res.json({
        status: outcome.status,
        term,
        totalHits,
        count: rows.length,
        yearBounds: yearBounds(rows) ?? null,
        histogram: yearHistogram(rows)
      });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.get("/sessions/:id/records", (req, res) => {
    const session = getSession(req, res);
    if (!session) return;
    const range = rangeSchema.safeParse(req.query);
    if (!range.success) {
      return res.status(400).json({ error: range.error.issues.map((issue) => issue.message).join("; ") });
    }
    const results = session.resultSet;
    if (!results) {
      return res.status(409).json({ error: "No search results in this session" });
    }
    // Read-only: the session's own selection changes only on export.
    try {
      const { yearFrom, yearTo } = range.data;
      const records =
        yearFrom !== undefined && yearTo !== undefined ? filterByYearRange(results.rows, yearFrom, yearTo) : results.rows;
      return res.json({ count: records.length, records });
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/sessions/:id/export", async (req, res) => {
    const session = getSession(req, res);
    if (!session) return;
    const body = exportBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ error: body.error.issues.map((issue) => issue.message).join("; ") });
    }
    try {
      applyRange(session, body.data);
      const artifact = body.data.withDetails ? await session.enrich() : await session.exportSelection();
      res.attachment(artifact.fileName);
      res.type(XLSX_MIME);
      res.setHeader("X-Enrichment-Failures", String(artifact.failures.length));
      return res.status(200).send(artifact.data);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return app;
};
