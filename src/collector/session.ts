import { TransportError, errorMessage } from "../shared/errors.js";
import { noProgress, type DateMode, type ProgressSink, type ResultSet, type Row } from "../shared/record.js";
import type { RunCompletion, RunLog } from "../shared/runLog.js";
import type { ArchiveClient } from "./client.js";
import { enrichAll, type EnrichmentFailure } from "./details.js";
import { exportFileName, exportTable } from "./export.js";
import { fetchAll } from "./paginator.js";
import { filterByYearRange } from "./years.js";

export type SessionState = "idle" | "fetching" | "ready" | "filtering" | "enriching" | "exported";

export type SearchOutcome =
  | { status: "ok" | "empty"; results: ResultSet }
  | { status: "failed"; term: string; error: unknown; message: string };

export type ExportArtifact = {
  fileName: string;
  data: Buffer;
  rowCount: number;
  withDetails: boolean;
  failures: EnrichmentFailure[];
};

export type SearchSessionOptions = {
  client: ArchiveClient;
  pageSize?: number;
  dateMode?: DateMode;
  onProgress?: ProgressSink;
  runLog?: RunLog;
  now?: () => Date;
};

type YearRange = { from: number; to: number };

export class SessionStateError extends Error {
  constructor(operation: string, state: SessionState) {
    super(`Cannot ${operation} while the session is ${state}`);
    this.name = "SessionStateError";
  }
}

/** A newer search replaced the session's results while this operation was in flight. */
export class SessionSupersededError extends Error {
  constructor(operation: string) {
    super(`${operation} was superseded by a newer search`);
    this.name = "SessionSupersededError";
  }
}

/**
 * One user's search: the cached result set for the current term, the year
 * selection over it and the last exported artifact.
 */
export class SearchSession {
  private currentState: SessionState = "idle";
  private results: ResultSet | null = null;
  private range: YearRange | null = null;
  private selection: readonly Row[] = [];
  private artifact: ExportArtifact | null = null;
  // Bumped by every search that replaces the results; stale completions are dropped.
  private generation = 0;
  private readonly onProgress: ProgressSink;
  private readonly now: () => Date;

  constructor(private readonly options: SearchSessionOptions) {
    this.onProgress = options.onProgress ?? noProgress;
    this.now = options.now ?? (() => new Date());
  }

  get state() {
    return this.currentState;
  }

  get resultSet() {
    return this.results;
  }

  get selectedRows() {
    return this.selection;
  }

  get lastExport() {
    return this.artifact;
  }

  async search(term: string, options: { maxResults?: number | null } = {}): Promise<SearchOutcome> {
    if (this.results && this.results.term === term) {
      return { status: this.results.rows.length === 0 ? "empty" : "ok", results: this.results };
    }

    this.reset();
    this.generation += 1;
    const generation = this.generation;
    if (term.trim().length === 0) {
      return { status: "failed", term, error: new Error("Search term is empty"), message: "Search term is empty" };
    }

    this.currentState = "fetching";
    const maxResults = options.maxResults ?? null;
    const runId = await this.logStart(term, maxResults);

    let results: ResultSet;
    try {
      results = await fetchAll(this.options.client, term, {
        maxResults,
        pageSize: this.options.pageSize,
        dateMode: this.options.dateMode,
        onProgress: this.onProgress
      });
    } catch (error) {
      const message = error instanceof TransportError ? error.message : `Search for "${term}" failed: ${errorMessage(error)}`;
      await this.logCompletion(runId, { status: "failed", error: message, completedAt: this.now().toISOString() });
      if (generation === this.generation) {
        this.reset();
      }
      return { status: "failed", term, error, message };
    }

    const status = results.rows.length === 0 ? "empty" : "ok";
    await this.logCompletion(runId, {
      status,
      totalHits: results.totalHits,
      rowCount: results.rows.length,
      completedAt: this.now().toISOString()
    });

    if (generation !== this.generation) {
      const error = new SessionSupersededError(`Search for "${term}"`);
      return { status: "failed", term, error, message: error.message };
    }

    this.results = results;
    this.selection = results.rows;
    this.currentState = "ready";
    this.onProgress(1, "Fetching complete.");
    return { status, results };
  }

  setYearRange(from: number, to: number): readonly Row[] {
    const results = this.requireResults("filter by year");
    this.selection = filterByYearRange(results.rows, from, to);
    this.range = { from, to };
    this.artifact = null;
    this.currentState = "filtering";
    return this.selection;
  }

  clearYearRange() {
    const results = this.requireResults("clear the year range");
    this.selection = results.rows;
    this.range = null;
    this.artifact = null;
    this.currentState = "ready";
  }

  /** Fetches full text for the selection and exports it. */
  async enrich(): Promise<ExportArtifact> {
    const results = this.requireResults("enrich");
    const generation = this.generation;
    const previous = this.currentState;
    this.currentState = "enriching";
    try {
      const { records, failures } = await enrichAll(this.options.client, this.selection, { onProgress: this.onProgress });
      const data = await exportTable(records, { includeFullText: true });
      return this.finishExport(generation, results.term, { data, rowCount: records.length, withDetails: true, failures });
    } catch (error) {
      if (generation === this.generation) {
        this.currentState = previous;
      }
      throw error;
    }
  }

  /** Exports the selection without detail lookups. */
  async exportSelection(): Promise<ExportArtifact> {
    const results = this.requireResults("export");
    const generation = this.generation;
    const selection = this.selection;
    const data = await exportTable(selection, { includeFullText: false });
    return this.finishExport(generation, results.term, { data, rowCount: selection.length, withDetails: false, failures: [] });
  }

  private finishExport(generation: number, term: string, parts: Omit<ExportArtifact, "fileName">) {
    if (generation !== this.generation) {
      throw new SessionSupersededError(`Export of "${term}"`);
    }
    const fileName = exportFileName({
      term,
      now: this.now(),
      yearFrom: this.range?.from,
      yearTo: this.range?.to
    });
    this.artifact = { fileName, ...parts };
    this.currentState = "exported";
    return this.artifact;
  }

  private requireResults(operation: string): ResultSet {
    if (!this.results || this.currentState === "idle" || this.currentState === "fetching") {
      throw new SessionStateError(operation, this.currentState);
    }
    return this.results;
  }

  private reset() {
    this.results = null;
    this.range = null;
    this.selection = [];
    this.artifact = null;
    this.currentState = "idle";
  }

  private async logStart(term: string, maxResults: number | null) {
    if (!this.options.runLog) return null;
    try {
      return await this.options.runLog.start({ term, maxResults, startedAt: this.now().toISOString() });
    } catch (error) {
      console.error(`Failed to record search run for "${term}":`, errorMessage(error));
      return null;
    }
  }

  private async logCompletion(runId: string | null, completion: RunCompletion) {
    if (!this.options.runLog || runId === null) return;
    try {
      await this.options.runLog.complete(runId, completion);
    } catch (error) {
      console.error(`Failed to complete search run ${runId}:`, errorMessage(error));
    }
  }
}
