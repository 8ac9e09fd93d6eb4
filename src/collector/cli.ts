import fs from "fs";
import { config, envHint } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import type { DateMode } from "../shared/record.js";
import type { RunLog } from "../shared/runLog.js";
import { ArchiveClient, type FetchLike } from "./client.js";
import { SearchSession } from "./session.js";
import { yearBounds } from "./years.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_RESULTS = 2;

export const USAGE =
  "Usage: search <term> [--max-results N] [--year-from Y] [--year-to Y] [--with-details] [--out FILE] [--page-size N] [--strict-dates]";

export type RunOptions = {
  term: string;
  maxResults: number | null;
  yearFrom: number | null;
  yearTo: number | null;
  withDetails: boolean;
  out: string | null;
  pageSize: number;
  dateMode: DateMode;
};

export type CliDeps = {
  fetchImpl?: FetchLike;
  runLog?: RunLog;
  now?: () => Date;
  writeFile?: (file: string, data: Buffer) => void;
};

const VALUE_FLAGS = new Set(["max-results", "year-from", "year-to", "out", "page-size"]);
const BOOLEAN_FLAGS = new Set(["with-details", "strict-dates"]);

const parseInteger = (flag: string, value: string | undefined) => {
  const parsed = Number(value);
  if (value === undefined || value === "" || !Number.isInteger(parsed)) {
    throw new Error(`--${flag} expects a whole number, got ${value ?? "nothing"}`);
  }
  return parsed;
};

export const parseArgs = (argv: string[]): RunOptions => {
  const [command, ...rest] = argv;
  if (command !== "search") {
    throw new Error(USAGE);
  }

  const args = new Map<string, string | true>();
  const positional: string[] = [];
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const [flag, inline] = arg.slice(2).split(/=(.*)/s, 2);
    if (BOOLEAN_FLAGS.has(flag)) {
      if (inline !== undefined) {
        throw new Error(`--${flag} takes no value`);
      }
      args.set(flag, true);
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new Error(`Unknown flag --${flag}\n${USAGE}`);
    }
    if (inline !== undefined) {
      args.set(flag, inline);
    } else if (i + 1 < rest.length) {
      args.set(flag, rest[i + 1]);
      i += 1;
    } else {
      throw new Error(`--${flag} expects a value`);
    }
  }

  const term = positional.join(" ").trim();
  if (!term) {
    throw new Error(USAGE);
  }

  const value = (flag: string) => {
    const raw = args.get(flag);
    return typeof raw === "string" ? raw : undefined;
  };
  const integer = (flag: string) => (args.has(flag) ? parseInteger(flag, value(flag)) : null);

  const yearFrom = integer("year-from");
  const yearTo = integer("year-to");
  const pageSize = integer("page-size") ?? config.pageSize;
  if (pageSize <= 0) {
    throw new Error("--page-size must be positive");
  }
  const maxResults = integer("max-results");
  if (maxResults !== null && maxResults < 0) {
    throw new Error("--max-results must not be negative");
  }

  return {
    term,
    maxResults,
    yearFrom,
    yearTo,
    withDetails: args.get("with-details") === true,
    out: value("out") ?? null,
    pageSize,
    dateMode: args.get("strict-dates") === true ? "strict" : config.dateMode
  };
};

const progressLogger = () => {
  let last = "";
  return (_fraction: number, status: string) => {
    if (status === last) return;
    last = status;
    console.log(status);
  };
};

export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  let options: RunOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_FAILURE;
  }

  const client = new ArchiveClient({ searchUrl: config.searchUrl, detailUrl: config.detailUrl }, deps.fetchImpl);
  const session = new SearchSession({
    client,
    pageSize: options.pageSize,
    dateMode: options.dateMode,
    onProgress: progressLogger(),
    runLog: deps.runLog,
    now: deps.now
  });

  console.log(`Searching for "${options.term}"`);
  const outcome = await session.search(options.term, { maxResults: options.maxResults });
  if (outcome.status === "failed") {
    console.error("Search failed:", outcome.message);
    console.error(`Search endpoint ${config.searchUrl}. ${envHint()}`);
    return EXIT_FAILURE;
  }
  if (outcome.status === "empty") {
    console.log(`No records found for "${options.term}".`);
    return EXIT_NO_RESULTS;
  }

  const { rows, totalHits } = outcome.results;
  console.log(`Found ${totalHits} hits, collected ${rows.length} records`);

  try {
    if (options.yearFrom !== null || options.yearTo !== null) {
      const bounds = yearBounds(rows);
      const from = options.yearFrom ?? bounds?.min ?? 0;
      const to = options.yearTo ?? bounds?.max ?? 9999;
      const selected = session.setYearRange(from, to);
      console.log(`${selected.length} records dated ${from}-${to}`);
    }

    const artifact = options.withDetails ? await session.enrich() : await session.exportSelection();
    if (artifact.failures.length > 0) {
      console.warn(`Details unavailable for ${artifact.failures.length} records`);
    }

    const file = options.out ?? artifact.fileName;
    const writeFile = deps.writeFile ?? ((path: string, data: Buffer) => fs.writeFileSync(path, data));
    writeFile(file, artifact.data);
    console.log(`Wrote ${artifact.rowCount} records to ${file}`);
    return EXIT_OK;
  } catch (error) {
    console.error("Export failed:", errorMessage(error));
    return EXIT_FAILURE;
  }
};
