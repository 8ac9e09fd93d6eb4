import { MalformedRecordError } from "../shared/errors.js";
import { UNKNOWN_DATE, noProgress, type DateMode, type ProgressSink, type ResultSet, type Row } from "../shared/record.js";
import type { ArchiveClient, SearchPage } from "./client.js";
import { mapRecord } from "./mapper.js";

export type FetchAllOptions = {
  maxResults?: number | null;
  pageSize?: number;
  dateMode?: DateMode;
  onProgress?: ProgressSink;
};

export const DEFAULT_PAGE_SIZE = 10;

const assertOptions = (maxResults: number | null, pageSize: number) => {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  if (maxResults !== null && (!Number.isInteger(maxResults) || maxResults < 0)) {
    throw new RangeError(`maxResults must be a non-negative integer, got ${maxResults}`);
  }
};

export const pageCount = (totalHits: number, maxResults: number | null, pageSize: number) => {
  const wanted = maxResults === null ? totalHits : Math.min(maxResults, totalHits);
  return Math.ceil(wanted / pageSize);
};

const mapPage = (page: SearchPage, dateMode: DateMode, term: string): Row[] => {
  const rows: Row[] = [];
  for (const hit of page.hits) {
    let row: Row;
    try {
      row = mapRecord(hit);
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) throw error;
      console.warn(`Skipping record in "${term}" results:`, error.message);
      continue;
    }
    if (dateMode === "strict" && row.date === UNKNOWN_DATE) continue;
    rows.push(row);
  }
  return rows;
};

/**
 * Collects every page of results for a search term. A failed page voids the
 * whole fetch: callers either get all requested pages or a TransportError.
 */
export const fetchAll = async (client: ArchiveClient, term: string, options: FetchAllOptions = {}): Promise<ResultSet> => {
  const maxResults = options.maxResults ?? null;
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const dateMode = options.dateMode ?? "lenient";
  const onProgress = options.onProgress ?? noProgress;
  assertOptions(maxResults, pageSize);

  if (maxResults === 0) {
    return { term, totalHits: 0, rows: [] };
  }

  const first = await client.searchPage(term, 0, pageSize);
  if (first.total === 0) {
    return { term, totalHits: 0, rows: [] };
  }

  const pages = pageCount(first.total, maxResults, pageSize);
  const seen = new Set<string>();
  const rows: Row[] = [];

  for (let page = 0; page < pages; page += 1) {
    const data = page === 0 ? first : await client.searchPage(term, page * pageSize, pageSize);
    for (const row of mapPage(data, dateMode, term)) {
      // Offset paging can repeat a hit when the index shifts between requests.
      if (seen.has(row.idkey)) continue;
      seen.add(row.idkey);
      rows.push(row);
    }
    onProgress((page + 1) / pages, `Fetching page ${page + 1} of ${pages}...`);
  }

  return {
    term,
    totalHits: first.total,
    rows: maxResults === null ? rows : rows.slice(0, maxResults)
  };
};
