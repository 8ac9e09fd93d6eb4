import { DetailNotFoundError, MalformedRecordError, TransportError } from "../shared/errors.js";
import { noProgress, type DetailRecord, type ProgressSink, type Row } from "../shared/record.js";
import type { ArchiveClient } from "./client.js";
import { mapRecord } from "./mapper.js";

export type EnrichmentFailure = {
  idkey: string;
  reason: string;
};

export type EnrichmentResult = {
  records: DetailRecord[];
  failures: EnrichmentFailure[];
};

export type EnrichOptions = {
  onProgress?: ProgressSink;
};

export const fetchDetail = async (client: ArchiveClient, idkey: string): Promise<DetailRecord> => {
  const hits = await client.detailHits(idkey);
  if (hits.length === 0) {
    throw new DetailNotFoundError(idkey);
  }
  const row = mapRecord(hits[0]);
  // The detail endpoint returns the whole proceedings text where search returns a snippet.
  return { ...row, full_text: row.text };
};

const isOmission = (error: unknown): error is TransportError | DetailNotFoundError | MalformedRecordError =>
  error instanceof TransportError || error instanceof DetailNotFoundError || error instanceof MalformedRecordError;

/**
 * Fetches full text for each row in turn. Rows whose lookup fails are left
 * out of `records` and listed in `failures`; the batch itself never fails on
 * a single record.
 */
export const enrichAll = async (
  client: ArchiveClient,
  rows: readonly Row[],
  options: EnrichOptions = {}
): Promise<EnrichmentResult> => {
  const onProgress = options.onProgress ?? noProgress;
  const records: DetailRecord[] = [];
  const failures: EnrichmentFailure[] = [];

  for (const [i, row] of rows.entries()) {
    try {
      const detail = await fetchDetail(client, row.idkey);
      records.push({ ...row, full_text: detail.full_text });
    } catch (error) {
      if (!isOmission(error)) throw error;
      console.warn(`Failed to fetch details for ${row.idkey}:`, error.message);
      failures.push({ idkey: row.idkey, reason: error.message });
    }
    onProgress((i + 1) / rows.length, `Fetching details ${i + 1} of ${rows.length}...`);
  }

  return { records, failures };
};
