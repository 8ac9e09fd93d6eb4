import ExcelJS from "exceljs";
import { vi } from "vitest";
import { ArchiveClient } from "../src/collector/client.js";
import type { Row } from "../src/shared/record.js";

export const endpoints = {
  searchUrl: "https://archive.test/api/data/oldbailey_record",
  detailUrl: "https://archive.test/api/data/oldbailey_record_single"
};

export const hit = (n: number, title = `Trial ${n}. 12th January ${1740 + n}`) => ({
  _id: `id-${n}`,
  _index: "oldbailey_record",
  _type: "_doc",
  _source: {
    idkey: `t-${n}`,
    title,
    text: `Snippet ${n}`,
    images: [`img-${n}.gif`]
  }
});

export const detailHit = (idkey: string) => ({
  _id: `detail-${idkey}`,
  _index: "oldbailey_record_single",
  _type: "_doc",
  _source: {
    idkey,
    title: `Detail of ${idkey}, 1st March 1700`,
    text: `Full proceedings for ${idkey}`,
    images: []
  }
});

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

type FakeArchiveOptions = {
  total: number;
  /** Hits for one page; defaults to consecutive hit(n) records. */
  page?: (from: number, size: number) => unknown[];
  failingOffsets?: number[];
  missingDetails?: string[];
  failingDetails?: string[];
};

const consecutiveHits = (total: number) => (from: number, size: number) => {
  const hits: unknown[] = [];
  for (let n = from; n < Math.min(from + size, total); n += 1) {
    hits.push(hit(n));
  }
  return hits;
};

/** Answers search requests by offset and detail requests by idkey, recording every URL. */
export const fakeArchive = (options: FakeArchiveOptions) => {
  const page = options.page ?? consecutiveHits(options.total);
  const fetchImpl = vi.fn(async (raw: string) => {
    const url = new URL(raw);
    const idkey = url.searchParams.get("idkey");
    if (idkey !== null) {
      if (options.failingDetails?.includes(idkey)) return jsonResponse({ error: "boom" }, 503);
      if (options.missingDetails?.includes(idkey)) return jsonResponse({ hits: { total: 0, hits: [] } });
      return jsonResponse({ hits: { total: 1, hits: [detailHit(idkey)] } });
    }
    const from = Number(url.searchParams.get("from"));
    const size = Number(url.searchParams.get("size"));
    if (options.failingOffsets?.includes(from)) return jsonResponse({ error: "unavailable" }, 500);
    return jsonResponse({ hits: { total: options.total, hits: page(from, size) } });
  });
  return { fetchImpl, client: new ArchiveClient(endpoints, fetchImpl) };
};

export const requestedUrls = (fetchImpl: { mock: { calls: unknown[][] } }) => fetchImpl.mock.calls.map((call) => call[0]);

export const row = (n: number, date: string, extra: Partial<Row> = {}): Row => ({
  id: `id-${n}`,
  index: "oldbailey_record",
  type: "_doc",
  idkey: `t-${n}`,
  text: `Snippet ${n}`,
  title: `Trial ${n}`,
  images: [`img-${n}.gif`],
  date,
  ...extra
});

export const readSheet = async (data: Buffer) => {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  const sheet = workbook.getWorksheet("Sheet1");
  if (!sheet) throw new Error("Sheet1 missing from workbook");
  const rows: unknown[][] = [];
  sheet.eachRow((sheetRow) => {
    const cells: unknown[] = [];
    for (let column = 1; column <= sheet.columnCount; column += 1) {
      cells.push(sheetRow.getCell(column).value);
    }
    rows.push(cells);
  });
  return { sheetCount: workbook.worksheets.length, rows };
};

/** A promise the test opens when it chooses, for holding a fake request in flight. */
export const gate = () => {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { opened, open };
};
