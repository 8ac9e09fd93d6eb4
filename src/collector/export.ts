import ExcelJS from "exceljs";
import type { DetailRecord, Row } from "../shared/record.js";

export const BASE_COLUMNS = ["id", "index", "type", "idkey", "text", "title", "images", "date"] as const;

export const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

// Excel rejects longer cells and "repairs" the workbook on open.
export const MAX_CELL_LENGTH = 32_767;

export type ExportOptions = {
  includeFullText?: boolean;
};

const hasFullText = (row: Row | DetailRecord): row is DetailRecord => "full_text" in row;

const toCells = (row: Row | DetailRecord, includeFullText: boolean) => {
  const cells: string[] = [row.id, row.index, row.type, row.idkey, row.text, row.title, row.images.join("; "), row.date];
  if (includeFullText) {
    cells.push(hasFullText(row) ? row.full_text : "");
  }
  return cells.map((cell) => (cell.length > MAX_CELL_LENGTH ? cell.slice(0, MAX_CELL_LENGTH) : cell));
};

export const exportTable = async (rows: readonly (Row | DetailRecord)[], options: ExportOptions = {}): Promise<Buffer> => {
  const includeFullText = options.includeFullText ?? rows.some(hasFullText);
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Sheet1");

  sheet.addRow(includeFullText ? [...BASE_COLUMNS, "full_text"] : [...BASE_COLUMNS]);
  for (const row of rows) {
    sheet.addRow(toCells(row, includeFullText));
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
};

const pad = (value: number) => String(value).padStart(2, "0");

const timestamp = (now: Date) =>
  `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}_` +
  `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;

export const sanitizeTerm = (term: string) => term.replace(/[^\p{L}\p{N} _-]/gu, "").trimEnd();

export const exportFileName = (args: { term: string; now: Date; yearFrom?: number; yearTo?: number }) => {
  const range = args.yearFrom !== undefined && args.yearTo !== undefined ? `-${args.yearFrom}-${args.yearTo}` : "";
  return `old-bailey-${sanitizeTerm(args.term)}-${timestamp(args.now)}${range}.xlsx`;
};
