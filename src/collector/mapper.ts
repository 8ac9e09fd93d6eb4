import { z } from "zod";
import { MalformedRecordError } from "../shared/errors.js";
import { UNKNOWN_DATE, type Row } from "../shared/record.js";
import { extractDate, extractYear, formatIsoDate } from "./dates.js";

export const rawRecordSchema = z.object({
  _id: z.string(),
  _index: z.string(),
  // Newer search back ends no longer send a mapping type.
  _type: z.string().optional(),
  _source: z.object({
    idkey: z.string(),
    title: z.string(),
    text: z.string(),
    images: z.array(z.string())
  })
});

export type RawRecord = z.infer<typeof rawRecordSchema>;

const recordIdOf = (raw: unknown): string | null => {
  if (!raw || typeof raw !== "object" || !("_id" in raw)) return null;
  const id = raw._id;
  return typeof id === "string" || typeof id === "number" ? String(id) : null;
};

export const parseRawRecord = (raw: unknown): RawRecord => {
  const parsed = rawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`);
    throw new MalformedRecordError(recordIdOf(raw), issues);
  }
  return parsed.data;
};

export const mapRecord = (raw: unknown): Row => {
  const record = parseRawRecord(raw);
  const { idkey, title, text, images } = record._source;
  const date = extractDate(title);

  return {
    id: record._id,
    index: record._index,
    type: record._type ?? "",
    idkey,
    text,
    title,
    images,
    date: date ? formatIsoDate(date) : UNKNOWN_DATE,
    year: extractYear(title)
  };
};
