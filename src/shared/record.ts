export const UNKNOWN_DATE = "Unknown";

export type DateMode = "lenient" | "strict";

export type Row = {
  id: string;
  index: string;
  type: string;
  idkey: string;
  text: string;
  title: string;
  images: string[];
  date: string; // YYYY-MM-DD or UNKNOWN_DATE
  year?: number;
};

export type DetailRecord = Row & {
  full_text: string;
};

export type ResultSet = {
  term: string;
  totalHits: number;
  rows: readonly Row[];
};

export type ProgressSink = (fraction: number, status: string) => void;

export const noProgress: ProgressSink = () => {};
