const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

// e.g. "12th January 1800", "3 May 1790"
const DATE_PATTERN = /(\d{1,2})(?:st|nd|rd|th)?\s(\w+)\s(\d{4})/g;
const YEAR_PATTERN = /\d{4}/;

const toCalendarDate = (day: number, monthName: string, year: number): Date | undefined => {
  const month = MONTHS.indexOf(monthName.toLowerCase());
  if (month === -1) return undefined;
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  date.setUTCFullYear(year, month, day);
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) return undefined;
  return date;
};

/**
 * Finds the first "day month year" phrase in a title that forms a real
 * calendar date. Ordinal suffixes on the day are ignored.
 */
export const extractDate = (title: string): Date | undefined => {
  for (const match of title.matchAll(DATE_PATTERN)) {
    const date = toCalendarDate(Number(match[1]), match[2], Number(match[3]));
    if (date) return date;
  }
  return undefined;
};

/** Looser than {@link extractDate}: any run of four digits counts as a year. */
export const extractYear = (title: string): number | undefined => {
  const match = title.match(YEAR_PATTERN);
  return match ? Number(match[0]) : undefined;
};

export const formatIsoDate = (date: Date) => date.toISOString().slice(0, 10);
