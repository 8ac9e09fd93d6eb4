import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EXIT_FAILURE, EXIT_NO_RESULTS, EXIT_OK, USAGE, parseArgs, runCli } from "../src/collector/cli.js";
import { config, envHint } from "../src/shared/config.js";
import { fakeArchive, readSheet } from "./helpers.js";

const now = () => new Date(2024, 2, 5, 9, 7, 3);

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseArgs", () => {
  it("reads flags in both spellings", () => {
    const options = parseArgs([
      "search",
      "highway",
      "robbery",
      "--max-results=25",
      "--year-from",
      "1750",
      "--year-to=1800",
      "--out",
      "robbery.xlsx",
      "--page-size=20",
      "--with-details",
      "--strict-dates"
    ]);

    expect(options).toEqual({
      term: "highway robbery",
      maxResults: 25,
      yearFrom: 1750,
      yearTo: 1800,
      withDetails: true,
      out: "robbery.xlsx",
      pageSize: 20,
      dateMode: "strict"
    });
  });

  it("leaves optional values unset", () => {
    const options = parseArgs(["search", "theft", "--page-size", "10"]);

    expect(options).toMatchObject({ term: "theft", maxResults: null, yearFrom: null, yearTo: null, withDetails: false, out: null });
  });

  it("rejects a missing command or term", () => {
    expect(() => parseArgs(["theft"])).toThrow(USAGE);
    expect(() => parseArgs(["search"])).toThrow(USAGE);
  });

  it("rejects non-numeric values", () => {
    expect(() => parseArgs(["search", "theft", "--max-results=many"])).toThrow("--max-results expects a whole number, got many");
    expect(() => parseArgs(["search", "theft", "--year-from"])).toThrow("--year-from expects a value");
  });

  it("rejects unknown flags and values on switches", () => {
    expect(() => parseArgs(["search", "theft", "--max-result=5"])).toThrow("Unknown flag --max-result");
    expect(() => parseArgs(["search", "theft", "--with-details=no"])).toThrow("--with-details takes no value");
  });
});

describe("runCli", () => {
  it("writes the filtered, enriched export and exits 0", async () => {
    const { fetchImpl } = fakeArchive({ total: 5 });
    const writeFile = vi.fn<(file: string, data: Buffer) => void>();

    const code = await runCli(["search", "theft", "--year-from=1741", "--year-to=1742", "--with-details"], {
      fetchImpl,
      now,
      writeFile
    });

    expect(code).toBe(EXIT_OK);
    expect(writeFile).toHaveBeenCalledTimes(1);
    const [file, data] = writeFile.mock.calls[0];
    expect(file).toBe("old-bailey-theft-2024-03-05_09-07-03-1741-1742.xlsx");
    const sheet = await readSheet(data);
    expect(sheet.rows.map((cells) => cells[3])).toEqual(["idkey", "t-1", "t-2"]);
    expect(sheet.rows[0][8]).toBe("full_text");
  });

  it("writes to --out without detail lookups", async () => {
    const { fetchImpl } = fakeArchive({ total: 3 });
    const writeFile = vi.fn<(file: string, data: Buffer) => void>();

    const code = await runCli(["search", "theft", "--out", "theft.xlsx"], { fetchImpl, now, writeFile });

    expect(code).toBe(EXIT_OK);
    expect(writeFile.mock.calls[0][0]).toBe("theft.xlsx");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("exits 2 when nothing matches", async () => {
    const { fetchImpl } = fakeArchive({ total: 0 });
    const writeFile = vi.fn<(file: string, data: Buffer) => void>();

    const code = await runCli(["search", "nothing"], { fetchImpl, now, writeFile });

    expect(code).toBe(EXIT_NO_RESULTS);
    expect(writeFile).not.toHaveBeenCalled();
  });

  it("exits 1 on a transport failure", async () => {
    const { fetchImpl } = fakeArchive({ total: 30, failingOffsets: [0] });
    const writeFile = vi.fn<(file: string, data: Buffer) => void>();

    const code = await runCli(["search", "theft"], { fetchImpl, now, writeFile });

    expect(code).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith("Search failed:", 'Fetch failed (500) for search "theft"');
    expect(writeFile).not.toHaveBeenCalled();
  });

  it("exits 1 on bad arguments", async () => {
    const { fetchImpl } = fakeArchive({ total: 3 });

    expect(await runCli(["fetch", "theft"], { fetchImpl })).toBe(EXIT_FAILURE);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("names the endpoint and env file when a search fails", async () => {
    const { fetchImpl } = fakeArchive({ total: 30, failingOffsets: [0] });

    await runCli(["search", "theft"], { fetchImpl, now, writeFile: vi.fn() });

    expect(console.error).toHaveBeenCalledWith(`Search endpoint ${config.searchUrl}. ${envHint()}`);
  });

  it("prints usage for an unknown flag", async () => {
    const { fetchImpl } = fakeArchive({ total: 3 });

    expect(await runCli(["search", "theft", "--verbose"], { fetchImpl })).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith(`Unknown flag --verbose\n${USAGE}`);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
