type TransportErrorDetails = {
  url: string;
  status: number | null;
  term?: string;
  idkey?: string;
  cause?: unknown;
};

/** Non-success response, network failure or unreadable envelope from the archive API. */
export class TransportError extends Error {
  readonly url: string;
  readonly status: number | null;
  readonly term: string | null;
  readonly idkey: string | null;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "TransportError";
    this.url = details.url;
    this.status = details.status;
    this.term = details.term ?? null;
    this.idkey = details.idkey ?? null;
  }
}

/** A single hit is missing a field the row needs. Only that record is skipped. */
export class MalformedRecordError extends Error {
  readonly recordId: string | null;
  readonly issues: string[];

  constructor(recordId: string | null, issues: string[]) {
    const label = recordId ? `Record ${recordId}` : "Record without id";
    super(`${label} is malformed: ${issues.join(", ")}`);
    this.name = "MalformedRecordError";
    this.recordId = recordId;
    this.issues = issues;
  }
}

/** The detail endpoint answered but had no hit for the key. */
export class DetailNotFoundError extends Error {
  readonly idkey: string;

  constructor(idkey: string) {
    super(`No detail record found for ${idkey}`);
    this.name = "DetailNotFoundError";
    this.idkey = idkey;
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
