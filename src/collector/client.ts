import { z } from "zod";
import { TransportError, errorMessage } from "../shared/errors.js";

export type FetchLike = (url: string) => Promise<Response>;

export type ArchiveEndpoints = {
  searchUrl: string;
  detailUrl: string;
};

// Elasticsearch 7+ reports totals as { value, relation }.
const totalSchema = z.union([
  z.number().int().nonnegative(),
  z.object({ value: z.number().int().nonnegative() }).transform((total) => total.value)
]);

const searchEnvelopeSchema = z.object({
  hits: z.object({
    total: totalSchema,
    hits: z.array(z.unknown())
  })
});

const detailEnvelopeSchema = z.object({
  hits: z.object({
    hits: z.array(z.unknown())
  })
});

export type SearchPage = {
  total: number;
  hits: unknown[];
};

type RequestContext = { term?: string; idkey?: string };

const describe = (context: RequestContext) =>
  context.term !== undefined ? `search "${context.term}"` : `record ${context.idkey ?? "?"}`;

export class ArchiveClient {
  constructor(
    private readonly endpoints: ArchiveEndpoints,
    private readonly fetchImpl: FetchLike = (url) => fetch(url, { headers: { Accept: "application/json" } })
  ) {}

  searchUrl(term: string, from: number, size: number) {
    const url = new URL(this.endpoints.searchUrl);
    url.searchParams.set("text", term);
    url.searchParams.set("from", String(from));
    url.searchParams.set("size", String(size));
    return url.toString();
  }

  detailUrl(idkey: string) {
    const url = new URL(this.endpoints.detailUrl);
    url.searchParams.set("idkey", idkey);
    return url.toString();
  }

  async searchPage(term: string, from: number, size: number): Promise<SearchPage> {
    const url = this.searchUrl(term, from, size);
    const payload = await this.getJson(url, { term });
    const parsed = searchEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`Unexpected search payload for "${term}" at offset ${from}`, {
        url,
        status: null,
        term,
        cause: parsed.error
      });
    }
    return parsed.data.hits;
  }

  async detailHits(idkey: string): Promise<unknown[]> {
    const url = this.detailUrl(idkey);
    const payload = await this.getJson(url, { idkey });
    const parsed = detailEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`Unexpected detail payload for record ${idkey}`, {
        url,
        status: null,
        idkey,
        cause: parsed.error
      });
    }
    return parsed.data.hits.hits;
  }

  private async getJson(url: string, context: RequestContext): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new TransportError(`Request failed for ${describe(context)}: ${errorMessage(error)}`, {
        url,
        status: null,
        ...context,
        cause: error
      });
    }

    if (!response.ok) {
      throw new TransportError(`Fetch failed (${response.status}) for ${describe(context)}`, {
        url,
        status: response.status,
        ...context
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new TransportError(`Invalid JSON for ${describe(context)}`, {
        url,
        status: response.status,
        ...context,
        cause: error
      });
    }
  }
}
