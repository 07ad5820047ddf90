/*
Provider registry client (NPI Registry, API version 2.1)
- State-wide lookup by taxonomy description; no distance logic here.
- Pages with `skip`: the registry caps a single response at 200 records and `skip` at 1000.
*/

import type { FetchLike } from "./MapsClient";
import { RegistryResponseSchema, type RegistryResult } from "./RawRecords";

const REGISTRY_VERSION = "2.1";
const MAX_PAGE_SIZE = 200;
const MAX_TOTAL_RECORDS = 1200;

// NPI-1: individual practitioners. NPI-2: organizations.
export type EnumerationType = "NPI-1" | "NPI-2";

export type RegistrySearchParams = Readonly<{
  regionCode: string;
  taxonomyDescription: string;
  enumerationType: EnumerationType;

  // Upper bound on records collected across pages.
  limit?: number;
}>;

export class RegistryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: { baseUrl: string; fetchImpl?: FetchLike; timeoutMs?: number }) {
    this.baseUrl = options.baseUrl;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 25_000;
  }

  private buildUrl(params: RegistrySearchParams, pageSize: number, skip: number): string {
    const query = new URLSearchParams({
      version: REGISTRY_VERSION,
      taxonomy_description: params.taxonomyDescription,
      state: params.regionCode,
      country_code: "US",
      enumeration_type: params.enumerationType,
      limit: String(pageSize),
    });
    if (skip > 0) query.set("skip", String(skip));
    return `${this.baseUrl}?${query.toString()}`;
  }

  async fetchPage(params: RegistrySearchParams, pageSize: number, skip: number): Promise<RegistryResult[]> {
    const resp = await this.fetchImpl(this.buildUrl(params, pageSize, skip), {
      method: "GET",
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!resp.ok) {
      throw new Error(`Registry request failed: HTTP ${resp.status}`);
    }

    const parsed = RegistryResponseSchema.parse(await resp.json());

    // The registry answers a query it will not run with HTTP 200 and an Errors list; that reads as "no matches".
    const errors = parsed.Errors ?? [];
    if (errors.length > 0) {
      const detail = errors.map((e) => e.description ?? "unknown error").join("; ");
      console.warn(`[Registry] Query rejected: ${detail}`);
      return [];
    }

    return parsed.results ?? [];
  }

  async search(params: RegistrySearchParams): Promise<RegistryResult[]> {
    const limit = Math.min(Math.max(params.limit ?? MAX_TOTAL_RECORDS, 1), MAX_TOTAL_RECORDS);
    const results: RegistryResult[] = [];

    while (results.length < limit) {
      const pageSize = Math.min(MAX_PAGE_SIZE, limit - results.length);
      const page = await this.fetchPage(params, pageSize, results.length);
      results.push(...page.slice(0, pageSize));

      // A short page means the registry has nothing more for this query.
      if (page.length < pageSize) break;
    }

    return results;
  }
}
