import type { Candidate } from "../domain/Candidate";
import {
  emptySearchResult,
  type SearchRequest,
  type SearchResult,
  type SourceId,
} from "../domain/Search";
import type { RawRecord } from "./RawRecords";
import type { ResultNormalizer } from "./ResultNormalizer";
import type { SearchSource, SourceQuery } from "./SearchSources";
import { readThrough, type Cache } from "./TtlCache";
import { normalizeZip, type ZipGeocoder } from "./ZipGeocoder";

// Radius search
// 1. Geolocate the origin ZIP; a miss is an empty result with a reason, not an error.
// 2. Try sources in priority order; the first one that returns any raw record wins (no merging).
// 3. Normalize, partition by radius, fall back to the unfiltered set when nothing is inside.
// 4. Sort by distance (missing last), then display name.
//
// SourceUnavailableError from a source propagates to the caller unchanged.

export const REASON_NO_ORIGIN = "could not geolocate origin";
export const REASON_NO_REGION = "could not infer region";
export const REASON_NO_RECORDS = "no matching records";

export function compareCandidates(a: Candidate, b: Candidate): number {
  const da = a.distanceMiles ?? Number.POSITIVE_INFINITY;
  const db = b.distanceMiles ?? Number.POSITIVE_INFINITY;
  if (da !== db) return da < db ? -1 : 1;
  if (a.displayName === b.displayName) return 0;
  return a.displayName < b.displayName ? -1 : 1;
}

// Stable: equal keys keep their input order.
export function sortCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort(compareCandidates);
}

export type RadiusSearchDeps = Readonly<{
  geocoder: ZipGeocoder;
  normalizer: ResultNormalizer;
  sources: readonly SearchSource[];
  cache: Cache<readonly RawRecord[]>;
}>;

export class RadiusSearchOrchestrator {
  private readonly sources: ReadonlyMap<SourceId, SearchSource>;

  constructor(private readonly deps: RadiusSearchDeps) {
    this.sources = new Map(deps.sources.map((s) => [s.id, s]));
  }

  hasSource(id: SourceId): boolean {
    return this.sources.has(id);
  }

  private sourceFor(id: SourceId): SearchSource {
    const source = this.sources.get(id);
    if (!source) throw new Error(`Search source "${id}" is not configured.`);
    return source;
  }

  async search(request: SearchRequest): Promise<SearchResult> {
    if (!(request.radiusMiles > 0)) throw new Error("radiusMiles must be a positive number.");
    const plan = request.sourcePreference.map((id) => this.sourceFor(id));

    const originZip = normalizeZip(request.originZip);
    const origin = originZip ? await this.deps.geocoder.resolve(originZip) : null;
    if (!origin) return emptySearchResult(REASON_NO_ORIGIN);
    if (!origin.regionCode) return emptySearchResult(REASON_NO_REGION);

    const query: SourceQuery = {
      region: origin.regionCode,
      origin: origin.point,
      radiusMiles: request.radiusMiles,
      queryText: request.queryText,
    };

    let raws: readonly RawRecord[] = [];
    let sourceUsed: SourceId | undefined;
    for (const source of plan) {
      raws = await readThrough(this.deps.cache, source.cacheKey(query), () => source.fetch(query));
      if (raws.length > 0) {
        sourceUsed = source.id;
        break;
      }
    }

    if (!sourceUsed) {
      console.log(`[Search] No records from ${plan.map((s) => s.id).join(", ")} in ${origin.regionCode}`);
      return emptySearchResult(REASON_NO_RECORDS, origin.regionCode);
    }

    const all = await this.deps.normalizer.normalizeAll(raws, origin.point);
    const withinRadius = all.filter((c) => c.distanceMiles !== undefined && c.distanceMiles <= request.radiusMiles);
    const radiusRelaxed = withinRadius.length === 0;

    const candidates = sortCandidates(radiusRelaxed ? all : withinRadius);

    console.log(
      `[Search] ${sourceUsed}: ${all.length} candidate(s), ${withinRadius.length} within ${request.radiusMiles} mi` +
        (radiusRelaxed ? " (radius relaxed)" : ""),
    );

    return {
      candidates,
      meta: {
        resolvedRegion: origin.regionCode,
        totalRawCount: all.length,
        radiusRelaxed,
        sourceUsed,
      },
    };
  }
}
