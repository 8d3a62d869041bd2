import { MISSING_VALUE, PRIVATE_GEO, UNKNOWN, UNKNOWN_GEO } from "@/lib/constants";
import type { GeoRecord } from "@/analysis/types";
import { classifyAddress } from "./ip-address";
import type { GeoLookupResult, GeoLookupSource } from "./sources";

export interface GeoResolver {
  resolve(ip: string): Promise<GeoRecord>;
}

export interface GeoResolverOptions {
  source: GeoLookupSource;
  /** The analyst's own address and where it lives */
  reference?: { ip: string; geo: GeoRecord } | null;
  /** Static entries that never reach the backing source */
  knownIps?: Record<string, GeoRecord>;
}

/**
 * Tiered IP geolocation with a per-run cache.
 *
 * Order: reference IP → known IPs → "N/A"/private/unparseable (Local) →
 * cache → backing source → Unknown. Every backend answer, failures
 * included, is cached under the raw IP string, so an address is looked up
 * at most once per resolver instance. Create one resolver per run.
 */
export class CachingGeoResolver implements GeoResolver {
  private source: GeoLookupSource;
  private reference: { ip: string; geo: GeoRecord } | null;
  private knownIps: Map<string, GeoRecord>;
  private cache = new Map<string, GeoRecord>();
  private lookups = 0;

  constructor(options: GeoResolverOptions) {
    this.source = options.source;
    this.reference = options.reference ?? null;
    this.knownIps = new Map(Object.entries(options.knownIps ?? {}));
  }

  async resolve(ip: string): Promise<GeoRecord> {
    if (this.reference && ip === this.reference.ip) {
      return { ...this.reference.geo };
    }

    const known = this.knownIps.get(ip);
    if (known) return { ...known };

    if (ip === MISSING_VALUE) return { ...PRIVATE_GEO };

    const address = classifyAddress(ip);
    if (address.kind !== "public") return { ...PRIVATE_GEO };

    const cached = this.cache.get(ip);
    if (cached) return { ...cached };

    const record = await this.lookup(address.address);
    this.cache.set(ip, record);
    return { ...record };
  }

  /** Number of calls made to the backing source so far */
  get lookupCount(): number {
    return this.lookups;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async lookup(address: string): Promise<GeoRecord> {
    this.lookups++;
    try {
      const result = await this.source.lookup(address);
      return result ? toGeoRecord(result) : { ...UNKNOWN_GEO };
    } catch (error) {
      console.warn(
        `[Geo] ${this.source.name} lookup failed for ${address}:`,
        error instanceof Error ? error.message : error
      );
      return { ...UNKNOWN_GEO };
    }
  }
}

export function toGeoRecord(result: GeoLookupResult): GeoRecord {
  return {
    country: result.countryCode || UNKNOWN,
    region: result.regionName || UNKNOWN,
    city: result.cityName || UNKNOWN,
    latitude: Number.isFinite(result.latitude) ? (result.latitude ?? 0) : 0,
    longitude: Number.isFinite(result.longitude) ? (result.longitude ?? 0) : 0,
  };
}
