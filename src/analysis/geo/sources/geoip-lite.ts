import { z } from "zod/v4";
import subdivisionData from "./subdivisions.json";
import type { GeoLookupResult, GeoLookupSource } from "./types";

type GeoipLite = typeof import("geoip-lite");

/** ISO 3166-2 subdivision names keyed by country, then subdivision code */
const SUBDIVISION_NAMES = z.record(z.string(), z.record(z.string(), z.string())).parse(subdivisionData);

/**
 * Turn geoip-lite's subdivision code ("MA") into the name the network source
 * reports ("Massachusetts"). Codes missing from the table pass through.
 */
export function subdivisionName(countryCode: string, code: string): string {
  return SUBDIVISION_NAMES[countryCode]?.[code] ?? code;
}

/**
 * Local database lookup through geoip-lite (bundled MaxMind GeoLite data).
 * The data files are loaded on first use.
 */
export class GeoipLiteLookupSource implements GeoLookupSource {
  readonly name = "geoip-lite";
  private db: Promise<GeoipLite> | null = null;

  async lookup(ip: string): Promise<GeoLookupResult | null> {
    this.db ??= import("geoip-lite");
    const geoip = await this.db;

    const result = geoip.lookup(ip);
    if (!result) return null;

    const [latitude, longitude] = result.ll;
    return {
      countryCode: result.country || undefined,
      regionName: result.region ? subdivisionName(result.country, result.region) : undefined,
      cityName: result.city || undefined,
      latitude,
      longitude,
    };
  }
}
