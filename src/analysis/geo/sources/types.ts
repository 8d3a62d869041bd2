/**
 * Raw answer from a geolocation backend. Any field the backend could not
 * fill is left undefined; the resolver supplies the defaults.
 */
export interface GeoLookupResult {
  countryCode?: string;
  regionName?: string;
  cityName?: string;
  latitude?: number;
  longitude?: number;
}

/**
 * A pluggable geolocation backend (local database, HTTP service, ...).
 * Resolves to null when the address is not found; rejects on failure.
 */
export interface GeoLookupSource {
  readonly name: string;
  lookup(ip: string): Promise<GeoLookupResult | null>;
  /** Release timers or handles held by the source */
  close?(): void;
}
