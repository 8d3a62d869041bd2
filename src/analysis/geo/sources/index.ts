import type { GeolocationConfig } from "@/lib/config";
import { GeoipLiteLookupSource } from "./geoip-lite";
import { IpApiLookupSource } from "./ip-api";
import type { GeoLookupResult, GeoLookupSource } from "./types";

export type { GeoLookupResult, GeoLookupSource } from "./types";
export { IpApiLookupSource } from "./ip-api";
export { GeoipLiteLookupSource } from "./geoip-lite";

/** Offline mode: every public address resolves to Unknown. */
export class NullLookupSource implements GeoLookupSource {
  readonly name = "none";

  async lookup(): Promise<GeoLookupResult | null> {
    return null;
  }
}

export function createLookupSource(config: GeolocationConfig): GeoLookupSource {
  switch (config.provider) {
    case "ip-api":
      return new IpApiLookupSource({
        endpoint: config.endpoint,
        requestsPerMinute: config.requestsPerMinute,
      });
    case "geoip-lite":
      return new GeoipLiteLookupSource();
    case "none":
      return new NullLookupSource();
  }
}
