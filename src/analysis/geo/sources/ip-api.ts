import { z } from "zod/v4";
import { IP_API_ENDPOINT, IP_API_REQUESTS_PER_MINUTE } from "@/lib/constants";
import { createRateLimiter, type RateLimiter } from "@/lib/rate-limit";
import type { GeoLookupResult, GeoLookupSource } from "./types";

const RESPONSE_FIELDS = "status,message,countryCode,regionName,city,lat,lon";

const ipApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  countryCode: z.string().optional(),
  regionName: z.string().optional(),
  city: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
});

export interface IpApiOptions {
  endpoint?: string;
  requestsPerMinute?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Network lookup against an ip-api.com compatible JSON endpoint.
 * Requests are spaced to stay inside the service's per-minute budget.
 */
export class IpApiLookupSource implements GeoLookupSource {
  readonly name = "ip-api";
  private endpoint: string;
  private fetchImpl: typeof fetch;
  private limiter: RateLimiter;

  constructor(options: IpApiOptions = {}) {
    this.endpoint = (options.endpoint ?? IP_API_ENDPOINT).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.limiter = createRateLimiter({
      windowMs: 60_000,
      maxRequests: options.requestsPerMinute ?? IP_API_REQUESTS_PER_MINUTE,
    });
  }

  async lookup(ip: string): Promise<GeoLookupResult | null> {
    await this.limiter.acquire(this.endpoint);

    const url = `${this.endpoint}/${encodeURIComponent(ip)}?fields=${RESPONSE_FIELDS}`;
    const response = await this.fetchImpl(url);
    if (!response.ok) {
      throw new Error(`ip-api responded with HTTP ${response.status}`);
    }

    const body = ipApiResponseSchema.parse(await response.json());
    if (body.status !== "success") return null;

    return {
      countryCode: body.countryCode,
      regionName: body.regionName,
      cityName: body.city,
      latitude: body.lat,
      longitude: body.lon,
    };
  }

  close(): void {
    this.limiter.destroy();
  }
}
