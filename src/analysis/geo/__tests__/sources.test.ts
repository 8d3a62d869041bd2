import { describe, it, expect, vi, afterEach } from "vitest";
import { createLookupSource, GeoipLiteLookupSource, IpApiLookupSource, NullLookupSource } from "../sources";
import { subdivisionName } from "../sources/geoip-lite";
import { CachingGeoResolver } from "../resolver";
import { isAnomalousIp } from "@/analysis/rule-engine";

const GEOIP_ENTRIES = vi.hoisted((): Record<string, object> => ({
  "81.2.69.160": { range: [0, 0], country: "GB", region: "ENG", eu: "0", timezone: "Europe/London", city: "", ll: [51.5, -0.12], metro: 0, area: 50 },
  "198.51.100.20": { range: [0, 0], country: "US", region: "MA", eu: "0", timezone: "America/New_York", city: "Andover", ll: [42.65, -71.14], metro: 506, area: 20 },
  "198.51.100.21": { range: [0, 0], country: "FR", region: "IDF", eu: "1", timezone: "Europe/Paris", city: "Paris", ll: [48.86, 2.35], metro: 0, area: 20 },
}));

vi.mock("geoip-lite", () => ({
  lookup: (ip: string) => GEOIP_ENTRIES[ip] ?? null,
}));

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("IpApiLookupSource", () => {
  const sources: IpApiLookupSource[] = [];

  function create(fetchImpl: typeof fetch): IpApiLookupSource {
    const source = new IpApiLookupSource({ endpoint: "http://geo.test/json/", fetchImpl });
    sources.push(source);
    return source;
  }

  afterEach(() => {
    sources.splice(0).forEach((source) => source.close());
  });

  it("maps a successful response", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        status: "success",
        countryCode: "US",
        regionName: "Massachusetts",
        city: "Boston",
        lat: 42.36,
        lon: -71.06,
      })
    );

    const result = await create(fetchImpl).lookup("198.51.100.7");

    expect(result).toEqual({
      countryCode: "US",
      regionName: "Massachusetts",
      cityName: "Boston",
      latitude: 42.36,
      longitude: -71.06,
    });
    expect(fetchImpl).toHaveBeenCalledWith(
      "http://geo.test/json/198.51.100.7?fields=status,message,countryCode,regionName,city,lat,lon"
    );
  });

  it("returns null when the service reports a failure", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ status: "fail", message: "reserved range" }));
    expect(await create(fetchImpl).lookup("198.51.100.7")).toBeNull();
  });

  it("throws on HTTP errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({}, 429));
    await expect(create(fetchImpl).lookup("198.51.100.7")).rejects.toThrow("ip-api responded with HTTP 429");
  });

  it("throws on malformed bodies", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ countryCode: "US" }));
    await expect(create(fetchImpl).lookup("198.51.100.7")).rejects.toThrow();
  });
});

describe("GeoipLiteLookupSource", () => {
  it("maps database entries and blanks", async () => {
    const source = new GeoipLiteLookupSource();
    expect(await source.lookup("81.2.69.160")).toEqual({
      countryCode: "GB",
      regionName: "England",
      cityName: undefined,
      latitude: 51.5,
      longitude: -0.12,
    });
    expect(await source.lookup("198.51.100.7")).toBeNull();
  });

  it("reports subdivision names, not codes", async () => {
    const result = await new GeoipLiteLookupSource().lookup("198.51.100.20");
    expect(result?.regionName).toBe("Massachusetts");
    expect(result?.cityName).toBe("Andover");
  });

  it("passes unmapped subdivision codes through", async () => {
    expect((await new GeoipLiteLookupSource().lookup("198.51.100.21"))?.regionName).toBe("IDF");
    expect(subdivisionName("US", "ZZ")).toBe("ZZ");
  });

  it("places baseline addresses inside the baseline", async () => {
    const resolver = new CachingGeoResolver({ source: new GeoipLiteLookupSource() });
    const geo = await resolver.resolve("198.51.100.20");
    const event = {
      timestamp: new Date(Date.UTC(2024, 0, 1, 3)),
      operation: "SoftDelete",
      userId: "alice",
      clientIp: "198.51.100.20",
      resultStatus: "Succeeded",
      fileName: "",
      geo,
    };

    expect(geo.region).toBe("Massachusetts");
    expect(isAnomalousIp(event, { country: "US", region: "Massachusetts", referenceIp: null })).toBe(false);
  });
});

describe("createLookupSource", () => {
  it("builds the configured provider", () => {
    const base = { endpoint: "http://geo.test/json", requestsPerMinute: 45 };

    const ipApi = createLookupSource({ ...base, provider: "ip-api" });
    expect(ipApi.name).toBe("ip-api");
    ipApi.close?.();

    expect(createLookupSource({ ...base, provider: "geoip-lite" })).toBeInstanceOf(GeoipLiteLookupSource);
    expect(createLookupSource({ ...base, provider: "none" })).toBeInstanceOf(NullLookupSource);
  });

  it("never resolves anything offline", async () => {
    expect(await new NullLookupSource().lookup()).toBeNull();
  });
});
