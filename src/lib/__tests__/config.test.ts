import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  baselineFromConfig,
  loadAnalyzerConfig,
  parseAnalyzerConfig,
  referenceGeoFromConfig,
} from "../config";
import { ConfigError } from "../errors";

describe("parseAnalyzerConfig", () => {
  it("fills in defaults", () => {
    expect(parseAnalyzerConfig({}, {})).toEqual({
      baseline: { country: "US", region: "Massachusetts" },
      referenceIp: null,
      knownIps: {},
      geolocation: { provider: "ip-api", endpoint: "http://ip-api.com/json", requestsPerMinute: 45 },
    });
  });

  it("lets environment variables override file values", () => {
    const config = parseAnalyzerConfig(
      { baseline: { country: "GB", region: "England" }, geolocation: { provider: "geoip-lite" } },
      { BASELINE_REGION: "Scotland", GEO_PROVIDER: "none", REFERENCE_IP: "10.0.0.1" }
    );

    expect(config.baseline).toEqual({ country: "GB", region: "Scotland" });
    expect(config.geolocation.provider).toBe("none");
    expect(config.referenceIp).toEqual({ ip: "10.0.0.1" });
  });

  it("keeps the configured reference geo only for the same address", () => {
    const geo = { country: "US", region: "Massachusetts", city: "Boston", latitude: 42.36, longitude: -71.06 };
    const raw = { referenceIp: { ip: "192.168.1.160", geo } };

    expect(parseAnalyzerConfig(raw, { REFERENCE_IP: "192.168.1.160" }).referenceIp).toEqual({
      ip: "192.168.1.160",
      geo,
    });
    expect(parseAnalyzerConfig(raw, { REFERENCE_IP: "192.168.1.161" }).referenceIp).toEqual({
      ip: "192.168.1.161",
    });
  });

  it("rejects invalid values with their path", () => {
    expect(() => parseAnalyzerConfig({ geolocation: { requestsPerMinute: 0 } }, {}, "test.json")).toThrow(
      ConfigError
    );
    expect(() => parseAnalyzerConfig({}, { GEO_PROVIDER: "maxmind" })).toThrow(/geolocation\.provider/);
  });
});

describe("baseline helpers", () => {
  it("derives the baseline from the config", () => {
    const config = parseAnalyzerConfig({ referenceIp: { ip: "192.168.1.160" } }, {});
    expect(baselineFromConfig(config)).toEqual({
      country: "US",
      region: "Massachusetts",
      referenceIp: "192.168.1.160",
    });
  });

  it("places the reference IP at the baseline when no geo is given", () => {
    const config = parseAnalyzerConfig({ referenceIp: { ip: "192.168.1.160" } }, {});
    expect(referenceGeoFromConfig(config)).toEqual({
      country: "US",
      region: "Massachusetts",
      city: "Unknown",
      latitude: 0,
      longitude: 0,
    });
  });

  it("has no reference geo without a reference IP", () => {
    expect(referenceGeoFromConfig(parseAnalyzerConfig({}, {}))).toBeNull();
  });
});

describe("loadAnalyzerConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "analyzer-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads an explicit config file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ baseline: { country: "DE", region: "Berlin" } }));

    expect(loadAnalyzerConfig(path, {}).baseline).toEqual({ country: "DE", region: "Berlin" });
  });

  it("fails on a missing explicit file", () => {
    expect(() => loadAnalyzerConfig(join(dir, "missing.json"), {})).toThrow(ConfigError);
  });

  it("fails on invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadAnalyzerConfig(path, {})).toThrow(/^Invalid configuration in /);
  });
});
