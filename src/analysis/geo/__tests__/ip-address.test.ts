import { describe, it, expect } from "vitest";
import { classifyAddress, stripPort } from "../ip-address";

describe("stripPort", () => {
  it("drops ports from IPv4 and bracketed IPv6", () => {
    expect(stripPort("203.0.113.5:443")).toBe("203.0.113.5");
    expect(stripPort("[2001:db8::1]:8443")).toBe("2001:db8::1");
    expect(stripPort("[2001:db8::1]")).toBe("2001:db8::1");
  });

  it("leaves bare addresses alone", () => {
    expect(stripPort(" 203.0.113.5 ")).toBe("203.0.113.5");
    expect(stripPort("2001:db8::1")).toBe("2001:db8::1");
  });
});

describe("classifyAddress", () => {
  it.each(["10.1.2.3", "172.16.0.1", "172.31.255.255", "192.168.1.160", "127.0.0.1"])(
    "treats %s as private",
    (ip) => {
      expect(classifyAddress(ip)).toEqual({ kind: "private", address: ip });
    }
  );

  it.each(["::1", "fd12:3456::1", "fe80::1", "::ffff:10.0.0.1"])("treats IPv6 %s as private", (ip) => {
    expect(classifyAddress(ip).kind).toBe("private");
  });

  it("treats neighbouring public ranges as public", () => {
    expect(classifyAddress("172.32.0.1").kind).toBe("public");
    expect(classifyAddress("11.0.0.1").kind).toBe("public");
    expect(classifyAddress("2001:db8::1").kind).toBe("public");
    expect(classifyAddress("::ffff:8.8.8.8").kind).toBe("public");
  });

  it("classifies the address without its port", () => {
    expect(classifyAddress("198.51.100.7:52311")).toEqual({ kind: "public", address: "198.51.100.7" });
  });

  it("rejects text that is not an IP", () => {
    expect(classifyAddress("not-an-ip")).toEqual({ kind: "invalid" });
    expect(classifyAddress("300.1.1.1")).toEqual({ kind: "invalid" });
    expect(classifyAddress("")).toEqual({ kind: "invalid" });
  });
});
