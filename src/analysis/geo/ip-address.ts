import { isIP } from "net";

export type AddressClass =
  | { kind: "public"; address: string }
  | { kind: "private"; address: string }
  | { kind: "invalid" };

/**
 * Drop a trailing port: "203.0.113.5:443" and "[2001:db8::1]:443".
 * Bare IPv6 addresses are returned unchanged.
 */
export function stripPort(raw: string): string {
  const trimmed = raw.trim();

  const bracketed = trimmed.match(/^\[([^\]]+)\](?::\d+)?$/);
  if (bracketed) return bracketed[1];

  const v4WithPort = trimmed.match(/^(\d{1,3}(?:\.\d{1,3}){3}):\d+$/);
  if (v4WithPort) return v4WithPort[1];

  return trimmed;
}

function isPrivateV4(address: string): boolean {
  const [a, b] = address.split(".").map(Number);
  return (
    a === 10 ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    a === 127
  );
}

function isPrivateV6(address: string): boolean {
  const lower = address.toLowerCase();

  // IPv4-mapped (::ffff:10.0.0.1)
  const mapped = lower.match(/^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/);
  if (mapped) return isPrivateV4(mapped[1]);

  if (lower === "::1") return true;
  // fc00::/7 unique local, fe80::/10 link local
  return /^f[cd][0-9a-f]{2}:/.test(lower) || /^fe[89ab][0-9a-f]:/.test(lower);
}

/**
 * Classify a client IP as it appears in the audit blob.
 * RFC 1918 blocks, loopback and their IPv6 counterparts count as private.
 */
export function classifyAddress(raw: string): AddressClass {
  const address = stripPort(raw);
  const version = isIP(address);
  if (version === 0) return { kind: "invalid" };

  const isPrivate = version === 4 ? isPrivateV4(address) : isPrivateV6(address);
  return isPrivate ? { kind: "private", address } : { kind: "public", address };
}
