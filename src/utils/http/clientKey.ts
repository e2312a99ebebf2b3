/**
 * Client key resolution for rate limiting and audit records
 *
 * Order of precedence:
 * 1. First entry of X-Forwarded-For, if it is a valid IP
 * 2. X-Real-IP, if it is a valid IP
 * 3. Host part of the socket's remote address
 */

import { isIP } from "net";

/** Header values as exposed by node:http (IncomingHttpHeaders) */
export type HeaderBag = Record<string, string | string[] | undefined>;

export type ClientKeySource = {
  headers: HeaderBag;
  remoteAddress?: string;
};

/**
 * Case-insensitive header lookup; repeated headers resolve to the first value
 */
function getHeader(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

/**
 * Split "host:port" / "[v6]:port" into its host, leaving bare IPs untouched
 */
function stripPort(address: string): string {
  if (isIP(address) !== 0) {
    return address;
  }

  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(address);
  if (bracketed) {
    return bracketed[1];
  }

  const lastColon = address.lastIndexOf(":");
  if (lastColon > 0 && address.indexOf(":") === lastColon) {
    return address.slice(0, lastColon);
  }

  return address;
}

/**
 * Canonical form of an IP address, or "unknown" if it is not one.
 * IPv4-mapped IPv6 addresses ("::ffff:1.2.3.4") are reduced to IPv4.
 */
export function sanitizeIp(ip: string | undefined): string {
  const candidate = ip?.trim() ?? "";
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(candidate);
  if (mapped && isIP(mapped[1]) === 4) {
    return mapped[1];
  }

  const version = isIP(candidate);
  if (version === 4) {
    return candidate;
  }
  if (version === 6) {
    return candidate.toLowerCase();
  }
  return "unknown";
}

/**
 * Derive the raw client IP for a request (unsanitized).
 */
export function getClientIp(source: ClientKeySource): string {
  const forwardedFor = getHeader(source.headers, "x-forwarded-for");
  if (forwardedFor) {
    const first = forwardedFor.split(",")[0].trim();
    if (isIP(first) !== 0) {
      return first;
    }
  }

  const realIp = getHeader(source.headers, "x-real-ip")?.trim();
  if (realIp && isIP(realIp) !== 0) {
    return realIp;
  }

  return stripPort(source.remoteAddress ?? "");
}

/**
 * Client key used to bucket rate-limiter state: sanitized client IP.
 */
export function resolveClientKey(source: ClientKeySource): string {
  return sanitizeIp(getClientIp(source));
}
