import * as ipaddr from "ipaddr.js";
import { createHash, timingSafeEqual } from "node:crypto";

export function isIpAllowed(ip: string, allowlist: string[]): boolean {
  if (allowlist.length === 0) return false;
  let addr: ipaddr.IPv4 | ipaddr.IPv6;
  try {
    addr = ipaddr.parse(ip.trim());
  } catch {
    return false;
  }
  return allowlist.some((entry) => {
    const trimmed = entry.trim();
    try {
      if (trimmed.includes("/")) {
        const cidr = ipaddr.parseCIDR(trimmed);
        return addr.kind() === cidr[0].kind() && addr.match(cidr);
      }
      return addr.toString() === ipaddr.parse(trimmed).toString();
    } catch {
      return false;
    }
  });
}

export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/** Constant-time comparison of a presented token against the configured one. */
export function tokensMatch(presented: string | undefined, expected: string): boolean {
  if (!presented) return false;
  return timingSafeEqual(Buffer.from(hashToken(presented)), Buffer.from(hashToken(expected)));
}
