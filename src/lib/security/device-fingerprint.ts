import { createHash } from "node:crypto";
import { isIP } from "node:net";
import { logger } from "@/lib/logger";

export interface DeviceFingerprint {
  ipSubnet: string;
  uaHash: string;
}

export function hashUserAgent(userAgent: string | null | undefined): string {
  return createHash("sha256")
    .update(userAgent ?? "", "utf8")
    .digest("hex");
}

function ipv4ToInt(address: string): number {
  return address
    .split(".")
    .reduce((acc, octet) => ((acc << 8) | Number.parseInt(octet, 10)) >>> 0, 0);
}

function intToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join(".");
}

function ipv4Subnet(address: string, maskBits: number): string {
  const mask = maskBits === 0 ? 0 : (0xffffffff << (32 - maskBits)) >>> 0;
  return `${intToIpv4((ipv4ToInt(address) & mask) >>> 0)}/${maskBits}`;
}

function expandIpv6(address: string): number[] {
  let normalized = address;
  const zone = normalized.indexOf("%");
  if (zone !== -1) {
    normalized = normalized.slice(0, zone);
  }

  // Embedded IPv4 tail (::ffff:10.0.0.1)
  const lastColon = normalized.lastIndexOf(":");
  const tail = normalized.slice(lastColon + 1);
  if (tail.includes(".")) {
    const v4 = ipv4ToInt(tail);
    normalized = `${normalized.slice(0, lastColon + 1)}${(v4 >>> 16).toString(16)}:${(v4 & 0xffff).toString(16)}`;
  }

  const [head, rest] = normalized.split("::");
  const headGroups = head ? head.split(":") : [];
  const restGroups = rest ? rest.split(":") : [];
  const fill = rest === undefined ? 0 : 8 - headGroups.length - restGroups.length;

  return [...headGroups, ...Array<string>(fill).fill("0"), ...restGroups].map((group) =>
    Number.parseInt(group, 16)
  );
}

function ipv6Subnet(address: string, maskBits: number): string {
  const groups = expandIpv6(address).map((group, index) => {
    const bitsBefore = index * 16;
    if (maskBits >= bitsBefore + 16) return group;
    if (maskBits <= bitsBefore) return 0;
    const keep = maskBits - bitsBefore;
    return group & ((0xffff << (16 - keep)) & 0xffff);
  });

  return `${compressIpv6(groups)}/${maskBits}`;
}

function compressIpv6(groups: number[]): string {
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength && j - i > 1) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestStart === -1) {
    return hex.join(":");
  }
  const left = hex.slice(0, bestStart).join(":");
  const right = hex.slice(bestStart + bestLength).join(":");
  return `${left}::${right}`;
}

const IPV4_MAPPED_PREFIX = "::ffff:";

/** `::ffff:10.0.0.5` -> `10.0.0.5`; anything else unchanged. */
export function unmapIpv4(address: string): string {
  if (!address.toLowerCase().startsWith(IPV4_MAPPED_PREFIX)) {
    return address;
  }
  const tail = address.slice(IPV4_MAPPED_PREFIX.length);
  return isIP(tail) === 4 ? tail : address;
}

/**
 * Network of `clientIp` at `maskBits` (clamped to the address family).
 * IPv4-mapped IPv6 addresses, as a dual-stack listener reports them, are
 * masked as IPv4. Unparseable input is returned verbatim.
 */
export function ipSubnet(rawClientIp: string, maskBits: number): string {
  const clientIp = unmapIpv4(rawClientIp);
  const family = isIP(clientIp);
  if (family === 0) {
    logger.debug("[DeviceFingerprint] Invalid IP address format for subnet calculation", {
      clientIp,
    });
    return clientIp;
  }

  const maxBits = family === 4 ? 32 : 128;
  const mask = Math.max(0, Math.min(Math.floor(maskBits), maxBits));
  return family === 4 ? ipv4Subnet(clientIp, mask) : ipv6Subnet(clientIp, mask);
}

export function buildDeviceFingerprint(
  clientIp: string,
  userAgent: string | null | undefined,
  subnetMask: number
): DeviceFingerprint {
  return {
    ipSubnet: ipSubnet(clientIp, subnetMask),
    uaHash: hashUserAgent(userAgent),
  };
}

export function sameDevice(expected: DeviceFingerprint, current: DeviceFingerprint): boolean {
  return expected.ipSubnet === current.ipSubnet && expected.uaHash === current.uaHash;
}
