import { BlockList, isIP, isIPv4 } from "node:net";

const BLOCKED_IPV4_SUBNETS: Array<[string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.0.2.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["198.51.100.0", 24],
  ["203.0.113.0", 24],
  ["224.0.0.0", 4],
  ["240.0.0.0", 4]
];

const BLOCKED_IPV6_SUBNETS: Array<[string, number]> = [
  ["::", 128],
  ["::1", 128],
  ["fc00::", 7],
  ["fe80::", 10],
  ["ff00::", 8],
  ["2001:db8::", 32]
];

const blockedRanges = new BlockList();
for (const [network, prefix] of BLOCKED_IPV4_SUBNETS) {
  blockedRanges.addSubnet(network, prefix, "ipv4");
}
blockedRanges.addAddress("255.255.255.255", "ipv4");
for (const [network, prefix] of BLOCKED_IPV6_SUBNETS) {
  blockedRanges.addSubnet(network, prefix, "ipv6");
}

/** Strips brackets and a trailing zone id (`fe80::1%eth0`). */
export function normalizeIpLiteral(host: string): string {
  let value = host.trim().toLowerCase();
  if (value.startsWith("[") && value.endsWith("]")) {
    value = value.slice(1, -1);
  }
  const zoneIndex = value.indexOf("%");
  return zoneIndex >= 0 ? value.slice(0, zoneIndex) : value;
}

function expandIpv6(address: string): number[] | null {
  let text = address;
  const tail: number[] = [];
  const lastColon = text.lastIndexOf(":");
  const dotted = text.slice(lastColon + 1);
  if (isIPv4(dotted)) {
    const octets = dotted.split(".").map((part) => Number.parseInt(part, 10));
    tail.push((octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]);
    text = `${text.slice(0, lastColon + 1)}0`;
  }

  const halves = text.split("::");
  if (halves.length > 2) {
    return null;
  }
  const parseGroups = (part: string): number[] =>
    part.length === 0 ? [] : part.split(":").map((group) => Number.parseInt(group, 16));
  const head = parseGroups(halves[0]);
  const rest = halves.length === 2 ? parseGroups(halves[1]) : [];
  if (tail.length > 0) {
    // drop the "0" placeholder standing in for the dotted quad
    if (rest.length > 0) {
      rest.pop();
    } else {
      head.pop();
    }
  }
  const known = head.length + rest.length + tail.length;
  if (halves.length === 1 && known !== 8) {
    return null;
  }
  if (known > 8) {
    return null;
  }
  const groups = [...head, ...new Array<number>(8 - known).fill(0), ...rest, ...tail];
  if (groups.some((group) => Number.isNaN(group) || group < 0 || group > 0xffff)) {
    return null;
  }
  return groups;
}

/**
 * IPv4 address carried inside an IPv6 one: mapped (`::ffff:a.b.c.d`), compatible
 * (`::a.b.c.d`) or NAT64 well-known prefix (`64:ff9b::a.b.c.d`).
 */
export function embeddedIpv4(address: string): string | null {
  const groups = expandIpv6(address);
  if (!groups) {
    return null;
  }
  const firstFiveZero = groups.slice(0, 5).every((group) => group === 0);
  const mapped = firstFiveZero && groups[5] === 0xffff;
  const compatible = firstFiveZero && groups[5] === 0 && (groups[6] !== 0 || groups[7] > 1);
  const nat64 = groups[0] === 0x64 && groups[1] === 0xff9b && groups.slice(2, 6).every((group) => group === 0);
  if (!mapped && !compatible && !nat64) {
    return null;
  }
  return [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff].join(".");
}

export function isBlockedAddress(address: string): boolean {
  const value = normalizeIpLiteral(address);
  const family = isIP(value);
  if (family === 4) {
    return blockedRanges.check(value, "ipv4");
  }
  if (family === 6) {
    if (blockedRanges.check(value, "ipv6")) {
      return true;
    }
    const inner = embeddedIpv4(value);
    return inner !== null && blockedRanges.check(inner, "ipv4");
  }
  // not an address at all; callers only pass resolver output or literals
  return true;
}

export function isIpLiteral(host: string): boolean {
  return isIP(normalizeIpLiteral(host)) !== 0;
}
