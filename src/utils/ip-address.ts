import { isIP } from 'node:net';

export type IpFamily = 4 | 6;

export interface ParsedIp {
  readonly family: IpFamily;
  readonly value: bigint;
}

export interface CidrRange {
  readonly cidr: string;
  readonly family: IpFamily;
  readonly network: bigint;
  readonly prefix: number;
}

export const BLOCKED_IP_RANGES: readonly string[] = [
  // IPv4
  '10.0.0.0/8',
  '172.16.0.0/12',
  '192.168.0.0/16',
  '127.0.0.0/8',
  '169.254.0.0/16', // link-local, cloud metadata
  '0.0.0.0/8',
  // IPv6
  '::1/128',
  'fc00::/7',
  'fe80::/10',
  '::/128',
];

const FAMILY_BITS: Readonly<Record<IpFamily, bigint>> = { 4: 32n, 6: 128n };
const IPV4_MAPPED_PREFIX = 0xffffn;

function parseIpv4ToBigInt(ip: string): bigint | null {
  const parts = ip.split('.');
  if (parts.length !== 4) return null;

  let value = 0n;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const byte = Number.parseInt(part, 10);
    if (byte > 255) return null;
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

function expandEmbeddedIpv4(address: string): string | null {
  const lastColon = address.lastIndexOf(':');
  const tail = address.slice(lastColon + 1);
  if (!tail.includes('.')) return address;

  const ipv4 = parseIpv4ToBigInt(tail);
  if (ipv4 === null) return null;
  const high = (ipv4 >> 16n).toString(16);
  const low = (ipv4 & 0xffffn).toString(16);
  return `${address.slice(0, lastColon + 1)}${high}:${low}`;
}

function parseIpv6ToBigInt(ip: string): bigint | null {
  const address = expandEmbeddedIpv4(ip.toLowerCase());
  if (address === null) return null;

  const halves = address.split('::');
  if (halves.length > 2) return null;

  const head = halves[0] ? halves[0].split(':') : [];
  const tail = halves[1] ? halves[1].split(':') : [];

  let parts: string[];
  if (halves.length === 2) {
    const missing = 8 - head.length - tail.length;
    if (missing < 1) return null;
    parts = [...head, ...new Array<string>(missing).fill('0'), ...tail];
  } else {
    parts = head;
  }
  if (parts.length !== 8) return null;

  let value = 0n;
  for (const part of parts) {
    if (!/^[0-9a-f]{1,4}$/.test(part)) return null;
    value = (value << 16n) | BigInt(Number.parseInt(part, 16));
  }
  return value;
}

/**
 * Parses a literal IPv4 or IPv6 address. Brackets and IPv6 zone
 * identifiers are stripped; anything else that is not an IP yields null.
 */
export function parseIp(candidate: string): ParsedIp | null {
  const unbracketed = candidate.trim().replace(/^\[|\]$/g, '');
  const zoneIndex = unbracketed.indexOf('%');
  const address =
    zoneIndex >= 0 ? unbracketed.slice(0, zoneIndex) : unbracketed;

  const family = isIP(address);
  if (family === 4) {
    const value = parseIpv4ToBigInt(address);
    return value === null ? null : { family: 4, value };
  }
  if (family === 6) {
    const value = parseIpv6ToBigInt(address);
    return value === null ? null : { family: 6, value };
  }
  return null;
}

function prefixMask(family: IpFamily, prefix: number): bigint {
  const bits = FAMILY_BITS[family];
  const full = (1n << bits) - 1n;
  if (prefix === 0) return 0n;
  return (full << (bits - BigInt(prefix))) & full;
}

export function parseCidr(cidr: string): CidrRange {
  const [subnet, prefixText] = cidr.split('/');
  const parsed = subnet ? parseIp(subnet) : null;
  if (!parsed || prefixText === undefined || !/^\d{1,3}$/.test(prefixText)) {
    throw new Error(`Invalid CIDR range: ${cidr}`);
  }

  const prefix = Number.parseInt(prefixText, 10);
  if (BigInt(prefix) > FAMILY_BITS[parsed.family]) {
    throw new Error(`Invalid CIDR prefix length: ${cidr}`);
  }

  return {
    cidr,
    family: parsed.family,
    prefix,
    network: parsed.value & prefixMask(parsed.family, prefix),
  };
}

function containsParsed(range: CidrRange, ip: ParsedIp): boolean {
  if (range.family !== ip.family) return false;
  return (ip.value & prefixMask(range.family, range.prefix)) === range.network;
}

export function ipInRange(ip: string, range: CidrRange | string): boolean {
  const parsed = parseIp(ip);
  if (!parsed) return false;
  const cidr = typeof range === 'string' ? parseCidr(range) : range;
  return containsParsed(cidr, parsed);
}

function extractMappedIpv4(ip: ParsedIp): ParsedIp | null {
  if (ip.family !== 6) return null;
  if (ip.value >> 32n !== IPV4_MAPPED_PREFIX) return null;
  return { family: 4, value: ip.value & 0xffffffffn };
}

export class IpRangeGuard {
  private readonly ranges: readonly CidrRange[];

  constructor(cidrs: readonly string[] = BLOCKED_IP_RANGES) {
    this.ranges = cidrs.map(parseCidr);
  }

  /**
   * Returns the first disallowed range containing `ip`. IPv4-mapped IPv6
   * addresses are also checked against the IPv4 ranges.
   */
  findBlockingRange(ip: string): CidrRange | undefined {
    const parsed = parseIp(ip);
    if (!parsed) return undefined;

    const direct = this.ranges.find((range) => containsParsed(range, parsed));
    if (direct) return direct;

    const mapped = extractMappedIpv4(parsed);
    if (!mapped) return undefined;
    return this.ranges.find((range) => containsParsed(range, mapped));
  }

  isBlocked(ip: string): boolean {
    return this.findBlockingRange(ip) !== undefined;
  }
}

const defaultGuard = new IpRangeGuard();

export function isBlockedIp(ip: string): boolean {
  return defaultGuard.isBlocked(ip);
}
