/**
 * CIDR prefix parsing and containment tests for IPv4 and IPv6.
 *
 * Addresses are held as bigints so both families share one code path.
 */

export type IpVersion = 4 | 6;

export type IpAddress = {
  version: IpVersion;
  value: bigint;
};

export type CidrPrefix = {
  version: IpVersion;
  /** Network address (host bits cleared). */
  network: bigint;
  prefixLength: number;
};

const BITS: Record<IpVersion, number> = { 4: 32, 6: 128 };

function parseIpv4(text: string): bigint | null {
  const parts = text.split(".");
  if (parts.length !== 4) return null;
  let value = 0n;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = (value << 8n) | BigInt(octet);
  }
  return value;
}

function parseIpv6(text: string): bigint | null {
  const halves = text.split("::");
  if (halves.length > 2) return null;

  const toGroups = (s: string): string[] | null => {
    if (s === "") return [];
    const groups = s.split(":");
    return groups.every((g) => /^[0-9a-fA-F]{1,4}$/.test(g)) ? groups : null;
  };

  const head = toGroups(halves[0] ?? "");
  const tail = halves.length === 2 ? toGroups(halves[1] ?? "") : [];
  if (!head || !tail) return null;

  let groups: string[];
  if (halves.length === 2) {
    const missing = 8 - head.length - tail.length;
    if (missing < 1) return null;
    groups = [...head, ...Array.from({ length: missing }, () => "0"), ...tail];
  } else {
    groups = head;
  }
  if (groups.length !== 8) return null;

  let value = 0n;
  for (const group of groups) {
    value = (value << 16n) | BigInt(parseInt(group, 16));
  }
  return value;
}

/** Parse a bare IPv4 or IPv6 address. Returns null for anything else. */
export function parseIpAddress(text: string): IpAddress | null {
  const trimmed = text.trim();
  if (trimmed.includes(":")) {
    const value = parseIpv6(trimmed);
    return value === null ? null : { version: 6, value };
  }
  const value = parseIpv4(trimmed);
  return value === null ? null : { version: 4, value };
}

function mask(version: IpVersion, prefixLength: number): bigint {
  const bits = BITS[version];
  const all = (1n << BigInt(bits)) - 1n;
  const hostBits = BigInt(bits - prefixLength);
  return (all >> hostBits) << hostBits;
}

/**
 * Parse `address/length`. A bare address is treated as a host prefix
 * (/32 or /128). Host bits are cleared, so `10.0.1.7/24` yields `10.0.1.0/24`.
 */
export function parseCidr(text: string): CidrPrefix | null {
  const [addressPart, lengthPart, ...rest] = text.trim().split("/");
  if (addressPart === undefined || rest.length > 0) return null;

  const address = parseIpAddress(addressPart);
  if (!address) return null;

  const bits = BITS[address.version];
  let prefixLength = bits;
  if (lengthPart !== undefined) {
    if (!/^\d{1,3}$/.test(lengthPart)) return null;
    prefixLength = Number(lengthPart);
    if (prefixLength > bits) return null;
  }

  return {
    version: address.version,
    network: address.value & mask(address.version, prefixLength),
    prefixLength,
  };
}

/** True when `outer` contains `inner` and is strictly wider. */
export function isStrictSuperset(outer: CidrPrefix, inner: CidrPrefix): boolean {
  if (outer.version !== inner.version) return false;
  if (outer.prefixLength >= inner.prefixLength) return false;
  return (inner.network & mask(outer.version, outer.prefixLength)) === outer.network;
}

/** True when `address` falls inside `prefix`. */
export function containsAddress(prefix: CidrPrefix, address: IpAddress): boolean {
  if (prefix.version !== address.version) return false;
  return (address.value & mask(prefix.version, prefix.prefixLength)) === prefix.network;
}

/**
 * Address spaces may list several prefixes (`"10.0.0.0/16, 10.1.0.0/16"`).
 * Unparseable entries are skipped.
 */
export function parseAddressSpace(text: string | undefined): CidrPrefix[] {
  if (!text) return [];
  const prefixes: CidrPrefix[] = [];
  for (const entry of text.split(/[,\s]+/)) {
    if (!entry) continue;
    const prefix = parseCidr(entry);
    if (prefix) prefixes.push(prefix);
  }
  return prefixes;
}
