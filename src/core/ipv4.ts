/**
 * IPv4 literal parsing
 *
 * Accepts dotted-quad addresses and networks written as `a.b.c.d/len`,
 * `a.b.c.d/netmask` or `a.b.c.d/hostmask`. Networks must not have host
 * bits set.
 */

const ALL_ONES = 0xffffffff;

/**
 * Parse a dotted-quad address into an unsigned 32-bit integer.
 * Octets with leading zeros are rejected since they read as octal elsewhere.
 */
export function parseIPv4Address(value: string): number | null {
  const octets = value.split('.');
  if (octets.length !== 4) return null;

  let address = 0;
  for (const octet of octets) {
    if (!/^\d{1,3}$/.test(octet)) return null;
    if (octet.length > 1 && octet.startsWith('0')) return null;
    const n = parseInt(octet, 10);
    if (n > 255) return null;
    address = address * 256 + n;
  }
  return address;
}

function maskFromPrefixLength(length: number): number {
  return length === 0 ? 0 : (ALL_ONES << (32 - length)) >>> 0;
}

/**
 * Prefix length of a contiguous mask, or null when the bits are not contiguous
 */
function prefixLengthOfMask(mask: number): number | null {
  for (let length = 0; length <= 32; length++) {
    if (maskFromPrefixLength(length) === mask) return length;
  }
  return null;
}

/**
 * Resolve the part after `/` to a prefix length.
 * Takes a decimal length, a netmask (255.255.255.0) or a hostmask (0.0.0.255).
 */
function parsePrefix(value: string): number | null {
  if (/^\d+$/.test(value)) {
    const length = parseInt(value, 10);
    return length <= 32 ? length : null;
  }

  const mask = parseIPv4Address(value);
  if (mask === null) return null;

  const asNetmask = prefixLengthOfMask(mask);
  if (asNetmask !== null) return asNetmask;

  return prefixLengthOfMask((~mask) >>> 0);
}

/**
 * Check whether a host string is an IPv4 address or network literal
 */
export function isIPv4Literal(host: string): boolean {
  const slash = host.indexOf('/');
  const addressPart = slash === -1 ? host : host.slice(0, slash);

  const address = parseIPv4Address(addressPart);
  if (address === null) return false;
  if (slash === -1) return true;

  const prefixLength = parsePrefix(host.slice(slash + 1));
  if (prefixLength === null) return false;

  const hostBits = (~maskFromPrefixLength(prefixLength)) >>> 0;
  return (address & hostBits) === 0;
}
