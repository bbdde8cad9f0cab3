/**
 * IPv4 dotted-quad <-> 32-bit unsigned integer.
 */

const OCTET = /^(0|[1-9]\d{0,2})$/;

/** Parse a dotted-quad literal. Returns null for anything that is not a plain IPv4 address. */
export function parseIPv4(literal: string): number | null {
  const parts = literal.trim().split(".");
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!OCTET.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIPv4(value: number): string {
  return [
    Math.floor(value / 0x1000000) % 256,
    Math.floor(value / 0x10000) % 256,
    Math.floor(value / 0x100) % 256,
    value % 256,
  ].join(".");
}

/** Network mask for a prefix length, as an unsigned integer. */
export function prefixMask(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}
