/**
 * Target expansion — turns a CIDR block, an IPv4 range, a hosts file or a
 * single host into the ordered list of hosts to scan.
 */

import { readFileSync } from "node:fs";
import { ScanError } from "../errors.js";
import { formatIPv4, parseIPv4, prefixMask } from "./ipv4.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TargetSpec =
  | { kind: "cidr"; cidr: string }
  | { kind: "range"; start: string; end: string }
  | { kind: "file"; path: string }
  | { kind: "host"; host: string };

export interface ExpandOptions {
  /** Refuse to expand more than this many addresses. Default: 1,048,576 (a /12). */
  maxHosts?: number;
}

export const DEFAULT_MAX_HOSTS = 1 << 20;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function requireIPv4(literal: string, what: string): number {
  const value = parseIPv4(literal);
  if (value === null) {
    throw new ScanError("invalid_target_spec", `invalid ${what} '${literal}': not an IPv4 address`);
  }
  return value;
}

function enumerate(first: number, last: number, maxHosts: number, label: string): string[] {
  const count = last - first + 1;
  if (count > maxHosts) {
    throw new ScanError(
      "invalid_target_spec",
      `${label} expands to ${count} hosts, more than max_hosts (${maxHosts}); raise max_hosts in .portsweep.yml to scan it`,
      { count, maxHosts },
    );
  }

  const hosts: string[] = new Array(count);
  for (let i = 0; i < count; i++) hosts[i] = formatIPv4(first + i);
  return hosts;
}

// ---------------------------------------------------------------------------
// Expanders
// ---------------------------------------------------------------------------

/**
 * Every usable host address of an IPv4 CIDR block.
 *
 * Host bits in the address are masked off (`10.0.0.7/30` is `10.0.0.4/30`).
 * Network and broadcast addresses are excluded, except for /31 (both
 * addresses are hosts) and /32 (the single address).
 */
export function expandNetwork(cidr: string, options: ExpandOptions = {}): string[] {
  const { maxHosts = DEFAULT_MAX_HOSTS } = options;
  const trimmed = cidr.trim();
  const slash = trimmed.indexOf("/");

  const addressPart = slash === -1 ? trimmed : trimmed.slice(0, slash);
  const prefixPart = slash === -1 ? "32" : trimmed.slice(slash + 1);

  if (!/^\d{1,2}$/.test(prefixPart) || Number(prefixPart) > 32) {
    throw new ScanError("invalid_target_spec", `invalid network '${cidr}': prefix must be 0-32`);
  }
  const prefix = Number(prefixPart);
  const address = requireIPv4(addressPart, "network");

  const mask = prefixMask(prefix);
  const network = (address & mask) >>> 0;
  const broadcast = (network | ~mask) >>> 0;

  if (prefix >= 31) return enumerate(network, broadcast, maxHosts, `network ${cidr}`);
  return enumerate(network + 1, broadcast - 1, maxHosts, `network ${cidr}`);
}

/** Every address between two IPv4 endpoints, inclusive, ascending. Reversed endpoints are swapped. */
export function expandIpRange(startIp: string, endIp: string, options: ExpandOptions = {}): string[] {
  const { maxHosts = DEFAULT_MAX_HOSTS } = options;
  let start = requireIPv4(startIp, "start address");
  let end = requireIPv4(endIp, "end address");
  if (start > end) [start, end] = [end, start];
  return enumerate(start, end, maxHosts, `range ${startIp}-${endIp}`);
}

/** One host per line; blank lines and `#` comments skipped, order kept. */
export function loadHostsFromFile(path: string): string[] {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ScanError(
      "invalid_target_spec",
      `could not read hosts file ${path} — ${(err as Error).message}`,
      { path },
    );
  }

  const hosts: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const entry = line.trim();
    if (!entry || entry.startsWith("#")) continue;
    hosts.push(entry);
  }
  return hosts;
}

/**
 * Resolve a target spec to its host list.
 * Throws `empty_target_spec` when nothing is left to scan.
 */
export function expandTargets(spec: TargetSpec, options: ExpandOptions = {}): string[] {
  let hosts: string[];
  switch (spec.kind) {
    case "cidr":
      hosts = expandNetwork(spec.cidr, options);
      break;
    case "range":
      hosts = expandIpRange(spec.start, spec.end, options);
      break;
    case "file":
      hosts = loadHostsFromFile(spec.path);
      break;
    case "host":
      hosts = spec.host.trim() ? [spec.host.trim()] : [];
      break;
  }

  if (hosts.length === 0) {
    throw new ScanError("empty_target_spec", "no target hosts to scan");
  }
  return hosts;
}
