/**
 * Port specification parser.
 *
 * Accepts single ports, comma lists and hyphen ranges in any mix:
 * `22`, `22,80`, `8000-8010`, `22,80,8000-8010`.
 */

import { ScanError } from "../errors.js";

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

const INTEGER = /^\d+$/;

function parseInteger(raw: string, token: string): number {
  const text = raw.trim();
  if (!INTEGER.test(text)) {
    throw new ScanError("invalid_port_spec", `invalid port '${token}': not an integer or range`, { token });
  }
  return Number(text);
}

/**
 * Parse a port spec into a sorted, de-duplicated list.
 *
 * Values outside 1-65535 are dropped rather than rejected; only tokens that
 * are not numbers at all raise `invalid_port_spec`. The result may be empty.
 */
export function parsePorts(spec: string): number[] {
  const ports = new Set<number>();

  for (const rawToken of spec.split(",")) {
    const token = rawToken.trim();
    if (!token) continue;

    const dash = token.indexOf("-");
    if (dash === -1) {
      const port = parseInteger(token, token);
      if (port >= MIN_PORT && port <= MAX_PORT) ports.add(port);
      continue;
    }

    let lo = parseInteger(token.slice(0, dash), token);
    let hi = parseInteger(token.slice(dash + 1), token);
    if (lo > hi) [lo, hi] = [hi, lo];

    // Clamp before iterating so "1-99999999" stays cheap
    for (let p = Math.max(lo, MIN_PORT); p <= Math.min(hi, MAX_PORT); p++) ports.add(p);
  }

  return [...ports].sort((a, b) => a - b);
}

/** `parsePorts`, failing with `empty_port_spec` when no valid port remains. */
export function requirePorts(spec: string): number[] {
  const ports = parsePorts(spec);
  if (ports.length === 0) {
    throw new ScanError("empty_port_spec", `port spec '${spec}' contains no port in ${MIN_PORT}-${MAX_PORT}`);
  }
  return ports;
}

/** Render ports back to a spec string, collapsing consecutive runs: [22,80,81,82] -> "22,80-82". */
export function formatPorts(ports: readonly number[]): string {
  const parts: string[] = [];
  let i = 0;
  while (i < ports.length) {
    let j = i;
    while (j + 1 < ports.length && ports[j + 1] === ports[j] + 1) j++;
    parts.push(i === j ? String(ports[i]) : `${ports[i]}-${ports[j]}`);
    i = j + 1;
  }
  return parts.join(",");
}
