/**
 * Config loader — reads and validates `.portsweep.yml` scan defaults.
 * Uses Zod for schema validation; problems are reported as warnings and
 * the affected keys fall back to the built-in defaults.
 */

import { readFileSync, existsSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";
import { DEFAULT_MAX_HOSTS } from "./parsers/target-expander.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface PortsweepConfig {
  /** TCP connect timeout in seconds. */
  timeout: number;
  /** Concurrent probes. */
  workers: number;
  /** Ping hosts before probing ports. */
  ping_first: boolean;
  /** Ping timeout in seconds; null derives it from `timeout`. */
  ping_timeout: number | null;
  /** Progress cadence in completed tasks. */
  progress_every: number;
  /** Largest host list a CIDR block or range may expand to. */
  max_hosts: number;
}

export const CONFIG_FILENAME = ".portsweep.yml";

export const DEFAULT_CONFIG: PortsweepConfig = {
  timeout: 0.5,
  workers: 200,
  ping_first: false,
  ping_timeout: null,
  progress_every: 100,
  max_hosts: DEFAULT_MAX_HOSTS,
};

const KNOWN_KEYS = Object.keys(DEFAULT_CONFIG);

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const configSchema = z.object({
  timeout: z.number().positive().optional(),
  workers: z.number().int().positive().optional(),
  ping_first: z.boolean().optional(),
  ping_timeout: z.number().positive().nullable().optional(),
  progress_every: z.number().int().positive().optional(),
  max_hosts: z.number().int().positive().optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function configPathFor(location: string): string {
  const abs = resolve(location);
  if (existsSync(abs) && statSync(abs).isDirectory()) return join(abs, CONFIG_FILENAME);
  return abs;
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.portsweep.yml` from a directory, or a config file by path.
 * Returns the parsed config merged with defaults, or null if no file exists.
 */
export function loadConfig(location: string): PortsweepConfig | null {
  const configPath = configPathFor(location);

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`Warning: could not read ${configPath} — ${(err as Error).message}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILENAME} — ${(err as Error).message}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      const suggestion = didYouMean(key, KNOWN_KEYS);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`Warning: unknown config key '${key}'${hint}`);
    }
  }

  return {
    timeout: data.timeout ?? DEFAULT_CONFIG.timeout,
    workers: data.workers ?? DEFAULT_CONFIG.workers,
    ping_first: data.ping_first ?? DEFAULT_CONFIG.ping_first,
    ping_timeout: data.ping_timeout ?? DEFAULT_CONFIG.ping_timeout,
    progress_every: data.progress_every ?? DEFAULT_CONFIG.progress_every,
    max_hosts: data.max_hosts ?? DEFAULT_CONFIG.max_hosts,
  };
}
