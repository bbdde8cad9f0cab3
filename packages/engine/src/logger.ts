/**
 * Minimal structured logger for @portsweep/engine.
 *
 * Respects PORTSWEEP_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for scan results.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
export type LogLevel = keyof typeof LEVELS;

function isLevel(raw: string): raw is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

let level = parseLevel(process.env.PORTSWEEP_LOG_LEVEL);

/** Override the level picked up from the environment (used by --verbose / --quiet). */
export function setLogLevel(next: LogLevel): void {
  level = LEVELS[next];
}

export const logger = {
  debug(msg: string) { if (level <= LEVELS.debug) process.stderr.write(`[portsweep] ${msg}\n`); },
  info(msg: string)  { if (level <= LEVELS.info)  process.stderr.write(`[portsweep] ${msg}\n`); },
  warn(msg: string)  { if (level <= LEVELS.warn)  process.stderr.write(`[portsweep] ${msg}\n`); },
  error(msg: string) { if (level <= LEVELS.error) process.stderr.write(`[portsweep] ${msg}\n`); },
};
