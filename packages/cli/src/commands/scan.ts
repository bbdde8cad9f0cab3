import { resolve } from "node:path";
import {
  runScan,
  expandTargets,
  requirePorts,
  formatPorts,
  writeResults,
  loadConfig,
  logger,
  isScanError,
  ScanError,
  DEFAULT_CONFIG,
  type PortsweepConfig,
  type ProbeFn,
  type PingFn,
  type ScanReport,
  type TargetSpec,
} from "@portsweep/engine";
import {
  formatOpenLine,
  formatProgress,
  formatReport,
  formatSummary,
  type FormatOptions,
} from "../formatter.js";

export interface ScanOptions {
  network?: string;
  hostsFile?: string;
  start?: string;
  end?: string;
  host?: string;
  ports?: string;
  /** Seconds, as typed. */
  timeout?: string;
  workers?: string;
  pingFirst: boolean;
  /** Seconds, as typed. */
  pingTimeout?: string;
  progressEvery?: string;
  output?: string;
  noPrint: boolean;
  /** Config file or directory; defaults to `cwd`. */
  config?: string;
  cwd?: string;
  noColor?: boolean;
  /** Test seams; default to real TCP connect and system ping. */
  probe?: ProbeFn;
  ping?: PingFn;
}

export interface ResolvedSettings {
  timeoutMs: number;
  workers: number;
  pingFirst: boolean;
  pingTimeoutMs?: number;
  progressEvery: number;
  maxHosts: number;
}

// ---------------------------------------------------------------------------
// Option handling
// ---------------------------------------------------------------------------

export function resolveTarget(options: ScanOptions): TargetSpec {
  const selected: TargetSpec[] = [];
  if (options.network !== undefined) selected.push({ kind: "cidr", cidr: options.network });
  if (options.hostsFile !== undefined) selected.push({ kind: "file", path: options.hostsFile });
  if (options.start !== undefined || options.end !== undefined) {
    if (options.start === undefined || options.end === undefined) {
      throw new ScanError("invalid_target_spec", "--start-end needs both a start and an end address");
    }
    selected.push({ kind: "range", start: options.start, end: options.end });
  }
  if (options.host !== undefined) selected.push({ kind: "host", host: options.host });

  if (selected.length !== 1) {
    throw new ScanError(
      "invalid_target_spec",
      "specify exactly one target: --network, --hosts-file, --start-end or --host",
    );
  }
  return selected[0];
}

function positiveNumber(raw: string | undefined, flag: string, integer: boolean): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!raw.trim() || !Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    const kind = integer ? "a positive integer" : "a positive number";
    throw new ScanError("invalid_option", `${flag} must be ${kind}, got '${raw}'`);
  }
  return value;
}

/** Seconds to whole milliseconds, never below 1ms (a zero socket timeout means none). */
export function toTimeoutMs(seconds: number): number {
  return Math.max(1, Math.ceil(seconds * 1000));
}

/** Flags override the config file; the config file overrides defaults. */
export function resolveSettings(options: ScanOptions, config: PortsweepConfig): ResolvedSettings {
  const timeout = positiveNumber(options.timeout, "--timeout", false) ?? config.timeout;
  const workers = positiveNumber(options.workers, "--workers", true) ?? config.workers;
  const pingTimeout = positiveNumber(options.pingTimeout, "--ping-timeout", false) ?? config.ping_timeout;
  const progressEvery = positiveNumber(options.progressEvery, "--progress-every", true) ?? config.progress_every;

  return {
    timeoutMs: toTimeoutMs(timeout),
    workers,
    pingFirst: options.pingFirst || config.ping_first,
    pingTimeoutMs: pingTimeout === null ? undefined : toTimeoutMs(pingTimeout),
    progressEvery,
    maxHosts: config.max_hosts,
  };
}

function readConfig(options: ScanOptions): PortsweepConfig {
  if (options.config) {
    const config = loadConfig(options.config);
    if (!config) {
      throw new ScanError("invalid_option", `config file not found: ${options.config}`);
    }
    return config;
  }
  return loadConfig(options.cwd ?? process.cwd()) ?? { ...DEFAULT_CONFIG };
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function runScanCommand(options: ScanOptions): Promise<ScanReport> {
  const config = readConfig(options);
  const settings = resolveSettings(options, config);
  const formatOpts: FormatOptions = { noColor: options.noColor };

  const cwd = options.cwd ?? process.cwd();

  let target = resolveTarget(options);
  if (target.kind === "file") target = { kind: "file", path: resolve(cwd, target.path) };
  const hosts = expandTargets(target, { maxHosts: settings.maxHosts });

  if (options.ports === undefined) {
    throw new ScanError("invalid_port_spec", "--ports is required (e.g. 22,80,8000-8010)");
  }
  const ports = requirePorts(options.ports);

  logger.debug(
    `[scan] ${hosts.length} host(s), ports ${formatPorts(ports)}, timeout=${settings.timeoutMs}ms, workers=${settings.workers}`,
  );

  const report = await runScan({
    hosts,
    ports,
    timeoutMs: settings.timeoutMs,
    workers: settings.workers,
    progressEvery: settings.progressEvery,
    pingFirst: settings.pingFirst,
    pingTimeoutMs: settings.pingTimeoutMs,
    probe: options.probe,
    ping: options.ping,
    onOpen: options.noPrint ? undefined : (pair) => logger.info(formatOpenLine(pair, formatOpts)),
    onProgress: (completed, total) => logger.info(formatProgress(completed, total, formatOpts)),
  });

  if (options.output) {
    const outputPath = resolve(cwd, options.output);
    try {
      const format = writeResults(report.open, outputPath);
      logger.info(`Results written to ${options.output} (${format}, ${report.open.length} open)`);
    } catch (err) {
      // Keep the results visible when only persistence failed
      if (isScanError(err) && err.code === "unsupported_output_format" && !options.noPrint) {
        process.stdout.write(formatReport(report, formatOpts));
      }
      throw err;
    }
  } else if (!options.noPrint) {
    process.stdout.write(formatReport(report, formatOpts));
  }

  logger.info(formatSummary(report));
  return report;
}
