// ---------------------------------------------------------------------------
// @portsweep/engine
//
// Concurrent TCP reachability scanning. Shared by the CLI and any embedder.
// ---------------------------------------------------------------------------

// Parsers
export {
  expandTargets,
  expandNetwork,
  expandIpRange,
  loadHostsFromFile,
  DEFAULT_MAX_HOSTS,
  type TargetSpec,
  type ExpandOptions,
} from "./parsers/target-expander.js";

export {
  parsePorts,
  requirePorts,
  formatPorts,
  MIN_PORT,
  MAX_PORT,
} from "./parsers/port-parser.js";

export { parseIPv4, formatIPv4 } from "./parsers/ipv4.js";

// Probes
export { tcpProbe } from "./probes/tcp.js";
export { pingHost, pingArgs } from "./probes/ping.js";

// Scanning
export { runPool } from "./pool.js";

export {
  filterAliveHosts,
  PING_CONCURRENCY_CAP,
  type PingFn,
  type LivenessOptions,
} from "./liveness.js";

export {
  runScan,
  scanPorts,
  buildTasks,
  sortPairs,
  comparePairs,
  type ProbeTask,
  type ProbeResult,
  type ProbeOutcome,
  type ProbeFn,
  type OpenPair,
  type ScanRun,
  type ScanReport,
  type ScanParams,
  type ScanPortsOptions,
} from "./scanner.js";

// Formatters
export {
  detectOutputFormat,
  formatCsv,
  formatJson,
  formatConsole,
  writeResults,
  type OutputFormat,
} from "./formatters/results.js";

// Config
export {
  loadConfig,
  didYouMean,
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  type PortsweepConfig,
} from "./config.js";

// Errors
export { ScanError, isScanError, type ScanErrorCode } from "./errors.js";

// Logger
export { logger, setLogLevel, type LogLevel } from "./logger.js";
