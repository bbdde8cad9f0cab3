/**
 * Scan engine.
 *
 * Pipeline:
 *   1. (optional) ping every host, keep the ones that answer
 *   2. build the host x port task universe
 *   3. drain it with a bounded pool of TCP connect probes
 *   4. sort the open pairs by (host, port) and return them
 */

import { tcpProbe } from "./probes/tcp.js";
import { filterAliveHosts, type PingFn } from "./liveness.js";
import { runPool } from "./pool.js";
import { logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProbeTask {
  readonly host: string;
  readonly port: number;
}

export type OpenPair = ProbeTask;

export type ProbeOutcome = "open" | "not-open";

export interface ProbeResult extends ProbeTask {
  outcome: ProbeOutcome;
}

export type ProbeFn = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface ScanPortsOptions {
  /** Per-connect timeout in ms. */
  timeoutMs: number;
  /** Pool size. */
  workers: number;
  /** Report progress every N completions (and always at the last one). Default: 100. */
  progressEvery?: number;
  /** Called with (completed, total) at the progress cadence. */
  onProgress?: (completed: number, total: number) => void;
  /** Called once per open pair, in discovery order. */
  onOpen?: (pair: OpenPair) => void;
  /** Connect implementation. Defaults to a real TCP connect. */
  probe?: ProbeFn;
}

export interface ScanParams extends ScanPortsOptions {
  hosts: readonly string[];
  ports: readonly number[];
  /** Ping hosts first and skip the silent ones. */
  pingFirst?: boolean;
  /** Per-host echo timeout in ms. Default: max(1s, floor(timeoutMs to whole seconds)). */
  pingTimeoutMs?: number;
  /** Echo implementation for the prefilter. */
  ping?: PingFn;
}

/** Ephemeral state shared by the pool workers of one run. */
export interface ScanRun {
  total: number;
  completed: number;
  open: OpenPair[];
}

export interface ScanReport {
  /** Open pairs sorted by host, then port. */
  open: OpenPair[];
  /** Tasks in the universe. */
  total: number;
  /** Tasks that settled; equals `total` once the run returns. */
  completed: number;
  hostsScanned: number;
  ports: number;
  /** Hosts that answered the prefilter, when it ran. */
  aliveHosts?: string[];
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Order by host (plain string order), then numerically by port. */
export function comparePairs(a: OpenPair, b: OpenPair): number {
  if (a.host !== b.host) return a.host < b.host ? -1 : 1;
  return a.port - b.port;
}

export function sortPairs(pairs: readonly OpenPair[]): OpenPair[] {
  return pairs.slice().sort(comparePairs);
}

/** Host-major Cartesian product. Repeated hosts contribute once. */
export function buildTasks(hosts: readonly string[], ports: readonly number[]): ProbeTask[] {
  const tasks: ProbeTask[] = [];
  for (const host of new Set(hosts)) {
    for (const port of ports) tasks.push({ host, port });
  }
  return tasks;
}

async function runProbe(probe: ProbeFn, task: ProbeTask, timeoutMs: number): Promise<ProbeResult> {
  try {
    const open = await probe(task.host, task.port, timeoutMs);
    return { ...task, outcome: open ? "open" : "not-open" };
  } catch (err) {
    logger.debug(`[probe] ${task.host}:${task.port} threw: ${(err as Error).message}`);
    return { ...task, outcome: "not-open" };
  }
}

function pingTimeoutFor(timeoutMs: number): number {
  return Math.max(1, Math.floor(timeoutMs / 1000)) * 1000;
}

// ---------------------------------------------------------------------------
// Port phase
// ---------------------------------------------------------------------------

/**
 * Probe every (host, port) pair once under a bounded pool.
 *
 * Failures of any kind are "not-open"; nothing a single probe does can
 * reject this promise. Resolves after every task has settled.
 */
export async function scanPorts(
  hosts: readonly string[],
  ports: readonly number[],
  options: ScanPortsOptions,
): Promise<ScanRun> {
  const { timeoutMs, workers, progressEvery = 100, onProgress, onOpen, probe = tcpProbe } = options;
  const tasks = buildTasks(hosts, ports);
  const run: ScanRun = { total: tasks.length, completed: 0, open: [] };

  if (tasks.length === 0) return run;

  logger.info(
    `Probing ${ports.length} port(s) on ${tasks.length / ports.length} host(s): ${tasks.length} tasks, workers=${workers}`,
  );

  const seen = new Set<string>();
  const every = Math.max(1, Math.floor(progressEvery));

  await runPool(tasks, workers, async (task) => {
    const result = await runProbe(probe, task, timeoutMs);

    if (result.outcome === "open") {
      const key = `${task.host}\0${task.port}`;
      if (!seen.has(key)) {
        seen.add(key);
        run.open.push(task);
        onOpen?.(task);
      }
    }

    run.completed++;
    if (run.completed % every === 0 || run.completed === run.total) {
      onProgress?.(run.completed, run.total);
    }
  });

  run.open = sortPairs(run.open);
  return run;
}

// ---------------------------------------------------------------------------
// Main orchestrator
// ---------------------------------------------------------------------------

export async function runScan(params: ScanParams): Promise<ScanReport> {
  const { hosts, ports, pingFirst = false, pingTimeoutMs, ping, ...scanOptions } = params;
  const startTime = Date.now();

  let targets: readonly string[] = hosts;
  let aliveHosts: string[] | undefined;

  if (pingFirst) {
    aliveHosts = await filterAliveHosts(hosts, {
      timeoutMs: pingTimeoutMs ?? pingTimeoutFor(scanOptions.timeoutMs),
      workers: scanOptions.workers,
      ping,
    });
    targets = aliveHosts;
  }

  const run = await scanPorts(targets, ports, scanOptions);
  const durationMs = Date.now() - startTime;

  logger.debug(`[scan] ${run.completed}/${run.total} tasks in ${durationMs}ms — ${run.open.length} open`);

  return {
    open: run.open,
    total: run.total,
    completed: run.completed,
    hostsScanned: new Set(targets).size,
    ports: ports.length,
    aliveHosts,
    durationMs,
  };
}
