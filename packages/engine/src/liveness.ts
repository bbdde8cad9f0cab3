/**
 * Liveness prefilter — drops hosts that do not answer an ICMP echo before
 * the port phase starts.
 */

import { pingHost } from "./probes/ping.js";
import { runPool } from "./pool.js";
import { logger } from "./logger.js";

/** Ceiling on concurrent ping processes, whatever the requested worker count. */
export const PING_CONCURRENCY_CAP = 200;

export type PingFn = (host: string, timeoutMs: number) => Promise<boolean>;

export interface LivenessOptions {
  /** Per-host echo timeout in ms. */
  timeoutMs: number;
  /** Requested worker count; capped at PING_CONCURRENCY_CAP. */
  workers: number;
  /** Echo implementation. Defaults to the system `ping`. */
  ping?: PingFn;
}

/**
 * Hosts that answered, in their original order. A ping that throws counts
 * as not alive; this never rejects.
 */
export async function filterAliveHosts(hosts: readonly string[], options: LivenessOptions): Promise<string[]> {
  const { timeoutMs, workers, ping = pingHost } = options;
  const alive = new Array<boolean>(hosts.length).fill(false);
  const concurrency = Math.min(PING_CONCURRENCY_CAP, workers);

  logger.info(`Pinging ${hosts.length} host(s) to find live targets (concurrency=${concurrency})...`);

  await runPool(hosts, concurrency, async (host, index) => {
    try {
      alive[index] = await ping(host, timeoutMs);
    } catch (err) {
      logger.debug(`[ping] ${host} failed: ${(err as Error).message}`);
    }
  });

  const result = hosts.filter((_, i) => alive[i]);
  logger.info(`Live hosts: ${result.length}/${hosts.length}`);
  return result;
}
