/**
 * ICMP echo through the platform `ping` binary.
 *
 * Used only by the liveness prefilter. A failed spawn, a non-zero exit or a
 * timeout all mean "not alive".
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "../logger.js";

const exec = promisify(execFile);

/** Arguments for a single echo request with a short wait, per platform. */
export function pingArgs(host: string, timeoutMs: number, platform: NodeJS.Platform = process.platform): string[] {
  if (platform === "win32") {
    return ["-n", "1", "-w", String(Math.max(1, Math.round(timeoutMs))), host];
  }
  if (platform === "darwin") {
    // macOS reads -W as milliseconds
    return ["-c", "1", "-W", String(Math.max(1, Math.round(timeoutMs))), "--", host];
  }
  return ["-c", "1", "-W", String(Math.max(1, Math.floor(timeoutMs / 1000))), "--", host];
}

export async function pingHost(host: string, timeoutMs: number): Promise<boolean> {
  try {
    await exec("ping", pingArgs(host, timeoutMs), {
      // Hard stop in case the binary ignores -W
      timeout: timeoutMs + 1000,
      windowsHide: true,
    });
    return true;
  } catch (err) {
    logger.debug(`[ping] ${host} not alive: ${(err as Error).message}`);
    return false;
  }
}
