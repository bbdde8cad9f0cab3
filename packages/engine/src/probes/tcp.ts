/**
 * TCP connect probe.
 */

import net from "node:net";

/**
 * Attempt a TCP handshake with `host:port`.
 * Resolves true once connected, false on timeout, refusal, unreachable
 * network or a failed DNS lookup. Never rejects.
 */
export function tcpProbe(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (open: boolean) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(open);
    };

    // setTimeout(0) disables the idle timer
    socket.setTimeout(Math.max(1, timeoutMs));
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));

    socket.connect(port, host);
  });
}
