import { formatConsole, type OpenPair, type ScanReport } from "@portsweep/engine";

// ANSI escape codes — no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

export interface FormatOptions {
  noColor?: boolean;
}

function c(color: string, text: string, options: FormatOptions): string {
  return options.noColor ? text : `${color}${text}${RESET}`;
}

/** Colour is off when stdout is not a terminal or NO_COLOR is set. */
export function detectNoColor(): boolean {
  return !process.stdout.isTTY || Boolean(process.env.NO_COLOR);
}

export function formatOpenLine(pair: OpenPair, options: FormatOptions = {}): string {
  return `${c(GREEN, "[+]", options)} ${pair.host}:${pair.port} open`;
}

export function progressBar(completed: number, total: number, options: FormatOptions = {}, width = 20): string {
  const pct = total > 0 ? completed / total : 0;
  const filled = Math.round(pct * width);
  const empty = width - filled;
  return `[${c(GREEN, "█".repeat(filled), options)}${c(DIM, "░".repeat(empty), options)}]`;
}

export function formatProgress(completed: number, total: number, options: FormatOptions = {}): string {
  const pct = total > 0 ? Math.floor((completed / total) * 100) : 100;
  return `Progress ${progressBar(completed, total, options)} ${completed}/${total} (${pct}%)`;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export function formatSummary(report: ScanReport): string {
  const plural = report.open.length === 1 ? "" : "s";
  const alive = report.aliveHosts ? `, ${report.aliveHosts.length} alive` : "";
  return (
    `Scan complete: ${report.open.length} open port${plural} — ` +
    `${report.hostsScanned} host(s)${alive} × ${report.ports} port(s), ` +
    `${report.completed}/${report.total} probes in ${formatDuration(report.durationMs)}`
  );
}

/**
 * Render the sorted open pairs for stdout. Without colour this is exactly
 * the plain `host:port` listing, so it stays pipe-friendly.
 */
export function formatReport(report: ScanReport, options: FormatOptions = {}): string {
  if (options.noColor) return formatConsole(report.open);

  const lines: string[] = [];
  lines.push("");
  lines.push(c(BOLD + CYAN, `  OPEN PORTS (${report.open.length})`, options));
  lines.push("");

  if (report.open.length === 0) {
    lines.push(c(YELLOW, "  No open ports found.", options));
  } else {
    const width = Math.max(...report.open.map((p) => p.host.length));
    for (const pair of report.open) {
      lines.push(`  ${pair.host.padEnd(width)}  ${c(GREEN, String(pair.port), options)}`);
    }
  }

  lines.push("");
  return lines.join("\n");
}
