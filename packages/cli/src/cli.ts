#!/usr/bin/env node

import { isScanError, setLogLevel } from "@portsweep/engine";
import { parseArgs } from "./args.js";
import { runScanCommand, type ScanOptions } from "./commands/scan.js";
import { runInit, type InitOptions } from "./commands/init.js";
import { detectNoColor } from "./formatter.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mportsweep\x1b[0m — concurrent TCP port scanner
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  portsweep scan <target> --ports <spec>   Probe every host/port pair
  portsweep init [path]                    Write a .portsweep.yml with defaults
  portsweep version                        Print version

\x1b[1mTARGET (exactly one)\x1b[0m
  -n, --network <cidr>         IPv4 block, e.g. 192.168.1.0/24 (network/broadcast skipped)
  -f, --hosts-file <path>      One host per line; blank lines and # comments ignored
  --start-end <start> <end>    Inclusive IPv4 range, e.g. 192.168.1.10 192.168.1.50
  -H, --host <host>            Single IP or hostname

\x1b[1mSCAN OPTIONS\x1b[0m
  -p, --ports <spec>           Ports: 22 | 22,80 | 8000-8010 | 22,80,8000-8010 (required)
  --timeout <seconds>          Connect timeout per probe (default: 0.5)
  --workers <n>                Concurrent probes (default: 200)
  --ping-first                 Ping hosts first and skip the silent ones
  --ping-timeout <seconds>     Ping timeout (default: connect timeout, at least 1)
  --progress-every <n>         Log progress every n probes (default: 100)
  -o, --output <file>          Write results to .csv or .json
  --no-print                   Do not print open ports to the console
  --config <path>              Config file (default: ./.portsweep.yml)

\x1b[1mINIT OPTIONS\x1b[0m
  --force                      Overwrite an existing .portsweep.yml

\x1b[1mEXAMPLES\x1b[0m
  portsweep scan -n 192.168.1.0/24 -p 22,80,443          Scan a /24
  portsweep scan -f hosts.txt -p 1-1024 -o result.csv    Hosts file to CSV
  portsweep scan --start-end 10.0.0.1 10.0.0.50 -p 3389 --ping-first
  portsweep scan -H db.example.test -p 5432 --timeout 2

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  PORTSWEEP_LOG_LEVEL          Log level: debug, info, warn, error, silent
  NO_COLOR                     Disable coloured output

`);
}

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`portsweep v${VERSION}\n`);
    return;
  }

  const { command, args, positional } = parseArgs(rawArgs);

  if (args["verbose"] === "true") {
    setLogLevel("debug");
  } else if (args["quiet"] === "true") {
    setLogLevel("error");
  }

  switch (command) {
    case "version":
      process.stdout.write(`portsweep v${VERSION}\n`);
      break;

    case "init": {
      const initOpts: InitOptions = {
        path: positional[0] || ".",
        force: args["force"] === "true",
      };
      runInit(initOpts);
      break;
    }

    case "scan": {
      const scanOpts: ScanOptions = {
        network: args["network"],
        hostsFile: args["hosts-file"],
        start: args["start"],
        end: args["end"],
        host: args["host"],
        ports: args["ports"],
        timeout: args["timeout"],
        workers: args["workers"],
        pingFirst: args["ping-first"] === "true",
        pingTimeout: args["ping-timeout"],
        progressEvery: args["progress-every"],
        output: args["output"],
        noPrint: args["no-print"] === "true",
        config: args["config"],
        noColor: detectNoColor(),
      };
      await runScanCommand(scanOpts);
      break;
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (isScanError(err)) {
    process.stderr.write(`[portsweep] Error: ${err.message}\n`);
  } else {
    process.stderr.write(`[portsweep] Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  }
  process.exit(1);
});
