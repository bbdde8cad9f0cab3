import { ScanError } from "@portsweep/engine";

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

const BOOLEAN_FLAGS = new Set([
  "help", "version", "ping-first", "no-print", "verbose", "quiet", "force",
]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "network", "hosts-file", "start-end", "start", "end", "host",
  "ports", "timeout", "workers", "ping-timeout", "progress-every",
  "output", "config",
]);

const SHORT_FLAGS: Record<string, string> = {
  h: "help",
  v: "version",
  n: "network",
  f: "hosts-file",
  H: "host",
  p: "ports",
  o: "output",
};

function takeValue(argv: string[], i: number, flag: string): string {
  if (i >= argv.length || argv[i].startsWith("--")) {
    throw new ScanError("invalid_option", `${flag} requires a value`);
  }
  return argv[i];
}

/**
 * Split argv (without the node/script prefix) into a command, flag values
 * and positionals. Boolean flags are stored as "true"; `--start-end A B`
 * is stored as `start` and `end`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];

    let key: string;
    let flag: string;
    if (arg.startsWith("--")) {
      key = arg.slice(2);
      flag = arg;
      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[portsweep] Warning: unknown flag --${key}\n`);
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const short = arg.slice(1);
      key = SHORT_FLAGS[short] ?? short;
      flag = arg;
    } else {
      positional.push(arg);
      continue;
    }

    if (BOOLEAN_FLAGS.has(key)) {
      args[key] = "true";
    } else if (key === "start-end") {
      args["start"] = takeValue(argv, ++i, flag);
      args["end"] = takeValue(argv, ++i, flag);
    } else {
      args[key] = takeValue(argv, ++i, flag);
    }
  }

  return { command, args, positional };
}
