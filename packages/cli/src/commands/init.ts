import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import { CONFIG_FILENAME, DEFAULT_CONFIG } from "@portsweep/engine";

export interface InitOptions {
  path: string;
  force: boolean;
}

function generateConfig(): string {
  return `# portsweep configuration
# Command-line flags override every value here.

# TCP connect timeout per probe, in seconds
timeout: ${DEFAULT_CONFIG.timeout}

# Concurrent probes
workers: ${DEFAULT_CONFIG.workers}

# Ping each host first and skip the ones that do not answer
ping_first: ${DEFAULT_CONFIG.ping_first}

# Ping timeout in seconds (default: the TCP timeout rounded down, at least 1)
# ping_timeout: 1

# Log progress every N completed probes
progress_every: ${DEFAULT_CONFIG.progress_every}

# Refuse CIDR blocks or ranges that expand to more hosts than this
max_hosts: ${DEFAULT_CONFIG.max_hosts}
`;
}

/**
 * Write a commented `.portsweep.yml` into the target directory.
 * Returns the path written, or null when an existing file was kept.
 */
export function runInit(options: InitOptions): string | null {
  const targetDir = resolve(options.path);

  if (!existsSync(targetDir) || !statSync(targetDir).isDirectory()) {
    process.stderr.write(`[portsweep] Error: ${targetDir} is not a directory\n`);
    process.exitCode = 1;
    return null;
  }

  const configPath = join(targetDir, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    process.stdout.write(`  skip  ${CONFIG_FILENAME} (already exists, use --force to overwrite)\n`);
    return null;
  }

  writeFileSync(configPath, generateConfig(), "utf-8");
  process.stdout.write(`  create  ${CONFIG_FILENAME}\n`);
  return configPath;
}
