import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import net from "node:net";
import { mkdirSync, writeFileSync, readFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DEFAULT_CONFIG, type ProbeFn } from "@portsweep/engine";
import { runScanCommand, resolveSettings, resolveTarget, type ScanOptions } from "../commands/scan.js";

const TEST_DIR = join(tmpdir(), `portsweep-scan-test-${Date.now()}`);

function options(overrides: Partial<ScanOptions>): ScanOptions {
  return { pingFirst: false, noPrint: false, noColor: true, cwd: TEST_DIR, ...overrides };
}

function captureStdout() {
  return vi.spyOn(process.stdout, "write").mockImplementation(() => true);
}

function openOn(keys: string[]): ProbeFn {
  const open = new Set(keys);
  return async (host, port) => open.has(`${host}:${port}`);
}

describe("resolveTarget", () => {
  it("maps each selector to a target spec", () => {
    expect(resolveTarget(options({ network: "10.0.0.0/30" }))).toEqual({ kind: "cidr", cidr: "10.0.0.0/30" });
    expect(resolveTarget(options({ hostsFile: "h.txt" }))).toEqual({ kind: "file", path: "h.txt" });
    expect(resolveTarget(options({ start: "10.0.0.1", end: "10.0.0.3" }))).toEqual({
      kind: "range", start: "10.0.0.1", end: "10.0.0.3",
    });
    expect(resolveTarget(options({ host: "db.test" }))).toEqual({ kind: "host", host: "db.test" });
  });

  it("requires exactly one selector", () => {
    expect(() => resolveTarget(options({}))).toThrow("specify exactly one target");
    expect(() => resolveTarget(options({ host: "a", network: "10.0.0.0/30" }))).toThrow("specify exactly one target");
  });

  it("requires both ends of a range", () => {
    expect(() => resolveTarget(options({ start: "10.0.0.1" }))).toThrow("--start-end needs both");
  });
});

describe("resolveSettings", () => {
  it("lets flags override the config file", () => {
    const config = { ...DEFAULT_CONFIG, timeout: 1, workers: 10, progress_every: 7 };
    const settings = resolveSettings(options({ timeout: "2", pingTimeout: "3" }), config);
    expect(settings).toEqual({
      timeoutMs: 2000,
      workers: 10,
      pingFirst: false,
      pingTimeoutMs: 3000,
      progressEvery: 7,
      maxHosts: DEFAULT_CONFIG.max_hosts,
    });
  });

  it("falls back to defaults", () => {
    const settings = resolveSettings(options({}), DEFAULT_CONFIG);
    expect(settings.timeoutMs).toBe(500);
    expect(settings.workers).toBe(200);
    expect(settings.pingTimeoutMs).toBeUndefined();
  });

  it("rounds sub-millisecond timeouts up to 1ms", () => {
    const settings = resolveSettings(options({ timeout: "0.0004", pingTimeout: "0.0001" }), DEFAULT_CONFIG);
    expect(settings.timeoutMs).toBe(1);
    expect(settings.pingTimeoutMs).toBe(1);
    expect(resolveSettings(options({}), { ...DEFAULT_CONFIG, timeout: 0.0002 }).timeoutMs).toBe(1);
    expect(resolveSettings(options({ timeout: "0.0015" }), DEFAULT_CONFIG).timeoutMs).toBe(2);
  });

  it("rejects invalid numbers", () => {
    expect(() => resolveSettings(options({ workers: "abc" }), DEFAULT_CONFIG)).toThrow("--workers must be a positive integer");
    expect(() => resolveSettings(options({ workers: "1.5" }), DEFAULT_CONFIG)).toThrow("--workers must be a positive integer");
    expect(() => resolveSettings(options({ timeout: "0" }), DEFAULT_CONFIG)).toThrow("--timeout must be a positive number");
    expect(() => resolveSettings(options({ progressEvery: "" }), DEFAULT_CONFIG)).toThrow("--progress-every");
  });
});

describe("runScanCommand", () => {
  beforeEach(() => {
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("prints sorted open pairs to stdout", async () => {
    const stdoutSpy = captureStdout();
    const report = await runScanCommand(options({
      start: "10.0.0.2",
      end: "10.0.0.1",
      ports: "80,22",
      probe: openOn(["10.0.0.2:80", "10.0.0.1:22"]),
    }));

    expect(report.total).toBe(4);
    expect(stdoutSpy).toHaveBeenCalledWith("10.0.0.1:22\n10.0.0.2:80\n");
  });

  it("hands the probe a non-zero timeout", async () => {
    captureStdout();
    const probe = vi.fn<ProbeFn>(async () => false);
    await runScanCommand(options({ host: "10.0.0.1", ports: "22", timeout: "0.0004", probe }));

    expect(probe).toHaveBeenCalledWith("10.0.0.1", 22, 1);
  });

  it("prints nothing to stdout with --no-print", async () => {
    const stdoutSpy = captureStdout();
    await runScanCommand(options({ host: "10.0.0.1", ports: "22", noPrint: true, probe: openOn(["10.0.0.1:22"]) }));
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it("writes a CSV file when --output ends in .csv", async () => {
    const stdoutSpy = captureStdout();
    await runScanCommand(options({
      network: "10.9.0.0/30",
      ports: "443,22",
      output: "result.csv",
      probe: openOn(["10.9.0.2:443", "10.9.0.1:22"]),
    }));

    expect(readFileSync(join(TEST_DIR, "result.csv"), "utf-8")).toBe("host,port\n10.9.0.1,22\n10.9.0.2,443\n");
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it("writes a JSON file when --output ends in .json", async () => {
    await runScanCommand(options({
      host: "10.0.0.1",
      ports: "22,80",
      output: "result.json",
      probe: openOn(["10.0.0.1:80"]),
    }));

    expect(JSON.parse(readFileSync(join(TEST_DIR, "result.json"), "utf-8"))).toEqual([{ host: "10.0.0.1", port: 80 }]);
  });

  it("finishes the scan, prints results, then fails on an unsupported extension", async () => {
    const stdoutSpy = captureStdout();
    const probe = vi.fn(openOn(["10.0.0.1:22"]));

    await expect(
      runScanCommand(options({ host: "10.0.0.1", ports: "22", output: "result.txt", probe })),
    ).rejects.toMatchObject({ code: "unsupported_output_format" });

    expect(probe).toHaveBeenCalledTimes(1);
    expect(stdoutSpy).toHaveBeenCalledWith("10.0.0.1:22\n");
    expect(existsSync(join(TEST_DIR, "result.txt"))).toBe(false);
  });

  it("resolves a relative hosts file against cwd", async () => {
    writeFileSync(join(TEST_DIR, "hosts.txt"), "# lab\nalpha.test\nbeta.test\n");

    const report = await runScanCommand(options({
      hostsFile: "hosts.txt",
      ports: "22",
      probe: openOn(["beta.test:22"]),
    }));

    expect(report.hostsScanned).toBe(2);
    expect(report.open).toEqual([{ host: "beta.test", port: 22 }]);
  });

  it("applies ping_first from .portsweep.yml", async () => {
    const stdoutSpy = captureStdout();
    writeFileSync(join(TEST_DIR, ".portsweep.yml"), "ping_first: true\n");
    const probe = vi.fn<ProbeFn>();

    const report = await runScanCommand(options({
      host: "10.0.0.1",
      ports: "22",
      probe,
      ping: async () => false,
    }));

    expect(report.aliveHosts).toEqual([]);
    expect(report.total).toBe(0);
    expect(probe).not.toHaveBeenCalled();
    expect(stdoutSpy).toHaveBeenCalledWith("No open ports found.\n");
  });

  it("rejects a missing --config file", async () => {
    await expect(
      runScanCommand(options({ host: "10.0.0.1", ports: "22", config: join(TEST_DIR, "missing.yml") })),
    ).rejects.toMatchObject({ code: "invalid_option" });
  });

  it("requires --ports", async () => {
    await expect(runScanCommand(options({ host: "10.0.0.1" }))).rejects.toMatchObject({ code: "invalid_port_spec" });
  });

  it("rejects port specs with no valid port", async () => {
    await expect(runScanCommand(options({ host: "10.0.0.1", ports: "0,70000" }))).rejects.toMatchObject({
      code: "empty_port_spec",
    });
  });

  it("rejects a malformed network before probing", async () => {
    const probe = vi.fn<ProbeFn>();
    await expect(runScanCommand(options({ network: "10.0.0.0/40", ports: "22", probe }))).rejects.toMatchObject({
      code: "invalid_target_spec",
    });
    expect(probe).not.toHaveBeenCalled();
  });

  it("rejects an empty hosts file", async () => {
    writeFileSync(join(TEST_DIR, "empty.txt"), "# nothing\n");
    await expect(runScanCommand(options({ hostsFile: "empty.txt", ports: "22" }))).rejects.toMatchObject({
      code: "empty_target_spec",
    });
  });
});

describe("runScanCommand against a local listener", () => {
  const server = net.createServer((socket) => socket.destroy());
  let port = 0;

  beforeAll(async () => {
    port = await new Promise<number>((resolve, reject) => {
      server.once("error", reject);
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (address && typeof address === "object") resolve(address.port);
        else reject(new Error("server has no TCP address"));
      });
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("finds the listening port with real TCP probes", async () => {
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await runScanCommand(options({ host: "127.0.0.1", ports: String(port), output: "local.csv", timeout: "1" }));

    expect(readFileSync(join(TEST_DIR, "local.csv"), "utf-8")).toBe(`host,port\n127.0.0.1,${port}\n`);
  });
});
