import { describe, it, expect } from "vitest";
import { parsePorts, requirePorts, formatPorts } from "../port-parser.js";
import { ScanError } from "../../errors.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScanError) return err.code;
    throw err;
  }
  return undefined;
}

describe("parsePorts", () => {
  it("parses a single port", () => {
    expect(parsePorts("22")).toEqual([22]);
  });

  it("parses a mix of values and ranges", () => {
    const ports = parsePorts("22,80,8000-8010");
    expect(ports).toHaveLength(13);
    expect(ports.slice(0, 3)).toEqual([22, 80, 8000]);
    expect(ports[12]).toBe(8010);
  });

  it("normalizes reversed ranges", () => {
    expect(parsePorts("80-22")).toEqual(parsePorts("22-80"));
    expect(parsePorts("80-22")).toHaveLength(59);
  });

  it("trims tokens and collapses duplicates and overlaps", () => {
    expect(parsePorts(" 22 , 80 ,22, 21-23 ")).toEqual([21, 22, 23, 80]);
  });

  it("ignores empty tokens", () => {
    expect(parsePorts(",,22,")).toEqual([22]);
    expect(parsePorts("")).toEqual([]);
  });

  it("silently drops values outside 1-65535", () => {
    expect(parsePorts("0,22,70000,65535")).toEqual([22, 65535]);
    expect(parsePorts("65530-70000")).toEqual([65530, 65531, 65532, 65533, 65534, 65535]);
    expect(parsePorts("0-2")).toEqual([1, 2]);
  });

  it("returns ascending order regardless of input order", () => {
    expect(parsePorts("443,22,8080,80")).toEqual([22, 80, 443, 8080]);
  });

  it("rejects non-numeric tokens", () => {
    expect(codeOf(() => parsePorts("abc"))).toBe("invalid_port_spec");
    expect(codeOf(() => parsePorts("22,http"))).toBe("invalid_port_spec");
    expect(codeOf(() => parsePorts("1-a"))).toBe("invalid_port_spec");
    expect(codeOf(() => parsePorts("-5"))).toBe("invalid_port_spec");
    expect(codeOf(() => parsePorts("1-2-3"))).toBe("invalid_port_spec");
    expect(codeOf(() => parsePorts("22.5"))).toBe("invalid_port_spec");
  });
});

describe("requirePorts", () => {
  it("returns the parsed ports", () => {
    expect(requirePorts("22,80")).toEqual([22, 80]);
  });

  it("fails with empty_port_spec when nothing valid remains", () => {
    expect(codeOf(() => requirePorts("0,70000"))).toBe("empty_port_spec");
    expect(codeOf(() => requirePorts(""))).toBe("empty_port_spec");
  });
});

describe("formatPorts", () => {
  it("collapses consecutive runs", () => {
    expect(formatPorts([22, 80, 81, 82, 443])).toBe("22,80-82,443");
    expect(formatPorts([])).toBe("");
  });

  it("round-trips through parsePorts", () => {
    for (const spec of ["22", "22,80,8000-8010", "80-22", "1-3,2-6,100", "65534-70000,0"]) {
      const once = parsePorts(spec);
      expect(parsePorts(formatPorts(once))).toEqual(once);
      expect(parsePorts(once.join(","))).toEqual(once);
    }
  });
});
