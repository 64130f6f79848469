import { describe, expect, it } from "vitest";
import { ArgsError, parseArgs } from "../src/args";

describe("parseArgs", () => {
  it("reads the command and flags in both spellings", () => {
    const { cmd, overrides } = parseArgs([
      "match",
      "--threshold",
      "0.8",
      "--gap=0.05",
      "--min-year",
      "1990",
      "--max-year=2020",
      "--model",
      "text-embedding-3-small",
      "--gloss",
      "first",
      "--output",
      "/tmp/seed.jsonl.gz",
      "--force",
    ]);

    expect(cmd).toBe("match");
    expect(overrides.match).toEqual({ threshold: 0.8, gap: 0.05 });
    expect(overrides.extract).toEqual({ minimumYear: 1990, maximumYear: 2020, glossEnd: "first" });
    expect(overrides.embedding).toEqual({ model: "text-embedding-3-small" });
    expect(overrides.io).toEqual({
      outputPath: "/tmp/seed.jsonl.gz",
      associatedPath: "/tmp/seed.jsonl.gz",
      force: true,
    });
  });

  it("maps path flags onto io settings", () => {
    const { overrides } = parseArgs(["associate", "--raw", "a.gz", "--input", "b.jsonl", "--mappings", "c.jsonl", "--buffer-size", "4096"]);
    expect(overrides.io).toEqual({
      rawPath: "a.gz",
      interimPath: "b.jsonl",
      mappingsPath: "c.jsonl",
      bufferSize: 4096,
    });
  });

  it("returns a null command for anything unknown", () => {
    expect(parseArgs([]).cmd).toBeNull();
    expect(parseArgs(["deploy"]).cmd).toBeNull();
  });

  it("rejects unknown flags, missing values and bad numbers", () => {
    expect(() => parseArgs(["run", "--verbose", "yes"])).toThrow("Unknown flag: --verbose");
    expect(() => parseArgs(["run", "--threshold"])).toThrow("--threshold expects a value");
    expect(() => parseArgs(["run", "--gap", "--force"])).toThrow(ArgsError);
    expect(() => parseArgs(["run", "--min-year", "soon"])).toThrow("--min-year expects a number, got \"soon\"");
    expect(() => parseArgs(["run", "--gloss", "middle"])).toThrow(ArgsError);
  });
});
