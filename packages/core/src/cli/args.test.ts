import { describe, it, expect } from "vitest";
import { UsageError } from "../internal/errors.js";
import { parseArgs } from "./args.js";

describe("cli/args", () => {
  it("collects positionals and flags", () => {
    expect(parseArgs(["a.json", "b.json", "-o", "out.json", "--exclusions=ex.json", "-q"])).toEqual({
      _: ["a.json", "b.json"],
      out: "out.json",
      exclusions: "ex.json",
      quiet: true,
      help: false,
    });
  });

  it("accepts separated long values and the help flag", () => {
    const args = parseArgs(["--out", "x.json", "--help"]);
    expect(args.out).toBe("x.json");
    expect(args.help).toBe(true);
  });

  it("treats everything after -- as positional", () => {
    expect(parseArgs(["--", "-weird.json", "--out"])._).toEqual(["-weird.json", "--out"]);
  });

  it("rejects unknown options and missing values", () => {
    expect(() => parseArgs(["--verbose"])).toThrow(new UsageError("Unknown option: --verbose"));
    expect(() => parseArgs(["-x"])).toThrow("Unknown option: -x");
    expect(() => parseArgs(["--out"])).toThrow("Option --out requires a value");
    expect(() => parseArgs(["-o", "--quiet"])).toThrow("Option -o requires a value");
  });
});
