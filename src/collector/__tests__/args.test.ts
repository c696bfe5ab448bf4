import { describe, expect, it } from "vitest";
import { parseArgs } from "../args.js";

describe("parseArgs", () => {
  it("collects new letters once by default", () => {
    expect(parseArgs([])).toEqual({ direction: "new", repeat: 1, dryRun: false, page: 1 });
  });

  it("reads every flag", () => {
    expect(parseArgs(["--direction=more", "--repeat=3", "--dry-run", "--page=2"])).toEqual({
      direction: "more",
      repeat: 3,
      dryRun: true,
      page: 2
    });
  });

  it("rejects unknown flags and bad values", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
    expect(() => parseArgs(["--direction=sideways"])).toThrow('--direction must be "new" or "more", got "sideways"');
    expect(() => parseArgs(["--repeat=0"])).toThrow('--repeat must be a positive integer, got "0"');
    expect(() => parseArgs(["--page=1.5"])).toThrow('--page must be a positive integer, got "1.5"');
  });
});
