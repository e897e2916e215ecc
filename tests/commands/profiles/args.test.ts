import { describe, expect, it } from "vitest";
import { parseProfileDedupeArgs, validateProfileDedupeArgs } from "../../../src/commands/profiles/args";

describe("profile dedupe args", () => {
  it("reads --prefix in either form or as the positional argument", () => {
    expect(parseProfileDedupeArgs(["--prefix", "S-1-5-21-100"])).toEqual({ prefix: "S-1-5-21-100" });
    expect(parseProfileDedupeArgs(["--prefix=S-1-5-21-100"])).toEqual({ prefix: "S-1-5-21-100" });
    expect(parseProfileDedupeArgs(["S-1-5-21-100"])).toEqual({ prefix: "S-1-5-21-100" });
  });

  it("requires a non-empty prefix", () => {
    expect(() => validateProfileDedupeArgs(parseProfileDedupeArgs([]))).toThrow("--prefix is required");
    expect(() => validateProfileDedupeArgs({ prefix: "  " })).toThrow("--prefix is required");
    expect(validateProfileDedupeArgs({ prefix: " S-1-5-21-100 " })).toEqual({ prefix: "S-1-5-21-100" });
  });
});
