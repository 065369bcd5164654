import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./argv.js";

describe("parseCliArgs", () => {
  it("parses a full run", () => {
    expect(
      parseCliArgs([
        "--dir",
        "~/Downloads",
        "--config",
        "rules.json",
        "--dry-run",
        "-y",
        "--log-file",
        "1",
        "--strict",
      ]),
    ).toEqual({
      kind: "run",
      options: {
        dir: "~/Downloads",
        config: "rules.json",
        dryRun: true,
        yes: true,
        interactive: false,
        logFile: "1",
        strict: true,
      },
    });
  });

  it("defaults every flag to off", () => {
    expect(parseCliArgs(["--dir=/tmp/x"])).toEqual({
      kind: "run",
      options: {
        dir: "/tmp/x",
        config: undefined,
        dryRun: false,
        yes: false,
        interactive: false,
        logFile: undefined,
        strict: false,
      },
    });
  });

  it("accepts the short interactive flag", () => {
    const parsed = parseCliArgs(["--dir", ".", "-i"]);
    expect(parsed.kind === "run" && parsed.options.interactive).toBe(true);
  });

  it("requires --dir", () => {
    expect(parseCliArgs([])).toEqual({ kind: "error", message: "--dir is required" });
    expect(parseCliArgs(["--dir", "  "])).toEqual({ kind: "error", message: "--dir is required" });
  });

  it("rejects unknown flags and stray arguments", () => {
    expect(parseCliArgs(["--dir", ".", "--force"]).kind).toBe("error");
    expect(parseCliArgs(["--dir", ".", "extra"]).kind).toBe("error");
  });

  it("lets help and version win over missing options", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["-V"])).toEqual({ kind: "version" });
  });
});
