import { describe, expect, it } from "vitest";
import type { ActionOutcome } from "./types.js";
import { emptySummary, formatBytes, formatSummary, recordAction, summarizePlan } from "./summary.js";

describe("formatBytes", () => {
  it("renders zero as 0B", () => {
    expect(formatBytes(0)).toBe("0B");
  });

  it("keeps two decimals below one kilobyte", () => {
    expect(formatBytes(512)).toBe("512.00B");
  });

  it("steps through binary units", () => {
    expect(formatBytes(1536)).toBe("1.50KB");
    expect(formatBytes(1024 * 1024)).toBe("1.00MB");
    expect(formatBytes(5 * 1024 ** 3)).toBe("5.00GB");
    expect(formatBytes(3 * 1024 ** 4)).toBe("3.00TB");
  });

  it("stays in TB past the last unit", () => {
    expect(formatBytes(1024 ** 5)).toBe("1024.00TB");
  });

  it("treats negative and non-finite sizes as empty", () => {
    expect(formatBytes(-10)).toBe("0B");
    expect(formatBytes(Number.NaN)).toBe("0B");
  });
});

describe("recordAction", () => {
  it("counts moves and deletes with their size", () => {
    const summary = emptySummary();
    recordAction(summary, "move", 100);
    recordAction(summary, "delete", 20);
    recordAction(summary, "move", 1);
    expect(summary).toEqual({ moved: 2, deleted: 1, compressed: 0, total_size_bytes: 121 });
  });

  it("ignores compress entirely", () => {
    const summary = emptySummary();
    recordAction(summary, "compress", 4096);
    expect(summary).toEqual(emptySummary());
  });
});

describe("summarizePlan", () => {
  it("counts only planned outcomes", () => {
    const planned: ActionOutcome[] = [
      { file: "a.jpg", action: "move", status: "planned", bytes: 10, target: "/t/images/a.jpg" },
      { file: "b.tmp", action: "delete", status: "planned", bytes: 5 },
      { file: "c.jpg", action: "move", status: "skipped", reason: "missing destination" },
      { file: "d.log", action: "compress", status: "noop" },
    ];
    expect(summarizePlan(planned)).toEqual({
      moved: 1,
      deleted: 1,
      compressed: 0,
      total_size_bytes: 15,
    });
  });
});

describe("formatSummary", () => {
  it("renders a live summary", () => {
    const text = formatSummary(
      { moved: 2, deleted: 1, compressed: 0, total_size_bytes: 2048 },
      { dryRun: false },
    );
    expect(text).toBe(
      [
        "--- SUMMARY ---",
        "Files moved: 2",
        "Files deleted: 1",
        "Files compressed: 0",
        "Total size: 2.00KB",
      ].join("\n"),
    );
  });

  it("phrases a dry run as intent", () => {
    const text = formatSummary(emptySummary(), { dryRun: true });
    expect(text).toBe(
      [
        "--- SUMMARY (DRY RUN) ---",
        "Files would be moved: 0",
        "Files would be deleted: 0",
        "Files would be compressed: 0",
        "Total size: 0B",
      ].join("\n"),
    );
  });
});
