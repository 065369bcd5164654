import { describe, expect, it, vi } from "vitest";
import type { FileEntry, FileStat, Rule } from "./types.js";
import { createMemorySink } from "../logging/sink.js";
import { compileRules, findMatchingRule, matchFiles, parseRuleDate } from "./match.js";
import { fileExtension } from "./scan.js";

function fakeEntry(name: string, overrides?: Partial<FileStat>): FileEntry {
  const stat: FileStat = {
    size: 10,
    modified: new Date("2024-01-05T00:00:00Z"),
    created: new Date("2024-01-01T00:00:00Z"),
    created_source: "birthtime",
    ...overrides,
  };
  return {
    name,
    abs_path: `/virtual/${name}`,
    ext: fileExtension(name),
    stat: vi.fn(async () => stat),
  };
}

describe("parseRuleDate", () => {
  it("reads a date-time without offset as UTC", () => {
    expect(parseRuleDate("2024-01-01T00:00:00")?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  it("reads a bare date as midnight UTC", () => {
    expect(parseRuleDate("2024-01-31")?.toISOString()).toBe("2024-01-31T00:00:00.000Z");
  });

  it("applies explicit offsets", () => {
    expect(parseRuleDate("2024-01-01T02:00:00+02:00")?.toISOString()).toBe(
      "2024-01-01T00:00:00.000Z",
    );
    expect(parseRuleDate("2024-01-01T00:00:00-0130")?.toISOString()).toBe(
      "2024-01-01T01:30:00.000Z",
    );
  });

  it("accepts a space separator, minutes-only time and fractions", () => {
    expect(parseRuleDate("2024-01-01 12:30")?.toISOString()).toBe("2024-01-01T12:30:00.000Z");
    expect(parseRuleDate("2024-01-01T10:00:00.5Z")?.toISOString()).toBe(
      "2024-01-01T10:00:00.500Z",
    );
  });

  it("accepts an hour-only time and hour-only offsets", () => {
    expect(parseRuleDate("2024-01-05T10")?.toISOString()).toBe("2024-01-05T10:00:00.000Z");
    expect(parseRuleDate("2024-01-05T10+02")?.toISOString()).toBe("2024-01-05T08:00:00.000Z");
  });

  it("accepts the basic format", () => {
    expect(parseRuleDate("20240105")?.toISOString()).toBe("2024-01-05T00:00:00.000Z");
    expect(parseRuleDate("20240105T1030")?.toISOString()).toBe("2024-01-05T10:30:00.000Z");
    expect(parseRuleDate("20240105T103015Z")?.toISOString()).toBe("2024-01-05T10:30:15.000Z");
  });

  it("knows leap years", () => {
    expect(parseRuleDate("2024-02-29")?.toISOString()).toBe("2024-02-29T00:00:00.000Z");
    expect(parseRuleDate("2023-02-29")).toBeNull();
  });

  it("rejects malformed values", () => {
    for (const bad of ["not-a-date", "2024-13-01", "2024-01-32", "2024-01-01T24:00:00", "01/02/2024", "", "2024-0105", "20241301", "2024-01-05T1"]) {
      expect(parseRuleDate(bad)).toBeNull();
    }
  });
});

describe("matchFiles", () => {
  it("picks the first rule that matches and stops there", async () => {
    const sink = createMemorySink();
    const rules: Rule[] = [
      { action: "move", destination: "images", types: ["jpg"] },
      { action: "delete" },
      { action: "compress", types: ["jpg"] },
    ];
    const { matches } = await matchFiles([fakeEntry("a.jpg"), fakeEntry("b.txt")], rules, sink);
    expect(matches.map((m) => [m.file.name, m.rule_index])).toEqual([
      ["a.jpg", 0],
      ["b.txt", 1],
    ]);
  });

  it("matches every file with a rule that has no conditions", async () => {
    const files = [fakeEntry("a.jpg"), fakeEntry("Makefile"), fakeEntry(".env")];
    const { matches } = await matchFiles(files, [{ action: "delete" }], createMemorySink());
    expect(matches.map((m) => m.file.name)).toEqual(["a.jpg", "Makefile", ".env"]);
  });

  it("compares extensions case-insensitively", async () => {
    const { matches } = await matchFiles(
      [fakeEntry("PHOTO.JPG")],
      [{ action: "move", destination: "x", types: ["Jpg"] }],
      createMemorySink(),
    );
    expect(matches).toHaveLength(1);
  });

  it("matches nothing with an empty type list", async () => {
    const { matches } = await matchFiles(
      [fakeEntry("a.jpg")],
      [{ action: "delete", types: [] }],
      createMemorySink(),
    );
    expect(matches).toEqual([]);
  });

  it("leaves out files no rule matches", async () => {
    const { matches } = await matchFiles(
      [fakeEntry("a.txt")],
      [{ action: "delete", types: ["tmp"] }],
      createMemorySink(),
    );
    expect(matches).toEqual([]);
  });

  it("treats both date bounds as inclusive", async () => {
    const rule: Rule = {
      action: "delete",
      date_range: { modified: { start: "2024-01-01T00:00:00", end: "2024-01-31T23:59:59" } },
    };
    const atStart = fakeEntry("start.txt", { modified: new Date("2024-01-01T00:00:00Z") });
    const atEnd = fakeEntry("end.txt", { modified: new Date("2024-01-31T23:59:59Z") });
    const before = fakeEntry("before.txt", { modified: new Date("2023-12-31T23:59:59.999Z") });
    const after = fakeEntry("after.txt", { modified: new Date("2024-01-31T23:59:59.001Z") });

    const { matches } = await matchFiles([atStart, atEnd, before, after], [rule], createMemorySink());
    expect(matches.map((m) => m.file.name)).toEqual(["start.txt", "end.txt"]);
  });

  it("treats a missing bound as unbounded", async () => {
    const rule: Rule = { action: "delete", date_range: { modified: { end: "2020-01-01" } } };
    const old = fakeEntry("old.txt", { modified: new Date("1999-06-01T00:00:00Z") });
    const recent = fakeEntry("new.txt", { modified: new Date("2021-06-01T00:00:00Z") });
    const { matches } = await matchFiles([old, recent], [rule], createMemorySink());
    expect(matches.map((m) => m.file.name)).toEqual(["old.txt"]);
  });

  it("requires every present condition", async () => {
    const rule: Rule = {
      action: "move",
      destination: "x",
      types: ["jpg"],
      date_range: {
        modified: { start: "2024-01-01" },
        created: { end: "2023-12-31" },
      },
    };
    const createdLate = fakeEntry("late.jpg", { created: new Date("2024-01-02T00:00:00Z") });
    const createdEarly = fakeEntry("early.jpg", { created: new Date("2023-06-01T00:00:00Z") });
    const { matches } = await matchFiles([createdLate, createdEarly], [rule], createMemorySink());
    expect(matches.map((m) => m.file.name)).toEqual(["early.jpg"]);
  });

  it("skips a rule with a malformed date and warns once", async () => {
    const sink = createMemorySink();
    const rules: Rule[] = [
      { action: "delete", date_range: { modified: { start: "2024-13-45" } } },
      { action: "move", destination: "other" },
    ];
    const { matches, skipped_rules } = await matchFiles(
      [fakeEntry("a.txt"), fakeEntry("b.txt")],
      rules,
      sink,
    );
    expect(matches.map((m) => m.rule_index)).toEqual([1, 1]);
    expect(skipped_rules).toEqual([0]);
    expect(sink.messages("warn")).toEqual([
      "Skipping invalid date range in rule #1: invalid modified.start date '2024-13-45'",
    ]);
  });

  it("names labelled rules in warnings", () => {
    const sink = createMemorySink();
    compileRules(
      [{ action: "delete", label: "old screenshots", date_range: { created: { end: "yesterday" } } }],
      sink,
    );
    expect(sink.messages("warn")).toEqual([
      "Skipping invalid date range in rule #1 (old screenshots): invalid created.end date 'yesterday'",
    ]);
  });

  it("does not stat files for type-only rules", async () => {
    const file = fakeEntry("a.jpg");
    await matchFiles([file], [{ action: "move", destination: "x", types: ["jpg"] }], createMemorySink());
    expect(file.stat).not.toHaveBeenCalled();
  });

  it("reports the ctime fallback once per run", async () => {
    const sink = createMemorySink();
    const files = [
      fakeEntry("a.txt", { created_source: "ctime" }),
      fakeEntry("b.txt", { created_source: "ctime" }),
    ];
    const result = await matchFiles(
      files,
      [{ action: "delete", date_range: { created: { start: "2000-01-01" } } }],
      sink,
    );
    expect(result.matches).toHaveLength(2);
    expect(result.created_time_fallback).toBe(true);
    expect(sink.messages("warn")).toEqual([
      "File creation time is not available on this platform; 'created' filters use the metadata-change time instead.",
    ]);
  });

  it("does not flag the fallback when birth time is available", async () => {
    const result = await matchFiles(
      [fakeEntry("a.txt")],
      [{ action: "delete", date_range: { created: { start: "2000-01-01" } } }],
      createMemorySink(),
    );
    expect(result.created_time_fallback).toBe(false);
  });

  it("drops a file whose metadata can no longer be read", async () => {
    const sink = createMemorySink();
    const vanished: FileEntry = {
      name: "gone.txt",
      abs_path: "/virtual/gone.txt",
      ext: "txt",
      stat: vi.fn(async () => {
        throw Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
      }),
    };
    const { matches } = await matchFiles(
      [vanished, fakeEntry("ok.txt")],
      [{ action: "delete", date_range: { modified: { start: "2000-01-01" } } }, { action: "compress" }],
      sink,
    );
    expect(matches.map((m) => [m.file.name, m.rule_index])).toEqual([["ok.txt", 0]]);
    expect(sink.messages("warn")).toEqual(["Could not read metadata for 'gone.txt': ENOENT: no such file"]);
  });

  it("always returns the lowest satisfying rule index", async () => {
    const ruleSets: Rule[][] = [
      [{ action: "compress", types: ["png"] }, { action: "delete", types: ["jpg", "png"] }, { action: "delete" }],
      [
        { action: "delete", date_range: { modified: { start: "2025-01-01" } } },
        { action: "compress", types: ["txt"] },
        { action: "move", destination: "x", date_range: { modified: { end: "2024-02-01" } } },
      ],
      [{ action: "delete", types: ["gif"] }],
    ];
    const files = [
      fakeEntry("a.png"),
      fakeEntry("b.jpg"),
      fakeEntry("c.txt", { modified: new Date("2025-06-01T00:00:00Z") }),
      fakeEntry("d.gif"),
    ];

    for (const rules of ruleSets) {
      const compiled = compileRules(rules, createMemorySink());
      const { matches } = await matchFiles(files, rules, createMemorySink());
      for (const file of files) {
        let expected: number | null = null;
        for (const c of compiled) {
          const hit = await findMatchingRule(file, [c], createMemorySink());
          if (hit) {
            expected = c.index;
            break;
          }
        }
        const actual = matches.find((m) => m.file === file)?.rule_index ?? null;
        expect(actual).toBe(expected);
      }
    }
  });
});
