import type { ReportSink } from "../logging/sink.js";
import type { DateBounds, FileEntry, FileStat, Match, Rule } from "./types.js";
import { errorMessage } from "./errors.js";

// Extended form: 2024-01-05, 2024-01-05T10, 2024-01-05 10:30:15.5+02:00
const ISO_EXTENDED_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;
// Basic form: 20240105, 20240105T1030, 20240105T103015Z
const ISO_BASIC_RE =
  /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(?:(\d{2})(?:(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO 8601 date or date-time used as a rule bound.
 *
 * Accepted: calendar dates in extended (`YYYY-MM-DD`) or basic (`YYYYMMDD`)
 * form, optionally followed by a time of `HH`, `HH:MM` or `HH:MM:SS` with a
 * fraction (`HHMM`, `HHMMSS` in basic form) and an offset of `Z`, `±HH`,
 * `±HH:MM` or `±HHMM`. Extended dates also take a space before the time.
 * Week and ordinal dates are not accepted. A value without an offset is read
 * as UTC. Returns null when malformed.
 */
export function parseRuleDate(value: string): Date | null {
  const trimmed = value.trim();
  const m = ISO_EXTENDED_RE.exec(trimmed) ?? ISO_BASIC_RE.exec(trimmed);
  if (!m) {
    return null;
  }
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = m[4] ? Number(m[4]) : 0;
  const minute = m[5] ? Number(m[5]) : 0;
  const second = m[6] ? Number(m[6]) : 0;
  const millis = m[7] ? Number(m[7].slice(0, 3).padEnd(3, "0")) : 0;

  if (month < 1 || month > 12) {
    return null;
  }
  const maxDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  if (day < 1 || day > maxDay || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const offsetMinutes = parseOffsetMinutes(m[8]);
  if (offsetMinutes === null) {
    return null;
  }

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

type CompiledBounds = {
  start: Date | null;
  end: Date | null;
};

export type CompiledRule = {
  rule: Rule;
  index: number;
  types: Set<string> | null; // null = any type
  modified: CompiledBounds | null;
  created: CompiledBounds | null;
  invalid_reason: string | null; // set when the rule is disabled
};

export function describeRule(rule: Rule, index: number): string {
  return rule.label ? `rule #${index + 1} (${rule.label})` : `rule #${index + 1}`;
}

function compileBounds(
  bounds: DateBounds | undefined,
  field: "modified" | "created",
): { value: CompiledBounds | null; error?: string } {
  if (!bounds) {
    return { value: null };
  }
  const out: CompiledBounds = { start: null, end: null };
  for (const side of ["start", "end"] as const) {
    const raw = bounds[side];
    if (raw === undefined) {
      continue;
    }
    const parsed = parseRuleDate(raw);
    if (!parsed) {
      return { value: null, error: `invalid ${field}.${side} date '${raw}'` };
    }
    out[side] = parsed;
  }
  return { value: out };
}

/**
 * Parse every rule's date bounds once. A rule with a malformed bound is
 * disabled with a warning and never matches; the other rules are unaffected.
 */
export function compileRules(rules: Rule[], sink: ReportSink): CompiledRule[] {
  return rules.map((rule, index) => {
    const modified = compileBounds(rule.date_range?.modified, "modified");
    const created = compileBounds(rule.date_range?.created, "created");
    const invalid = modified.error ?? created.error ?? null;
    if (invalid) {
      sink.warn(`Skipping invalid date range in ${describeRule(rule, index)}: ${invalid}`);
    }
    return {
      rule,
      index,
      types: rule.types ? new Set(rule.types.map((t) => t.toLowerCase())) : null,
      modified: modified.value,
      created: created.value,
      invalid_reason: invalid,
    };
  });
}

function withinBounds(timestamp: Date, bounds: CompiledBounds): boolean {
  const t = timestamp.getTime();
  if (bounds.start && t < bounds.start.getTime()) {
    return false;
  }
  if (bounds.end && t > bounds.end.getTime()) {
    return false;
  }
  return true;
}

export type MatchState = {
  warnedCtimeFallback: boolean;
};

async function ruleMatches(
  file: FileEntry,
  compiled: CompiledRule,
  sink: ReportSink,
  state: MatchState,
): Promise<boolean> {
  if (compiled.invalid_reason) {
    return false;
  }
  if (compiled.types && !compiled.types.has(file.ext)) {
    return false;
  }
  if (!compiled.modified && !compiled.created) {
    return true;
  }

  const stat: FileStat = await file.stat();
  if (compiled.modified && !withinBounds(stat.modified, compiled.modified)) {
    return false;
  }
  if (compiled.created) {
    if (stat.created_source === "ctime" && !state.warnedCtimeFallback) {
      state.warnedCtimeFallback = true;
      sink.warn(
        "File creation time is not available on this platform; 'created' filters use the metadata-change time instead.",
      );
    }
    if (!withinBounds(stat.created, compiled.created)) {
      return false;
    }
  }
  return true;
}

/**
 * First rule, in list order, whose conditions all hold for `file`; null when
 * none does. A file whose metadata can no longer be read matches nothing.
 */
export async function findMatchingRule(
  file: FileEntry,
  rules: CompiledRule[],
  sink: ReportSink,
  state: MatchState = { warnedCtimeFallback: false },
): Promise<CompiledRule | null> {
  for (const compiled of rules) {
    try {
      if (await ruleMatches(file, compiled, sink, state)) {
        return compiled;
      }
    } catch (err) {
      sink.warn(`Could not read metadata for '${file.name}': ${errorMessage(err)}`);
      return null;
    }
  }
  return null;
}

export type MatchResult = {
  matches: Match[];
  skipped_rules: number[]; // indexes of rules disabled by malformed dates
  created_time_fallback: boolean; // a "created" filter ran on ctime instead of birth time
};

export async function matchFiles(
  files: FileEntry[],
  rules: Rule[],
  sink: ReportSink,
): Promise<MatchResult> {
  const compiled = compileRules(rules, sink);
  const state: MatchState = { warnedCtimeFallback: false };
  const matches: Match[] = [];

  for (const file of files) {
    const hit = await findMatchingRule(file, compiled, sink, state);
    if (hit) {
      matches.push({ file, rule: hit.rule, rule_index: hit.index });
    }
  }

  return {
    matches,
    skipped_rules: compiled.filter((c) => c.invalid_reason !== null).map((c) => c.index),
    created_time_fallback: state.warnedCtimeFallback,
  };
}
