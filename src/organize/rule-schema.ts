import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";
import type { Rule } from "./types.js";

const MAX_FOLDER_DEPTH = 10;

const DateBoundsSchema = Type.Object({
  start: Type.Optional(Type.String({ description: "Inclusive lower bound (ISO 8601)" })),
  end: Type.Optional(Type.String({ description: "Inclusive upper bound (ISO 8601)" })),
});

export const RuleSchema = Type.Object({
  action: Type.Union([Type.Literal("move"), Type.Literal("delete"), Type.Literal("compress")], {
    description: "What to do with a matched file",
  }),
  label: Type.Optional(Type.String({ description: "Name shown in log lines" })),
  destination: Type.Optional(
    Type.String({
      description: "Folder relative to the target directory; required for move",
    }),
  ),
  types: Type.Optional(
    Type.Array(Type.String(), {
      description: "File extensions without the leading dot; omitted = any type",
    }),
  ),
  date_range: Type.Optional(
    Type.Object({
      modified: Type.Optional(DateBoundsSchema),
      created: Type.Optional(DateBoundsSchema),
    }),
  ),
});

export const RuleSetSchema = Type.Array(RuleSchema);

export type RuleInput = Static<typeof RuleSchema>;

export type RuleValidationResult = { ok: true; rules: Rule[] } | { ok: false; errors: string[] };

function formatPointer(pointer: string): string {
  // "/0/date_range/modified" -> "[0].date_range.modified"
  const parts = pointer.split("/").filter(Boolean);
  return parts.map((p) => (/^\d+$/.test(p) ? `[${p}]` : `.${p}`)).join("").replace(/^\./, "");
}

/**
 * Checks that need more than the schema. Dates are left alone here: a bad
 * bound disables its rule at match time instead of failing the whole load.
 */
function semanticErrors(rule: RuleInput, prefix: string): string[] {
  const errors: string[] = [];

  if (rule.destination) {
    const dest = rule.destination;
    if (path.isAbsolute(dest) || path.win32.isAbsolute(dest)) {
      errors.push(`${prefix}.destination: must be a relative path`);
    }
    const segments = dest.split(/[/\\]/);
    if (segments.includes("..")) {
      errors.push(`${prefix}.destination: must not contain path traversal`);
    }
    if (segments.filter(Boolean).length > MAX_FOLDER_DEPTH) {
      errors.push(`${prefix}.destination: exceeds max folder depth of ${MAX_FOLDER_DEPTH}`);
    }
  }

  if (rule.types) {
    for (let i = 0; i < rule.types.length; i++) {
      if (rule.types[i].startsWith(".")) {
        errors.push(`${prefix}.types[${i}]: must not start with "."`);
      }
    }
  }

  return errors;
}

/**
 * Validate a parsed rule list. Returns the typed rules or every problem found.
 */
export function validateRules(value: unknown): RuleValidationResult {
  if (!Value.Check(RuleSetSchema, value)) {
    const errors: string[] = [];
    for (const err of Value.Errors(RuleSetSchema, value)) {
      const where = formatPointer(err.path);
      errors.push(where ? `${where}: ${err.message}` : err.message);
    }
    return { ok: false, errors };
  }

  const errors: string[] = [];
  for (let i = 0; i < value.length; i++) {
    errors.push(...semanticErrors(value[i], `[${i}]`));
  }
  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, rules: value };
}

export function validateRule(value: unknown): RuleValidationResult {
  const result = validateRules([value]);
  if (result.ok) {
    return result;
  }
  return { ok: false, errors: result.errors.map((e) => e.replace(/^\[0\]\.?(: )?/, "")) };
}
