import type { Prompter } from "./confirm.js";
import type { DateBounds, DateRange, Rule, RuleAction } from "./types.js";
import { RuleBuilderCancelledError, RulesConfigError } from "./errors.js";
import { parseRuleDate } from "./match.js";
import { validateRule } from "./rule-schema.js";

const ACTIONS: readonly RuleAction[] = ["move", "delete", "compress"];

export type RuleAnswers = {
  action: string;
  label?: string;
  destination?: string;
  types?: string; // comma separated
  modified_start?: string;
  modified_end?: string;
  created_start?: string;
  created_end?: string;
};

export type BuiltRule = { ok: true; rule: Rule } | { ok: false; errors: string[] };

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseTypeList(input: string | undefined): string[] | undefined {
  const raw = blankToUndefined(input);
  if (!raw) {
    return undefined;
  }
  const types = raw
    .split(",")
    .map((t) => t.trim().replace(/^\.+/, "").toLowerCase())
    .filter(Boolean);
  return types.length > 0 ? [...new Set(types)] : undefined;
}

function buildBounds(start?: string, end?: string): DateBounds | undefined {
  const bounds: DateBounds = {};
  const s = blankToUndefined(start);
  const e = blankToUndefined(end);
  if (s) {
    bounds.start = s;
  }
  if (e) {
    bounds.end = e;
  }
  return s || e ? bounds : undefined;
}

/**
 * Turn raw builder answers into a rule. Blank answers are dropped so an
 * unanswered filter means "no constraint".
 */
export function buildRuleFromAnswers(answers: RuleAnswers): BuiltRule {
  const candidate: Record<string, unknown> = { action: answers.action.trim().toLowerCase() };

  const label = blankToUndefined(answers.label);
  if (label) {
    candidate.label = label;
  }
  const destination = blankToUndefined(answers.destination);
  if (destination) {
    candidate.destination = destination;
  }
  const types = parseTypeList(answers.types);
  if (types) {
    candidate.types = types;
  }

  const dateRange: DateRange = {};
  const modified = buildBounds(answers.modified_start, answers.modified_end);
  const created = buildBounds(answers.created_start, answers.created_end);
  if (modified) {
    dateRange.modified = modified;
  }
  if (created) {
    dateRange.created = created;
  }
  if (modified || created) {
    candidate.date_range = dateRange;
  }

  const errors: string[] = [];
  if (candidate.action === "move" && !destination) {
    errors.push("destination is required for move");
  }
  for (const [field, value] of [
    ["modified.start", modified?.start],
    ["modified.end", modified?.end],
    ["created.start", created?.start],
    ["created.end", created?.end],
  ] as const) {
    if (value !== undefined && !parseRuleDate(value)) {
      errors.push(`date_range.${field}: not a valid ISO 8601 date`);
    }
  }

  const result = validateRule(candidate);
  if (!result.ok) {
    return { ok: false, errors: [...result.errors, ...errors] };
  }
  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, rule: result.rules[0] };
}

async function ask(prompter: Prompter, question: string): Promise<string> {
  const answer = await prompter.ask(question);
  if (answer === null) {
    throw new RuleBuilderCancelledError();
  }
  return answer;
}

async function askUntil(
  prompter: Prompter,
  question: string,
  accept: (answer: string) => string | null, // returns an error message or null
): Promise<string> {
  let prompt = question;
  for (;;) {
    const answer = await ask(prompter, prompt);
    const problem = accept(answer);
    if (!problem) {
      return answer;
    }
    prompt = `${problem}. ${question}`;
  }
}

function acceptDate(answer: string): string | null {
  const value = answer.trim();
  if (!value || parseRuleDate(value)) {
    return null;
  }
  return `'${value}' is not a valid ISO 8601 date`;
}

/**
 * Ask for a single rule, one field at a time. Invalid answers are asked again;
 * closing the input cancels the builder.
 */
export async function promptForRule(prompter: Prompter): Promise<Rule> {
  const action = await askUntil(prompter, "Action (move/delete/compress): ", (a) =>
    ACTIONS.some((x) => x === a.trim().toLowerCase()) ? null : `Unknown action '${a.trim()}'`,
  );

  let destination: string | undefined;
  if (action.trim().toLowerCase() === "move") {
    destination = await askUntil(
      prompter,
      "Destination folder (relative to the target directory): ",
      (a) => (a.trim() ? null : "A destination is required for move"),
    );
  }

  const types = await ask(prompter, "File types, comma separated (blank for any): ");
  const modifiedStart = await askUntil(
    prompter,
    "Modified on or after (ISO 8601, blank for no limit): ",
    acceptDate,
  );
  const modifiedEnd = await askUntil(
    prompter,
    "Modified on or before (ISO 8601, blank for no limit): ",
    acceptDate,
  );
  const createdStart = await askUntil(
    prompter,
    "Created on or after (ISO 8601, blank for no limit): ",
    acceptDate,
  );
  const createdEnd = await askUntil(
    prompter,
    "Created on or before (ISO 8601, blank for no limit): ",
    acceptDate,
  );

  const built = buildRuleFromAnswers({
    action,
    destination,
    types,
    modified_start: modifiedStart,
    modified_end: modifiedEnd,
    created_start: createdStart,
    created_end: createdEnd,
  });
  if (!built.ok) {
    throw new RulesConfigError("<interactive>", built.errors);
  }
  return built.rule;
}
