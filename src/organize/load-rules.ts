import fs from "node:fs/promises";
import type { Rule } from "./types.js";
import { errorCode, errorMessage, RulesConfigError } from "./errors.js";
import { validateRules } from "./rule-schema.js";

/**
 * Load the ordered rule list from a JSON file. Any failure is fatal for the
 * run and surfaces as a RulesConfigError.
 */
export async function loadRules(configPath: string): Promise<Rule[]> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new RulesConfigError(configPath, ["configuration file not found"], { cause: err });
    }
    throw new RulesConfigError(configPath, [errorMessage(err)], { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new RulesConfigError(configPath, [`invalid JSON: ${errorMessage(err)}`], { cause: err });
  }

  const result = validateRules(parsed);
  if (!result.ok) {
    throw new RulesConfigError(configPath, result.errors);
  }
  return result.rules;
}
