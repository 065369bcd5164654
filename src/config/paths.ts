import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".desk-tidy";
const RULES_FILENAME = "rules.json";
const LOG_FILENAME = "desk-tidy.log";

/**
 * Home directory, honoring DESK_TIDY_HOME before HOME/USERPROFILE.
 */
export function resolveHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const explicit = env.DESK_TIDY_HOME?.trim();
  if (explicit) {
    return path.resolve(explicit);
  }
  const fromEnv = env.HOME?.trim() || env.USERPROFILE?.trim();
  return path.resolve(fromEnv || homedir());
}

export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
  cwd: string = process.cwd(),
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~") {
    return resolveHomeDir(env, homedir);
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.join(resolveHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(cwd, trimmed);
}

/**
 * State directory for persistent logs.
 * Can be overridden via DESK_TIDY_STATE_DIR.
 * Default: ~/.desk-tidy
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.DESK_TIDY_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Rules file. Precedence: explicit flag → DESK_TIDY_RULES_PATH → ./rules.json.
 */
export function resolveRulesPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const chosen = explicit?.trim() || env.DESK_TIDY_RULES_PATH?.trim() || RULES_FILENAME;
  return resolveUserPath(chosen, env, os.homedir, cwd);
}

/**
 * Log file, or null when file logging is off. The value "1" (or "true")
 * selects desk-tidy.log under the state dir.
 */
export function resolveLogFilePath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | null {
  const chosen = explicit?.trim() || env.DESK_TIDY_LOG_FILE?.trim();
  if (!chosen) {
    return null;
  }
  if (chosen === "1" || chosen.toLowerCase() === "true") {
    return path.join(resolveStateDir(env), LOG_FILENAME);
  }
  return resolveUserPath(chosen, env, os.homedir, cwd);
}
