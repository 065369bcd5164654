import fs from "node:fs/promises";
import path from "node:path";
import type { ReportSink } from "../logging/sink.js";
import type { ActionOutcome, Match } from "./types.js";
import { errorCode, errorMessage } from "./errors.js";
import { resolveMoveTarget, type MoveTarget } from "./move-target.js";

export const SKIP_MISSING_DESTINATION = "missing destination";
export const SKIP_ALREADY_IN_PLACE = "already in place";
export const SKIP_FILE_VANISHED = "file vanished";
export const SKIP_NOT_CONFIRMED = "deletion not confirmed";
export const NOOP_COMPRESS = "compression not implemented";

/**
 * Current on-disk size, or null when the file is gone.
 */
export async function readCurrentSize(absPath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(absPath);
    return stat.size;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Derive what a run would do from the match list alone. Nothing is mutated;
 * sizes are read from the files as they are now.
 */
export async function planActions(
  matches: Match[],
  baseDir: string,
  sink: ReportSink,
): Promise<ActionOutcome[]> {
  const planned: ActionOutcome[] = [];
  // Targets promised to earlier moves, which a live run would have created by then.
  const claimed = new Set<string>();

  for (const { file, rule } of matches) {
    const action = rule.action;

    if (action === "compress") {
      planned.push({ file: file.name, action, status: "noop", reason: NOOP_COMPRESS });
      continue;
    }

    let target: string | undefined;
    if (action === "move") {
      let resolved: MoveTarget;
      try {
        resolved = await resolveMoveTarget(file, rule, baseDir, claimed);
      } catch (err) {
        sink.warn(`Could not resolve destination for '${file.name}': ${errorMessage(err)}`);
        planned.push({ file: file.name, action, status: "skipped", reason: errorMessage(err) });
        continue;
      }
      if (resolved.kind === "missing_destination") {
        planned.push({ file: file.name, action, status: "skipped", reason: SKIP_MISSING_DESTINATION });
        continue;
      }
      if (resolved.kind === "same_directory") {
        planned.push({ file: file.name, action, status: "skipped", reason: SKIP_ALREADY_IN_PLACE });
        continue;
      }
      target = resolved.target;
    }

    let size: number | null;
    try {
      size = await readCurrentSize(file.abs_path);
    } catch (err) {
      sink.warn(`Could not read size of '${file.name}': ${errorMessage(err)}`);
      planned.push({ file: file.name, action, status: "skipped", target, reason: errorMessage(err) });
      continue;
    }
    if (size === null) {
      sink.warn(`'${file.name}' no longer exists; leaving it out of the plan.`);
      planned.push({ file: file.name, action, status: "skipped", target, reason: SKIP_FILE_VANISHED });
      continue;
    }

    if (target) {
      claimed.add(target);
    }
    planned.push({ file: file.name, action, status: "planned", bytes: size, target });
  }

  return planned;
}

export function relativeTarget(baseDir: string, target: string): string {
  return path.relative(baseDir, target) || ".";
}
