import fs from "node:fs/promises";
import type { ReportSink } from "../logging/sink.js";
import type {
  ActionOutcome,
  ExecutionResult,
  FileEntry,
  Match,
  OrganizeDeps,
  RunContext,
} from "./types.js";
import { errorMessage } from "./errors.js";
import { relocateFile, resolveMoveTarget } from "./move-target.js";
import {
  NOOP_COMPRESS,
  planActions,
  relativeTarget,
  SKIP_ALREADY_IN_PLACE,
  SKIP_MISSING_DESTINATION,
  SKIP_NOT_CONFIRMED,
} from "./plan.js";
import { emptySummary, recordAction, summarizePlan } from "./summary.js";

function logSkip(sink: ReportSink, outcome: ActionOutcome): void {
  switch (outcome.reason) {
    case SKIP_MISSING_DESTINATION:
      sink.warn(`Skipping move for '${outcome.file}' due to missing 'destination' in rule.`);
      return;
    case SKIP_ALREADY_IN_PLACE:
      sink.warn(`Skipping move for '${outcome.file}': destination is its own directory.`);
      return;
    case SKIP_NOT_CONFIRMED:
      sink.warn(`Skipping deletion of '${outcome.file}': deletion was not confirmed.`);
      return;
  }
}

function logIntent(sink: ReportSink, outcome: ActionOutcome, baseDir: string): void {
  if (outcome.action === "move" && outcome.target) {
    sink.info(`[MOVE] '${outcome.file}' -> '${relativeTarget(baseDir, outcome.target)}'`);
  } else if (outcome.action === "delete") {
    sink.info(`[DELETE] '${outcome.file}'`);
  } else if (outcome.action === "compress") {
    sink.info(`[COMPRESS] '${outcome.file}' (not yet implemented).`);
  }
}

/**
 * Ask once for every pending deletion. Auto-confirm skips the question; a
 * declined, failed or interrupted prompt cancels all deletions of the run.
 */
export async function gateDeletions(
  matches: Match[],
  context: RunContext,
  deps: Pick<OrganizeDeps, "sink" | "confirm">,
): Promise<boolean> {
  const pending: FileEntry[] = matches.filter((m) => m.rule.action === "delete").map((m) => m.file);
  if (pending.length === 0) {
    return true;
  }
  if (context.auto_confirm) {
    deps.sink.info(`Auto-confirm enabled: ${pending.length} file(s) will be deleted.`);
    return true;
  }

  let approved: boolean;
  try {
    approved = await deps.confirm(pending);
  } catch (err) {
    deps.sink.warn(`Deletion confirmation interrupted (${errorMessage(err)}); no files will be deleted.`);
    return false;
  }
  if (!approved) {
    deps.sink.warn(`Deletion not confirmed; skipping ${pending.length} deletion(s).`);
  }
  return approved;
}

async function moveOne(match: Match, baseDir: string, sink: ReportSink): Promise<ActionOutcome> {
  const { file, rule } = match;
  const resolved = await resolveMoveTarget(file, rule, baseDir);
  if (resolved.kind === "missing_destination") {
    return { file: file.name, action: "move", status: "skipped", reason: SKIP_MISSING_DESTINATION };
  }
  if (resolved.kind === "same_directory") {
    return { file: file.name, action: "move", status: "skipped", reason: SKIP_ALREADY_IN_PLACE };
  }

  sink.info(`[MOVE] '${file.name}' -> '${relativeTarget(baseDir, resolved.target)}'`);
  // Size first: the source path is gone once the move succeeds.
  const { size } = await fs.stat(file.abs_path);
  await fs.mkdir(resolved.dest_dir, { recursive: true });
  await relocateFile(file.abs_path, resolved.target);
  return { file: file.name, action: "move", status: "done", bytes: size, target: resolved.target };
}

async function deleteOne(match: Match, sink: ReportSink): Promise<ActionOutcome> {
  const { file } = match;
  sink.info(`[DELETE] '${file.name}'`);
  const { size } = await fs.stat(file.abs_path);
  await fs.unlink(file.abs_path);
  return { file: file.name, action: "delete", status: "done", bytes: size };
}

/**
 * Apply each match's action. In a dry run nothing is touched and the summary
 * is derived from the match list; in a live run every move and delete is
 * attempted on its own and counted only after it succeeds.
 */
export async function executeMatches(
  matches: Match[],
  context: RunContext,
  deps: OrganizeDeps,
): Promise<ExecutionResult> {
  const { sink, onProgress } = deps;
  const baseDir = context.target_dir;

  if (matches.length === 0) {
    return { summary: emptySummary(), outcomes: [] };
  }

  sink.info(`--- ${context.dry_run ? "DRY RUN" : "EXECUTING ACTIONS"} ---`);

  if (context.dry_run) {
    const planned = await planActions(matches, baseDir, sink);
    for (let i = 0; i < planned.length; i++) {
      const outcome = planned[i];
      if (outcome.status === "skipped") {
        logSkip(sink, outcome);
      } else {
        logIntent(sink, outcome, baseDir);
      }
      onProgress?.({
        type: "organize.action",
        index: i + 1,
        total: planned.length,
        file: outcome.file,
        action: outcome.action,
        status: outcome.status,
      });
    }
    return { summary: summarizePlan(planned), outcomes: planned };
  }

  const deletionsApproved = await gateDeletions(matches, context, deps);
  const summary = emptySummary();
  const outcomes: ActionOutcome[] = [];

  for (let i = 0; i < matches.length; i++) {
    const match = matches[i];
    const action = match.rule.action;
    let outcome: ActionOutcome;

    if (action === "compress") {
      outcome = { file: match.file.name, action, status: "noop", reason: NOOP_COMPRESS };
      logIntent(sink, outcome, baseDir);
    } else if (action === "delete" && !deletionsApproved) {
      outcome = { file: match.file.name, action, status: "skipped", reason: SKIP_NOT_CONFIRMED };
      logSkip(sink, outcome);
    } else {
      try {
        outcome = action === "move" ? await moveOne(match, baseDir, sink) : await deleteOne(match, sink);
      } catch (err) {
        const verb = action === "move" ? "move" : "delete";
        sink.error(`Could not ${verb} '${match.file.name}': ${errorMessage(err)}`);
        outcome = { file: match.file.name, action, status: "failed", reason: errorMessage(err) };
      }
      if (outcome.status === "done") {
        recordAction(summary, action, outcome.bytes ?? 0);
      } else if (outcome.status === "skipped") {
        logSkip(sink, outcome);
      }
    }

    outcomes.push(outcome);
    onProgress?.({
      type: "organize.action",
      index: i + 1,
      total: matches.length,
      file: outcome.file,
      action: outcome.action,
      status: outcome.status,
    });
  }

  return { summary, outcomes };
}
