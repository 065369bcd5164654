import type { ActionOutcome, FileEntry, Match, OrganizeDeps, RunContext, Summary } from "./types.js";
import { executeMatches } from "./execute.js";
import { matchFiles } from "./match.js";
import { scanDirectory } from "./scan.js";
import { formatSummary } from "./summary.js";

export type OrganizeResult = {
  files: FileEntry[];
  matches: Match[];
  skipped_rules: number[];
  created_time_fallback: boolean;
  summary: Summary;
  outcomes: ActionOutcome[];
  report: string;
};

/**
 * One pass over `context.target_dir`: scan, match, act, report.
 *
 * Scanner failures (missing or unreadable directory) are thrown before any
 * action runs. Everything that goes wrong after that is per rule or per file
 * and only shows up in the log and the outcomes.
 */
export async function runOrganize(context: RunContext, deps: OrganizeDeps): Promise<OrganizeResult> {
  const { sink, onProgress } = deps;
  const startMs = Date.now();

  onProgress?.({
    type: "organize.start",
    target_dir: context.target_dir,
    rule_count: context.rules.length,
    dry_run: context.dry_run,
  });

  const files = await scanDirectory(context.target_dir);
  onProgress?.({ type: "organize.scan.done", file_count: files.length });

  sink.info("Found Files to Scan:");
  if (files.length === 0) {
    sink.info("No files found in the target directory.");
  }
  for (const file of files) {
    sink.info(` - ${file.name}`);
  }

  const { matches, skipped_rules, created_time_fallback } = await matchFiles(
    files,
    context.rules,
    sink,
  );
  onProgress?.({
    type: "organize.match.done",
    match_count: matches.length,
    skipped_rule_count: skipped_rules.length,
  });

  sink.info("Matched Files for Processing:");
  if (matches.length === 0) {
    sink.info("No files matched any rules.");
  }
  for (const match of matches) {
    sink.info(` - File: ${match.file.name}, Action: ${match.rule.action}`);
  }

  const { summary, outcomes } = await executeMatches(matches, context, deps);
  const report = formatSummary(summary, { dryRun: context.dry_run });
  sink.info(report);

  onProgress?.({
    type: "organize.done",
    summary,
    failed_count: outcomes.filter((o) => o.status === "failed").length,
    elapsed_ms: Date.now() - startMs,
  });

  return {
    files,
    matches,
    skipped_rules,
    created_time_fallback,
    summary,
    outcomes,
    report,
  };
}
