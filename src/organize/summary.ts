import type { ActionOutcome, RuleAction, Summary } from "./types.js";

const UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export function emptySummary(): Summary {
  return { moved: 0, deleted: 0, compressed: 0, total_size_bytes: 0 };
}

/**
 * Count one completed (or planned) action. The only place counters change,
 * for dry runs and live runs alike. Compression is a no-op and is not counted.
 */
export function recordAction(summary: Summary, action: RuleAction, bytes: number): void {
  switch (action) {
    case "move":
      summary.moved++;
      break;
    case "delete":
      summary.deleted++;
      break;
    case "compress":
      return;
  }
  summary.total_size_bytes += bytes;
}

/**
 * Summary of a plan: every planned outcome counted exactly as the executor
 * would count it after a successful mutation.
 */
export function summarizePlan(planned: ActionOutcome[]): Summary {
  const summary = emptySummary();
  for (const outcome of planned) {
    if (outcome.status === "planned") {
      recordAction(summary, outcome.action, outcome.bytes ?? 0);
    }
  }
  return summary;
}

/**
 * Human-readable size in binary units: `0B`, `512.00B`, `1.50KB`, `2.00GB`.
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0B";
  }
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)}${UNITS[unit]}`;
}

export function formatSummary(summary: Summary, opts: { dryRun: boolean }): string {
  const header = opts.dryRun ? "--- SUMMARY (DRY RUN) ---" : "--- SUMMARY ---";
  const verb = opts.dryRun ? "would be " : "";
  return [
    header,
    `Files ${verb}moved: ${summary.moved}`,
    `Files ${verb}deleted: ${summary.deleted}`,
    `Files ${verb}compressed: ${summary.compressed}`,
    `Total size: ${formatBytes(summary.total_size_bytes)}`,
  ].join("\n");
}
