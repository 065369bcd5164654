import type { ReportSink } from "../logging/sink.js";

export type RuleAction = "move" | "delete" | "compress";

export type DateBounds = {
  start?: string; // ISO 8601, UTC when no offset is written
  end?: string;
};

export type DateRange = {
  modified?: DateBounds;
  created?: DateBounds;
};

export type Rule = {
  action: RuleAction;
  label?: string;
  destination?: string; // relative to the target directory; required for move
  types?: string[]; // extensions without the leading dot
  date_range?: DateRange;
};

/**
 * Where the "created" timestamp came from. `ctime` is the metadata-change time,
 * used when the platform reports no birth time. It moves on chmod/rename and is
 * therefore only an approximation of creation.
 */
export type CreatedTimeSource = "birthtime" | "ctime";

export type FileStat = {
  size: number;
  modified: Date;
  created: Date;
  created_source: CreatedTimeSource;
};

export type FileEntry = {
  name: string; // base name
  abs_path: string;
  ext: string; // lower-cased, no leading dot, "" when none
  stat: () => Promise<FileStat>; // fetched on first call, then memoized
};

export type Match = {
  file: FileEntry;
  rule: Rule;
  rule_index: number;
};

export type Summary = {
  moved: number;
  deleted: number;
  compressed: number;
  total_size_bytes: number;
};

export type RunContext = {
  target_dir: string;
  rules: Rule[];
  dry_run: boolean;
  auto_confirm: boolean;
};

/** Batch confirmation for pending deletions. Resolves true only on an explicit yes. */
export type ConfirmDeletions = (pending: FileEntry[]) => Promise<boolean>;

export type OutcomeStatus = "done" | "planned" | "skipped" | "failed" | "noop";

export type ActionOutcome = {
  file: string; // base name
  action: RuleAction;
  status: OutcomeStatus;
  bytes?: number;
  target?: string; // absolute destination path for moves
  reason?: string;
};

export type ExecutionResult = {
  summary: Summary;
  outcomes: ActionOutcome[];
};

// Progress events emitted via onProgress callback
export type OrganizeProgressEvent =
  | { type: "organize.start"; target_dir: string; rule_count: number; dry_run: boolean }
  | { type: "organize.scan.done"; file_count: number }
  | { type: "organize.match.done"; match_count: number; skipped_rule_count: number }
  | {
      type: "organize.action";
      index: number;
      total: number;
      file: string;
      action: RuleAction;
      status: OutcomeStatus;
    }
  | {
      type: "organize.done";
      summary: Summary;
      failed_count: number;
      elapsed_ms: number;
    };

export type OnProgress = (event: OrganizeProgressEvent) => void;

export type OrganizeDeps = {
  sink: ReportSink;
  confirm: ConfirmDeletions;
  onProgress?: OnProgress;
};
