export type {
  ActionOutcome,
  ConfirmDeletions,
  CreatedTimeSource,
  DateBounds,
  DateRange,
  ExecutionResult,
  FileEntry,
  FileStat,
  Match,
  OnProgress,
  OrganizeDeps,
  OrganizeProgressEvent,
  OutcomeStatus,
  Rule,
  RuleAction,
  RunContext,
  Summary,
} from "./organize/types.js";
export type { LogLevel, LogRecord, MemorySink, ReportSink } from "./logging/sink.js";
export type { OrganizeResult } from "./organize/organize.js";
export type { Prompter, PromptStreams } from "./organize/confirm.js";
export type { RuleAnswers, BuiltRule } from "./organize/rule-builder.js";

export {
  createConsoleSink,
  createFileSink,
  createMemorySink,
  createTeeSink,
} from "./logging/sink.js";
export {
  DirectoryPermissionError,
  NotADirectoryError,
  RuleBuilderCancelledError,
  RulesConfigError,
} from "./organize/errors.js";
export { createPrompter, createPromptConfirm, isAffirmative } from "./organize/confirm.js";
export { executeMatches, gateDeletions } from "./organize/execute.js";
export { loadRules } from "./organize/load-rules.js";
export { compileRules, findMatchingRule, matchFiles, parseRuleDate } from "./organize/match.js";
export { runOrganize } from "./organize/organize.js";
export { planActions } from "./organize/plan.js";
export { buildRuleFromAnswers, promptForRule } from "./organize/rule-builder.js";
export { RuleSchema, RuleSetSchema, validateRule, validateRules } from "./organize/rule-schema.js";
export { scanDirectory } from "./organize/scan.js";
export { emptySummary, formatBytes, formatSummary, recordAction, summarizePlan } from "./organize/summary.js";
