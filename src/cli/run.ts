import type { Prompter } from "../organize/confirm.js";
import type { ConfirmDeletions, Rule } from "../organize/types.js";
import { resolveLogFilePath, resolveRulesPath, resolveUserPath } from "../config/paths.js";
import {
  createConsoleSink,
  createFileSink,
  createTeeSink,
  type ReportSink,
} from "../logging/sink.js";
import { createPrompter, createPromptConfirm } from "../organize/confirm.js";
import {
  DirectoryPermissionError,
  errorMessage,
  NotADirectoryError,
  RuleBuilderCancelledError,
  RulesConfigError,
} from "../organize/errors.js";
import { loadRules } from "../organize/load-rules.js";
import { runOrganize } from "../organize/organize.js";
import { promptForRule } from "../organize/rule-builder.js";
import { VERSION } from "../version.js";
import { parseCliArgs, USAGE } from "./argv.js";
import { formatLoadedRules, formatRunHeader } from "./header.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;
export const EXIT_ACTION_FAILED = 3;

export type CliIo = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

function isSetupError(err: unknown): err is Error {
  return (
    err instanceof NotADirectoryError ||
    err instanceof DirectoryPermissionError ||
    err instanceof RulesConfigError ||
    err instanceof RuleBuilderCancelledError
  );
}

/**
 * Run the command line once and return its exit code. Setup failures are
 * reported as a single error line; per-file failures only change the exit
 * code under --strict.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === "help") {
    io.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }
  if (parsed.kind === "version") {
    io.stdout.write(`${VERSION}\n`);
    return EXIT_OK;
  }
  if (parsed.kind === "error") {
    io.stderr.write(`Error: ${parsed.message}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  const opts = parsed.options;
  const targetDir = resolveUserPath(opts.dir, io.env, undefined, io.cwd);
  const rulesPath = resolveRulesPath(opts.config, io.env, io.cwd);
  const logPath = resolveLogFilePath(opts.logFile, io.env, io.cwd);

  const consoleSink = createConsoleSink(io.stdout, io.stderr);
  const sink: ReportSink = logPath ? createTeeSink(consoleSink, createFileSink(logPath)) : consoleSink;

  // Opened on first question only, so non-interactive runs never hold stdin.
  const prompts: { current: Prompter | null } = { current: null };
  const getPrompter = (): Prompter => {
    prompts.current ??= createPrompter({ input: io.stdin, output: io.stdout });
    return prompts.current;
  };
  const confirm: ConfirmDeletions = (pending) => createPromptConfirm(getPrompter())(pending);

  try {
    sink.info(
      formatRunHeader({
        version: VERSION,
        targetDir,
        rulesSource: opts.interactive ? "<interactive>" : rulesPath,
        dryRun: opts.dryRun,
      }),
    );

    let rules: Rule[];
    if (opts.interactive) {
      // The built rule replaces the whole rule set for this run.
      rules = [await promptForRule(getPrompter())];
    } else {
      rules = await loadRules(rulesPath);
    }
    sink.info(formatLoadedRules(rules));

    const result = await runOrganize(
      {
        target_dir: targetDir,
        rules,
        dry_run: opts.dryRun,
        auto_confirm: opts.yes,
      },
      { sink, confirm },
    );

    const failed = result.outcomes.filter((o) => o.status === "failed").length;
    if (failed > 0) {
      sink.warn(`${failed} action(s) failed; see the errors above.`);
    }
    return failed > 0 && opts.strict ? EXIT_ACTION_FAILED : EXIT_OK;
  } catch (err) {
    if (isSetupError(err)) {
      sink.error(err.message);
      return EXIT_FATAL;
    }
    sink.error(`Unexpected failure: ${errorMessage(err)}`);
    return EXIT_FATAL;
  } finally {
    prompts.current?.close();
  }
}
