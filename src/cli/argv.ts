import { parseArgs } from "node:util";
import { errorMessage } from "../organize/errors.js";

export type CliOptions = {
  dir: string;
  config?: string;
  dryRun: boolean;
  yes: boolean;
  interactive: boolean;
  logFile?: string;
  strict: boolean;
};

export type ParsedCli =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const USAGE = `Usage: desk-tidy --dir <path> [options]

Organize the files at the top of one directory with ordered rules.

Options:
  --dir <path>        Target directory to organize (required)
  --config <path>     Rules file (default: $DESK_TIDY_RULES_PATH or ./rules.json)
  --dry-run           Show what would happen without changing anything
  -y, --yes           Delete without asking for confirmation
  -i, --interactive   Build a single rule interactively instead of loading the rules file
  --log-file <path>   Also append log lines to this file ("1" = ~/.desk-tidy/desk-tidy.log)
  --strict            Exit with code 3 when any action failed
  -h, --help          Show this help
  -V, --version       Print the version`;

const OPTIONS = {
  dir: { type: "string" },
  config: { type: "string" },
  "dry-run": { type: "boolean", default: false },
  yes: { type: "boolean", short: "y", default: false },
  interactive: { type: "boolean", short: "i", default: false },
  "log-file": { type: "string" },
  strict: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "V", default: false },
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: false, strict: true, options: OPTIONS });
}

export function parseCliArgs(argv: string[]): ParsedCli {
  let values: ReturnType<typeof parse>["values"];
  try {
    values = parse(argv).values;
  } catch (err) {
    return { kind: "error", message: errorMessage(err) };
  }

  if (values.help) {
    return { kind: "help" };
  }
  if (values.version) {
    return { kind: "version" };
  }
  const dir = values.dir?.trim();
  if (!dir) {
    return { kind: "error", message: "--dir is required" };
  }

  return {
    kind: "run",
    options: {
      dir,
      config: values.config,
      dryRun: values["dry-run"] ?? false,
      yes: values.yes ?? false,
      interactive: values.interactive ?? false,
      logFile: values["log-file"],
      strict: values.strict ?? false,
    },
  };
}
