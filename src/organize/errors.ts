export class NotADirectoryError extends Error {
  readonly dirPath: string;

  constructor(dirPath: string) {
    super(`Target directory '${dirPath}' does not exist or is not a directory.`);
    this.name = "NotADirectoryError";
    this.dirPath = dirPath;
  }
}

export class DirectoryPermissionError extends Error {
  readonly dirPath: string;

  constructor(dirPath: string, options?: { cause?: unknown }) {
    super(`Permission denied to access directory '${dirPath}'.`, options);
    this.name = "DirectoryPermissionError";
    this.dirPath = dirPath;
  }
}

export class RulesConfigError extends Error {
  readonly configPath: string;
  readonly problems: string[];

  constructor(configPath: string, problems: string[], options?: { cause?: unknown }) {
    const detail = problems.length > 0 ? `: ${problems.join("; ")}` : "";
    super(`Invalid rules configuration at '${configPath}'${detail}`, options);
    this.name = "RulesConfigError";
    this.configPath = configPath;
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export class RuleBuilderCancelledError extends Error {
  constructor() {
    super("Rule builder cancelled: input closed before the rule was complete.");
    this.name = "RuleBuilderCancelledError";
  }
}
