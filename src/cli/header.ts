import type { Rule } from "../organize/types.js";

export type HeaderOptions = {
  version: string;
  targetDir: string;
  rulesSource: string; // file path, or "<interactive>"
  dryRun: boolean;
  columns?: number;
};

const TITLE = "DeskTidy CLI";

export function formatCliBannerLine(version: string, columns = 120): string {
  const line = `${TITLE} ${version} - organize one folder by rules`;
  if (line.length <= columns) {
    return line;
  }
  return `${TITLE} ${version}`;
}

export function formatRunHeader(opts: HeaderOptions): string {
  return [
    formatCliBannerLine(opts.version, opts.columns),
    `Target Directory: ${opts.targetDir}`,
    `Config File: ${opts.rulesSource}`,
    `Dry Run: ${opts.dryRun}`,
  ].join("\n");
}

export function formatLoadedRules(rules: Rule[]): string {
  return `Loaded Rules:\n${JSON.stringify(rules, null, 2)}`;
}
