import type { Stats } from "node:fs";
import type { CreatedTimeSource, FileStat } from "./types.js";

/**
 * Pick the creation timestamp for a stat result.
 *
 * Node reports a zero birth time when the platform or filesystem has none
 * (older Linux kernels, some network mounts). In that case the
 * metadata-change time stands in, which also moves on chmod, chown and
 * rename. The caller gets `source` so it can say so.
 */
export function resolveCreatedTime(stats: Pick<Stats, "birthtimeMs" | "birthtime" | "ctime">): {
  created: Date;
  source: CreatedTimeSource;
} {
  if (Number.isFinite(stats.birthtimeMs) && stats.birthtimeMs > 0) {
    return { created: stats.birthtime, source: "birthtime" };
  }
  return { created: stats.ctime, source: "ctime" };
}

export function toFileStat(stats: Stats): FileStat {
  const { created, source } = resolveCreatedTime(stats);
  return {
    size: stats.size,
    modified: stats.mtime,
    created,
    created_source: source,
  };
}
