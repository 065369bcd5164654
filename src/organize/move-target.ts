import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { FileEntry, Rule } from "./types.js";
import { errorCode } from "./errors.js";

const MAX_RENAME_ATTEMPTS = 10_000;

export type MoveTarget =
  | { kind: "missing_destination" }
  | { kind: "same_directory"; dest_dir: string }
  | { kind: "ok"; dest_dir: string; target: string; renamed: boolean };

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw err;
  }
}

async function isFree(p: string, taken: ReadonlySet<string>): Promise<boolean> {
  return !taken.has(p) && !(await pathExists(p));
}

/**
 * First name in `destDir` not taken yet: `name`, then `stem (1).ext`,
 * `stem (2).ext`, and so on. Existing files are never overwritten.
 * `taken` holds absolute paths already promised to earlier files of a plan.
 */
export async function findFreeName(
  destDir: string,
  name: string,
  taken: ReadonlySet<string> = new Set(),
): Promise<string> {
  if (await isFree(path.join(destDir, name), taken)) {
    return name;
  }
  const ext = path.extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  for (let i = 1; i <= MAX_RENAME_ATTEMPTS; i++) {
    const candidate = `${stem} (${i})${ext}`;
    if (await isFree(path.join(destDir, candidate), taken)) {
      return candidate;
    }
  }
  throw new Error(`no free name for '${name}' in '${destDir}'`);
}

/**
 * Where a move rule would put `file`. Shared by the dry-run planner and the
 * live executor so both report the same target.
 */
export async function resolveMoveTarget(
  file: FileEntry,
  rule: Rule,
  baseDir: string,
  taken?: ReadonlySet<string>,
): Promise<MoveTarget> {
  if (!rule.destination) {
    return { kind: "missing_destination" };
  }
  const destDir = path.resolve(baseDir, rule.destination);
  if (destDir === path.dirname(path.resolve(file.abs_path))) {
    return { kind: "same_directory", dest_dir: destDir };
  }
  const name = await findFreeName(destDir, file.name, taken);
  return {
    kind: "ok",
    dest_dir: destDir,
    target: path.join(destDir, name),
    renamed: name !== file.name,
  };
}

/**
 * Rename into place. Across filesystems the file is copied to
 * `<target>.partial`, renamed onto the target and only then removed from its
 * source; a failed copy leaves nothing under the target name.
 */
export async function relocateFile(src: string, target: string): Promise<void> {
  try {
    await fs.rename(src, target);
    return;
  } catch (err) {
    if (errorCode(err) !== "EXDEV") {
      throw err;
    }
  }

  const partial = `${target}.partial`;
  try {
    await fs.copyFile(src, partial, constants.COPYFILE_EXCL);
    await fs.rename(partial, target);
  } catch (err) {
    // Clean up partial file on error
    await fs.rm(partial, { force: true });
    throw err;
  }
  await fs.unlink(src);
}
