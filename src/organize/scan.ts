import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { FileEntry, FileStat } from "./types.js";
import { DirectoryPermissionError, errorCode, NotADirectoryError } from "./errors.js";
import { toFileStat } from "./file-times.js";

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);
const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Lower-cased extension without the dot. Dotfiles such as `.env` have none.
 */
export function fileExtension(name: string): string {
  return path.extname(name).toLowerCase().replace(/^\./, "");
}

export function createFileEntry(absPath: string): FileEntry {
  let pending: Promise<FileStat> | null = null;
  const name = path.basename(absPath);
  return {
    name,
    abs_path: absPath,
    ext: fileExtension(name),
    stat: () => {
      pending ??= fs.stat(absPath).then(toFileStat);
      return pending;
    },
  };
}

function translateError(err: unknown, dirPath: string): unknown {
  const code = errorCode(err);
  if (code && MISSING_CODES.has(code)) {
    return new NotADirectoryError(dirPath);
  }
  if (code && PERMISSION_CODES.has(code)) {
    return new DirectoryPermissionError(dirPath, { cause: err });
  }
  return err;
}

/**
 * List the regular files directly inside `dirPath`, sorted by name.
 * Subdirectories, symlinks and special files are left out; nothing is
 * traversed recursively.
 */
export async function scanDirectory(dirPath: string): Promise<FileEntry[]> {
  let entries: Dirent[];
  try {
    const stat = await fs.stat(dirPath);
    if (!stat.isDirectory()) {
      throw new NotADirectoryError(dirPath);
    }
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    throw translateError(err, dirPath);
  }

  const files: FileEntry[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    files.push(createFileEntry(path.join(dirPath, entry.name)));
  }

  // Plain code-unit order, never locale-aware
  files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return files;
}
