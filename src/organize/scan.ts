import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { CandidateFile, SkipReason } from "./types.js";

export type WalkOptions = {
  exclude_dirs: ReadonlySet<string>;
  exclude_hidden: boolean;
  on_skip?: (absPath: string, reason: SkipReason) => void;
};

const isHiddenName = (name: string) => name.startsWith(".");

/**
 * Depth-first walk of `sourceRoot` yielding regular files. Excluded and
 * (optionally) hidden directories are pruned before descent. Symlinks and
 * special files are neither followed nor yielded; each one is reported
 * through `on_skip`. Siblings are visited in name order.
 */
export async function* walkSourceFiles(
  sourceRoot: string,
  opts: WalkOptions,
): AsyncGenerator<CandidateFile> {
  const entries = await fs.readdir(sourceRoot, { withFileTypes: true });
  yield* walkEntries(sourceRoot, sourceRoot, entries, opts);
}

async function* walkEntries(
  root: string,
  dir: string,
  entries: Dirent[],
  opts: WalkOptions,
): AsyncGenerator<CandidateFile> {
  const sorted = entries.toSorted((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const subdirs: string[] = [];

  for (const entry of sorted) {
    if (entry.isDirectory()) {
      if (opts.exclude_dirs.has(entry.name) || (opts.exclude_hidden && isHiddenName(entry.name))) {
        continue;
      }
      subdirs.push(path.join(dir, entry.name));
      continue;
    }
    if (opts.exclude_hidden && isHiddenName(entry.name)) {
      continue;
    }
    const absPath = path.join(dir, entry.name);
    if (!entry.isFile()) {
      opts.on_skip?.(absPath, entry.isSymbolicLink() ? "symlink" : "special");
      continue;
    }
    const stat = await fs.stat(absPath);
    yield {
      abs_path: absPath,
      rel_path: path.relative(root, absPath),
      size: stat.size,
      mtime_ms: stat.mtimeMs,
    };
  }

  for (const sub of subdirs) {
    const children = await fs.readdir(sub, { withFileTypes: true });
    yield* walkEntries(root, sub, children, opts);
  }
}
