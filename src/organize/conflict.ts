import fs from "node:fs/promises";
import path from "node:path";
import { isErrnoCode } from "./errors.js";

/** True when something (including a dangling symlink) already sits at `p`. */
export async function pathTaken(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) {
      return false;
    }
    throw err;
  }
}

/**
 * Return `dst` if it is free, otherwise the first free `<stem>(<n>)<ext>`
 * beside it, counting from 1. Nothing is created, so two calls without an
 * intervening write return the same name.
 */
export async function nextNonConflictingName(dst: string): Promise<string> {
  if (!(await pathTaken(dst))) {
    return dst;
  }
  const { dir, name, ext } = path.parse(dst);
  for (let i = 1; ; i++) {
    const candidate = path.join(dir, `${name}(${i})${ext}`);
    if (!(await pathTaken(candidate))) {
      return candidate;
    }
  }
}
