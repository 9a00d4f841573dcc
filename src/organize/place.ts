import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { PlacementMode } from "./types.js";
import { nextNonConflictingName } from "./conflict.js";
import { isErrnoCode } from "./errors.js";

export type PlacementOutcome = {
  action: PlacementMode; // what actually happened; hardlink may degrade to copy
  dst: string; // final, conflict-free destination
};

/** Hidden temp name beside `dst`, unique to one copy. */
export function partialPathFor(dst: string): string {
  const name = `.${path.basename(dst)}.${process.pid}.${randomUUID()}.partial`;
  return path.join(path.dirname(dst), name);
}

/**
 * Copy `src` to `dst` through a temp file created exclusively for this call,
 * keeping the source's permission bits and access/modification times. The
 * temp file is removed only if this call created it; the error is rethrown.
 */
export async function copyFilePreserving(src: string, dst: string): Promise<void> {
  const stat = await fs.stat(src);
  const partial = partialPathFor(dst);
  const handle = await fs.open(partial, "wx");
  try {
    await pipeline(createReadStream(src), handle.createWriteStream());
    await fs.chmod(partial, stat.mode & 0o7777);
    await fs.utimes(partial, stat.atime, stat.mtime);
    await fs.rename(partial, dst);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}

/**
 * Rename `src` to `dst`; across filesystems (EXDEV) fall back to a
 * preserving copy followed by unlinking the source.
 */
export async function moveFile(src: string, dst: string): Promise<void> {
  try {
    await fs.rename(src, dst);
  } catch (err) {
    if (!isErrnoCode(err, "EXDEV")) {
      throw err;
    }
    await copyFilePreserving(src, dst);
    await fs.unlink(src);
  }
}

/**
 * Place one file at (a conflict-free variant of) `dst`, creating missing
 * parent directories first.
 */
export async function placeFile(
  src: string,
  dst: string,
  mode: PlacementMode,
): Promise<PlacementOutcome> {
  const finalDst = await nextNonConflictingName(dst);
  await fs.mkdir(path.dirname(finalDst), { recursive: true });

  if (mode === "hardlink") {
    try {
      await fs.link(src, finalDst);
      return { action: "hardlink", dst: finalDst };
    } catch {
      // Cross-device links and filesystems without hard links end up here
      await copyFilePreserving(src, finalDst);
      return { action: "copy", dst: finalDst };
    }
  }

  if (mode === "copy") {
    await copyFilePreserving(src, finalDst);
    return { action: "copy", dst: finalDst };
  }

  await moveFile(src, finalDst);
  return { action: "move", dst: finalDst };
}
