import fs from "node:fs/promises";
import path from "node:path";
import type { OnEvent, PlacementRecord } from "./types.js";
import { resolveUserPath } from "../config/paths.js";
import { nextNonConflictingName, pathTaken } from "./conflict.js";
import { readUndoManifest } from "./manifest.js";
import { moveFile } from "./place.js";

/**
 * Reverse a previous run from its manifest, newest operation first. Every
 * operation is undone by moving the placed file back, whatever the original
 * action was; other hard links to the same content are left alone. Entries
 * whose placed file has disappeared are reported and skipped.
 */
export async function runUndo(manifestPath: string, onEvent?: OnEvent): Promise<PlacementRecord[]> {
  const startMs = Date.now();
  const resolved = resolveUserPath(manifestPath);
  const manifest = await readUndoManifest(resolved);

  onEvent?.({
    type: "undo.start",
    manifest_path: resolved,
    operation_count: manifest.operations.length,
  });

  const undone: PlacementRecord[] = [];
  let missing = 0;

  for (const op of manifest.operations.toReversed()) {
    const from = op.dst;
    if (!(await pathTaken(from))) {
      missing++;
      onEvent?.({ type: "undo.missing", path: from });
      continue;
    }
    await fs.mkdir(path.dirname(op.src), { recursive: true });
    const to = await nextNonConflictingName(op.src);
    await moveFile(from, to);
    undone.push({ src: from, dst: to, action: "undo" });
    onEvent?.({ type: "undo.restored", src: from, dst: to });
  }

  onEvent?.({
    type: "undo.done",
    restored_count: undone.length,
    missing_count: missing,
    elapsed_ms: Date.now() - startMs,
  });

  return undone;
}
