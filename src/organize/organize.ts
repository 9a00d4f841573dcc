import fs from "node:fs/promises";
import path from "node:path";
import type {
  OnEvent,
  OrganizeParams,
  PlacementMode,
  PlacementRecord,
  PlanAction,
} from "./types.js";
import { resolveUserPath } from "../config/paths.js";
import { nextNonConflictingName } from "./conflict.js";
import { DuplicateTracker, duplicateDestination } from "./duplicates.js";
import { ConfigurationError, isErrnoCode, NotFoundError } from "./errors.js";
import { writeUndoManifest } from "./manifest.js";
import { placeFile } from "./place.js";
import { computeDestination } from "./rules.js";
import { walkSourceFiles } from "./scan.js";

const PLAN_ACTIONS: Record<PlacementMode, PlanAction> = {
  move: "plan-move",
  copy: "plan-copy",
  hardlink: "plan-hardlink",
};

/** Resolve symlinks where the path exists; otherwise resolve lexically. */
async function resolveReal(p: string): Promise<string> {
  const abs = path.resolve(p);
  try {
    return await fs.realpath(abs);
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT") && !isErrnoCode(err, "ENOTDIR")) {
      throw err;
    }
    const parent = path.dirname(abs);
    if (parent === abs) {
      return abs;
    }
    return path.join(await resolveReal(parent), path.basename(abs));
  }
}

function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

async function validateRoots(sourceRoot: string, destRoot: string): Promise<void> {
  try {
    const stat = await fs.stat(sourceRoot);
    if (!stat.isDirectory()) {
      throw new ConfigurationError(`Source is not a directory: ${sourceRoot}`);
    }
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new NotFoundError(`Source folder not found: ${sourceRoot}`);
    }
    throw err;
  }

  const realSource = await resolveReal(sourceRoot);
  const realDest = await resolveReal(destRoot);
  if (realSource === realDest) {
    throw new ConfigurationError("Destination must differ from source.");
  }
  if (isWithin(realDest, realSource)) {
    throw new ConfigurationError("Destination directory cannot be inside the source directory.");
  }
}

/**
 * Organize every file under `source_root` into `dest_root` according to the
 * rules. In dry-run mode nothing is touched and `plan-*` records describe
 * what would happen. Filesystem errors abort the run where they occur;
 * files already placed stay placed.
 */
export async function runOrganize(
  params: OrganizeParams,
  onEvent?: OnEvent,
): Promise<PlacementRecord[]> {
  const startMs = Date.now();
  const sourceRoot = resolveUserPath(params.source_root);
  const destRoot = resolveUserPath(params.dest_root);
  const { rules, mode, dry_run: dryRun } = params;

  await validateRoots(sourceRoot, destRoot);

  onEvent?.({
    type: "organize.start",
    source_root: sourceRoot,
    dest_root: destRoot,
    mode,
    dry_run: dryRun,
  });

  const results: PlacementRecord[] = [];
  const tracker = new DuplicateTracker(rules.hash_algo);
  let placedCount = 0;
  let totalBytes = 0;

  const files = walkSourceFiles(sourceRoot, {
    exclude_dirs: rules.exclude_dirs,
    exclude_hidden: rules.exclude_hidden,
    on_skip: (absPath, reason) => onEvent?.({ type: "organize.skipped", path: absPath, reason }),
  });

  for await (const file of files) {
    let dst = computeDestination(file, destRoot, rules);
    let fileMode = mode;

    const check = await tracker.check(file);
    if (check.kind === "duplicate") {
      onEvent?.({
        type: "organize.duplicate",
        src: file.abs_path,
        duplicate_of: check.first_seen,
        policy: rules.duplicates.action,
      });
      if (rules.duplicates.action === "skip") {
        results.push({
          src: file.abs_path,
          dst: "",
          action: "skip-duplicate",
          duplicate_of: check.first_seen,
        });
        continue;
      }
      dst = duplicateDestination(file, check.first_seen, destRoot, rules.duplicates);
      if (rules.duplicates.action === "hardlink") {
        fileMode = "hardlink";
      }
    }
    const duplicateOf = check.kind === "duplicate" ? { duplicate_of: check.first_seen } : {};

    if (dryRun) {
      const planned = await nextNonConflictingName(dst);
      const action = PLAN_ACTIONS[fileMode];
      results.push({ src: file.abs_path, dst: planned, action, ...duplicateOf });
      onEvent?.({ type: "organize.planned", src: file.abs_path, dst: planned, action });
      continue;
    }

    const outcome = await placeFile(file.abs_path, dst, fileMode);
    placedCount++;
    totalBytes += file.size;
    results.push({ src: file.abs_path, dst: outcome.dst, action: outcome.action, ...duplicateOf });
    onEvent?.({
      type: "organize.placed",
      src: file.abs_path,
      dst: outcome.dst,
      action: outcome.action,
      requested: fileMode,
    });
  }

  if (!dryRun && params.manifest_path) {
    const manifestPath = resolveUserPath(params.manifest_path);
    const manifest = await writeUndoManifest(manifestPath, results);
    onEvent?.({
      type: "organize.manifest.written",
      manifest_path: manifestPath,
      operation_count: manifest.operations.length,
    });
  }

  onEvent?.({
    type: "organize.done",
    processed_count: results.length,
    placed_count: placedCount,
    duplicate_count: tracker.duplicateCount,
    total_bytes: totalBytes,
    elapsed_ms: Date.now() - startMs,
  });

  return results;
}
