import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import fs from "node:fs/promises";
import path from "node:path";
import type { PlacementRecord } from "./types.js";
import { isErrnoCode, NotFoundError, ParseError } from "./errors.js";
import { partialPathFor } from "./place.js";

const ManifestOperationSchema = Type.Object({
  src: Type.String({ minLength: 1 }),
  dst: Type.String({ minLength: 1 }),
  action: Type.Union([Type.Literal("move"), Type.Literal("copy"), Type.Literal("hardlink")]),
});

export const UndoManifestSchema = Type.Object({
  operations: Type.Array(ManifestOperationSchema),
});

export type ManifestOperation = Static<typeof ManifestOperationSchema>;
export type UndoManifest = Static<typeof UndoManifestSchema>;

/** Keep only records that changed the filesystem, in the order they were applied. */
export function toManifestOperations(records: readonly PlacementRecord[]): ManifestOperation[] {
  const ops: ManifestOperation[] = [];
  for (const r of records) {
    if (r.action === "move" || r.action === "copy" || r.action === "hardlink") {
      ops.push({ src: r.src, dst: r.dst, action: r.action });
    }
  }
  return ops;
}

/**
 * Write the undo manifest, replacing any previous one. The document goes to
 * a uniquely named temp file beside the target and is renamed over it.
 */
export async function writeUndoManifest(
  manifestPath: string,
  records: readonly PlacementRecord[],
): Promise<UndoManifest> {
  const manifest: UndoManifest = { operations: toManifestOperations(records) };
  await fs.mkdir(path.dirname(manifestPath), { recursive: true });
  const partial = partialPathFor(manifestPath);
  await fs.writeFile(partial, JSON.stringify(manifest, null, 2), { encoding: "utf-8", flag: "wx" });
  await fs.rename(partial, manifestPath);
  return manifest;
}

export async function readUndoManifest(manifestPath: string): Promise<UndoManifest> {
  let text: string;
  try {
    text = await fs.readFile(manifestPath, "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new NotFoundError(`Undo manifest not found: ${manifestPath}`);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError(
      `Undo manifest is not valid JSON (${manifestPath}): ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!Value.Check(UndoManifestSchema, data)) {
    const first = Value.Errors(UndoManifestSchema, data).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unexpected shape";
    throw new ParseError(`Invalid undo manifest (${manifestPath}): ${where}`);
  }
  return data;
}
