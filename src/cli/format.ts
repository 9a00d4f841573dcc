import path from "node:path";
import type { OrganizeEvent } from "../organize/types.js";

export type LogLevel = "info" | "warn";

export type LogLine = {
  level: LogLevel;
  text: string;
};

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}

const info = (text: string): LogLine => ({ level: "info", text });

/** Render one core event as a single human-readable status line. */
export function formatEvent(event: OrganizeEvent): LogLine {
  switch (event.type) {
    case "organize.start":
      return info(
        `Source: ${event.source_root}\nDest:   ${event.dest_root}\nMode:   ${event.mode}\nDryRun: ${event.dry_run}`,
      );
    case "organize.skipped":
      return {
        level: "warn",
        text: `Skipped ${event.reason === "symlink" ? "symlink" : "special file"}: ${event.path}`,
      };
    case "organize.planned":
      return info(`${event.action.toUpperCase()}: ${event.src} -> ${event.dst}`);
    case "organize.placed": {
      const fallback = event.action === event.requested ? "" : ` (requested ${event.requested})`;
      return info(
        `${event.action.toUpperCase()}: ${path.basename(event.src)} -> ${event.dst}${fallback}`,
      );
    }
    case "organize.duplicate":
      return info(`Duplicate (${event.policy}): ${event.src} (same as ${event.duplicate_of})`);
    case "organize.manifest.written":
      return info(
        `Undo manifest saved -> ${event.manifest_path} (${event.operation_count} operations)`,
      );
    case "organize.done":
      return info(
        `Done: ${event.processed_count} processed, ${event.placed_count} placed, ${event.duplicate_count} duplicates, ${formatBytes(event.total_bytes)} in ${formatElapsed(event.elapsed_ms)}`,
      );
    case "undo.start":
      return info(`Undoing ${event.operation_count} operations from ${event.manifest_path}`);
    case "undo.restored":
      return info(`UNDO: ${event.src} -> ${event.dst}`);
    case "undo.missing":
      return { level: "warn", text: `Missing file for undo: ${event.path}` };
    case "undo.done":
      return info(
        `Undo finished: ${event.restored_count} restored, ${event.missing_count} missing in ${formatElapsed(event.elapsed_ms)}`,
      );
  }
}
