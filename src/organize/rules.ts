import { lookup } from "mime-types";
import path from "node:path";
import picomatch from "picomatch";
import type { CandidateFile, RuleSet } from "./types.js";

const BYTES_PER_MB = 1024 * 1024;

const pad2 = (n: number) => String(n).padStart(2, "0");

/**
 * Normalize an extension key: lower-case with exactly one leading dot.
 * "JPG", ".jpg" and "..Jpg" all become ".jpg".
 */
export function normalizeExtension(ext: string): string {
  const bare = ext.trim().replace(/^\.+/, "").toLowerCase();
  return `.${bare}`;
}

/** Lower-cased last suffix of a file name, "" when there is none. */
export function fileExtension(fileName: string): string {
  const ext = path.extname(fileName);
  return ext === "." ? "" : ext.toLowerCase();
}

function toPosixSegments(p: string): string[] {
  return p.split(/[/\\]+/).filter(Boolean);
}

/**
 * Match a glob against a file path. Relative patterns are anchored at the
 * end of the path, so "*.txt" matches any .txt file and "docs/*.md" only
 * .md files directly inside a "docs" folder. Absolute patterns match the
 * whole path.
 */
export function matchGlob(pattern: string, filePath: string): boolean {
  const isMatch = picomatch(pattern, { dot: true });
  const segments = toPosixSegments(filePath);
  if (pattern.startsWith("/")) {
    return isMatch(`/${segments.join("/")}`);
  }
  const patternDepth = toPosixSegments(pattern).length;
  if (!pattern.includes("**")) {
    if (patternDepth > segments.length) {
      return false;
    }
    return isMatch(segments.slice(-patternDepth).join("/"));
  }
  // "**" can span any number of segments: try every trailing run
  for (let start = segments.length - 1; start >= 0; start--) {
    if (isMatch(segments.slice(start).join("/"))) {
      return true;
    }
  }
  return false;
}

/** MIME type guessed from the file name alone, or null when unknown. */
export function guessMimeType(fileName: string): string | null {
  const mime = lookup(fileName);
  return mime === false ? null : mime;
}

/**
 * Classification folder for a file: extension rules first, then glob rules
 * in declared order, then MIME prefixes in declared order. Null when nothing
 * matches.
 */
export function matchClassificationFolder(filePath: string, rules: RuleSet): string | null {
  const name = path.basename(filePath);

  const byExt = rules.by_extension.get(fileExtension(name));
  if (byExt !== undefined) {
    return byExt;
  }

  for (const rule of rules.by_glob) {
    if (matchGlob(rule.pattern, filePath)) {
      return rule.folder;
    }
  }

  const mime = guessMimeType(name);
  if (mime) {
    for (const rule of rules.by_mime) {
      if (mime.startsWith(rule.prefix)) {
        return rule.folder;
      }
    }
  }

  return null;
}

/**
 * First size bucket the file fits in. Buckets without `max_mb` are
 * catch-alls.
 */
export function matchSizeBucket(sizeBytes: number, rules: RuleSet): string | null {
  const mb = sizeBytes / BYTES_PER_MB;
  for (const bucket of rules.size_buckets) {
    if (bucket.max_mb === undefined || mb <= bucket.max_mb) {
      return bucket.folder;
    }
  }
  return null;
}

/** Year/month/day folder names for a timestamp, in local time. */
export function dateSegments(mtimeMs: number, group: RuleSet["by_date"]["group"]): string[] {
  const d = new Date(mtimeMs);
  const year = String(d.getFullYear()).padStart(4, "0");
  if (group === "year") {
    return [year];
  }
  if (group === "day") {
    return [year, pad2(d.getMonth() + 1), pad2(d.getDate())];
  }
  return [year, pad2(d.getMonth() + 1)];
}

/**
 * Destination for a file:
 * destRoot / sizeBucket? / (dateBase / YYYY[/MM[/DD]])? / classification / name
 */
export function computeDestination(file: CandidateFile, destRoot: string, rules: RuleSet): string {
  const folder = matchClassificationFolder(file.abs_path, rules) ?? rules.unknown_folder;

  let parts = [folder];

  if (rules.by_date.enabled) {
    parts = [rules.by_date.base_folder, ...dateSegments(file.mtime_ms, rules.by_date.group), ...parts];
  }

  const bucket = matchSizeBucket(file.size, rules);
  if (bucket) {
    parts = [bucket, ...parts];
  }

  return path.join(destRoot, ...parts, path.basename(file.abs_path));
}
