import path from "node:path";
import type { CandidateFile, DuplicateRule, HashAlgo } from "./types.js";
import { hashFile } from "./hash.js";

export type DuplicateCheck =
  | { kind: "first"; hash: string }
  | { kind: "duplicate"; hash: string; first_seen: string };

/**
 * Run-scoped fingerprint index. One tracker per organize run; entries are
 * only ever added, and the first path seen for a fingerprint is kept.
 */
export class DuplicateTracker {
  private readonly firstSeen = new Map<string, string>(); // hash -> abs path
  private duplicates = 0;
  private readonly hashAlgo: HashAlgo;

  constructor(hashAlgo: HashAlgo = "sha256") {
    this.hashAlgo = hashAlgo;
  }

  async check(file: CandidateFile): Promise<DuplicateCheck> {
    const hash = await hashFile(file.abs_path, this.hashAlgo);
    const existing = this.firstSeen.get(hash);
    if (existing !== undefined) {
      this.duplicates++;
      return { kind: "duplicate", hash, first_seen: existing };
    }
    this.firstSeen.set(hash, file.abs_path);
    return { kind: "first", hash };
  }

  get duplicateCount(): number {
    return this.duplicates;
  }
}

/**
 * Destination for a duplicate under the `separate` and `hardlink` policies.
 * `hardlink` names the link after the first-seen file, so duplicates with
 * different names collapse onto one name before conflict naming.
 */
export function duplicateDestination(
  file: CandidateFile,
  firstSeen: string,
  destRoot: string,
  policy: DuplicateRule,
): string {
  const name = policy.action === "hardlink" ? path.basename(firstSeen) : path.basename(file.abs_path);
  return path.join(destRoot, policy.folder, name);
}
