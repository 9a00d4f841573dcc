export type PlacementMode = "move" | "copy" | "hardlink";

export type PlanAction = "plan-move" | "plan-copy" | "plan-hardlink";

export type PlacementAction = PlacementMode | PlanAction | "skip-duplicate" | "undo";

export type HashAlgo = "sha256" | "sha512" | "blake3";

export type DateGroup = "year" | "month" | "day";

export type DuplicateAction = "skip" | "separate" | "hardlink";

export type GlobRule = {
  pattern: string;
  folder: string;
};

export type MimeRule = {
  prefix: string;
  folder: string;
};

export type DateRule = {
  enabled: boolean;
  base_folder: string;
  group: DateGroup;
};

export type SizeBucket = {
  max_mb?: number; // omitted = catch-all
  folder: string;
};

export type DuplicateRule = {
  action: DuplicateAction;
  folder: string;
};

/**
 * Loaded organizer rules. Glob and MIME rules are ordered lists because
 * resolution is first-match.
 */
export type RuleSet = {
  unknown_folder: string;
  exclude_dirs: ReadonlySet<string>;
  exclude_hidden: boolean;
  by_extension: ReadonlyMap<string, string>; // ".jpg" -> "Images"
  by_glob: readonly GlobRule[];
  by_mime: readonly MimeRule[];
  by_date: DateRule;
  size_buckets: readonly SizeBucket[];
  duplicates: DuplicateRule;
  hash_algo: HashAlgo;
};

export type CandidateFile = {
  abs_path: string;
  rel_path: string; // relative to source root
  size: number;
  mtime_ms: number;
};

export type SkipReason = "symlink" | "special";

export type PlacementRecord = {
  src: string;
  dst: string; // "" when action is skip-duplicate
  action: PlacementAction;
  duplicate_of?: string; // first-seen source path for duplicate hits
};

export type OrganizeParams = {
  source_root: string;
  dest_root: string;
  rules: RuleSet;
  mode: PlacementMode;
  dry_run: boolean;
  manifest_path?: string;
};

// Status events emitted via the onEvent callback
export type OrganizeEvent =
  | {
      type: "organize.start";
      source_root: string;
      dest_root: string;
      mode: PlacementMode;
      dry_run: boolean;
    }
  | { type: "organize.skipped"; path: string; reason: SkipReason }
  | { type: "organize.planned"; src: string; dst: string; action: PlanAction }
  | {
      type: "organize.placed";
      src: string;
      dst: string;
      action: PlacementMode;
      requested: PlacementMode;
    }
  | {
      type: "organize.duplicate";
      src: string;
      duplicate_of: string;
      policy: DuplicateAction;
    }
  | { type: "organize.manifest.written"; manifest_path: string; operation_count: number }
  | {
      type: "organize.done";
      processed_count: number;
      placed_count: number;
      duplicate_count: number;
      total_bytes: number;
      elapsed_ms: number;
    }
  | { type: "undo.start"; manifest_path: string; operation_count: number }
  | { type: "undo.restored"; src: string; dst: string }
  | { type: "undo.missing"; path: string }
  | { type: "undo.done"; restored_count: number; missing_count: number; elapsed_ms: number };

export type OnEvent = (event: OrganizeEvent) => void;
