import { Value } from "@sinclair/typebox/value";
import { load as loadYaml } from "js-yaml";
import fs from "node:fs/promises";
import type { GlobRule, MimeRule, RuleSet } from "../organize/types.js";
import { isErrnoCode, NotFoundError, ParseError } from "../organize/errors.js";
import { normalizeExtension } from "../organize/rules.js";
import { RulesConfigSchema, type RulesConfig } from "./schema.js";

export const DEFAULT_EXCLUDE_DIRS = [".git", "__pycache__", "node_modules"] as const;

/**
 * Parse a rules document. JSON is tried first, then YAML.
 */
export function parseRulesText(text: string, source = "<config>"): unknown {
  try {
    return JSON.parse(text);
  } catch (jsonErr) {
    try {
      return loadYaml(text);
    } catch (yamlErr) {
      const reason = yamlErr instanceof Error ? yamlErr.message : String(yamlErr);
      const jsonReason = jsonErr instanceof Error ? jsonErr.message : String(jsonErr);
      throw new ParseError(
        `Failed to parse ${source} as JSON (${jsonReason}) or YAML (${reason})`,
      );
    }
  }
}

/**
 * Validate a parsed document and fill in defaults. Extension keys are
 * normalized; glob and MIME rules keep their declared order (see the
 * schema for the integer-like key caveat of the object form).
 */
export function buildRuleSet(doc: unknown, source = "<config>"): RuleSet {
  const raw = doc ?? {};
  if (!Value.Check(RulesConfigSchema, raw)) {
    const problems = [...Value.Errors(RulesConfigSchema, raw)].map(
      (e) => `  ${e.path || "/"}: ${e.message}`,
    );
    throw new ParseError(`Invalid rules in ${source}:\n${problems.join("\n")}`);
  }
  return toRuleSet(raw);
}

function toGlobRules(rules: RulesConfig["by_glob"]): GlobRule[] {
  if (rules === undefined) {
    return [];
  }
  if (Array.isArray(rules)) {
    return rules.map(({ pattern, folder }) => ({ pattern, folder }));
  }
  return Object.entries(rules).map(([pattern, folder]) => ({ pattern, folder }));
}

function toMimeRules(rules: RulesConfig["by_mime"]): MimeRule[] {
  if (rules === undefined) {
    return [];
  }
  if (Array.isArray(rules)) {
    return rules.map(({ prefix, folder }) => ({ prefix, folder }));
  }
  return Object.entries(rules).map(([prefix, folder]) => ({ prefix, folder }));
}

function toRuleSet(cfg: RulesConfig): RuleSet {
  const byExtension = new Map<string, string>();
  for (const [ext, folder] of Object.entries(cfg.by_extension ?? {})) {
    byExtension.set(normalizeExtension(ext), folder);
  }

  return {
    unknown_folder: cfg.unknown_folder ?? "Others",
    exclude_dirs: new Set<string>(cfg.exclude_dirs ?? DEFAULT_EXCLUDE_DIRS),
    exclude_hidden: cfg.exclude_hidden ?? true,
    by_extension: byExtension,
    by_glob: toGlobRules(cfg.by_glob),
    by_mime: toMimeRules(cfg.by_mime),
    by_date: {
      enabled: cfg.by_date?.enabled ?? false,
      base_folder: cfg.by_date?.base_folder ?? "By Date",
      group: cfg.by_date?.group ?? "month",
    },
    size_buckets: (cfg.size_buckets ?? []).map((b) =>
      b.max_mb === undefined || b.max_mb === null
        ? { folder: b.folder }
        : { max_mb: b.max_mb, folder: b.folder },
    ),
    duplicates: {
      action: cfg.duplicates?.action ?? "separate",
      folder: cfg.duplicates?.folder ?? "Duplicates",
    },
    hash_algo: cfg.hash_algo ?? "sha256",
  };
}

export function defaultRuleSet(): RuleSet {
  return buildRuleSet({});
}

/**
 * Load rules from a JSON or YAML file; no path means built-in defaults.
 */
export async function loadRules(configPath?: string): Promise<RuleSet> {
  if (!configPath) {
    return defaultRuleSet();
  }
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new NotFoundError(`Config file not found: ${configPath}`);
    }
    throw err;
  }
  return buildRuleSet(parseRulesText(text, configPath), configPath);
}
