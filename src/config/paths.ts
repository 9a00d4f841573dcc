import os from "node:os";
import path from "node:path";

export const DEFAULT_MANIFEST_FILENAME = ".undo_manifest.json";

function resolveHomeDir(env: NodeJS.ProcessEnv, homedir: () => string): string {
  return env.TIDYFS_HOME?.trim() || env.HOME?.trim() || homedir();
}

/**
 * Absolute form of a user-supplied path, expanding a leading `~`.
 * Empty input stays empty.
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
  cwd: string = process.cwd(),
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~") {
    return path.resolve(resolveHomeDir(env, homedir));
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(resolveHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(cwd, trimmed);
}

/**
 * Rules config path.
 * Precedence: explicit flag, then TIDYFS_CONFIG. Undefined means built-in defaults.
 */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | undefined {
  const value = explicit?.trim() || env.TIDYFS_CONFIG?.trim();
  return value ? resolveUserPath(value, env, os.homedir, cwd) : undefined;
}

/**
 * Undo manifest path.
 * Precedence: explicit flag, then TIDYFS_MANIFEST, then ./.undo_manifest.json.
 */
export function resolveManifestPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const value = explicit?.trim() || env.TIDYFS_MANIFEST?.trim();
  if (value) {
    return resolveUserPath(value, env, os.homedir, cwd);
  }
  return path.join(path.resolve(cwd), DEFAULT_MANIFEST_FILENAME);
}
