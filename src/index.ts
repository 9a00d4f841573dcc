export { buildRuleSet, defaultRuleSet, loadRules, parseRulesText } from "./config/load.js";
export { resolveConfigPath, resolveManifestPath, resolveUserPath } from "./config/paths.js";
export { RulesConfigSchema, type RulesConfig } from "./config/schema.js";
export { nextNonConflictingName } from "./organize/conflict.js";
export { DuplicateTracker, duplicateDestination } from "./organize/duplicates.js";
export {
  ConfigurationError,
  NotFoundError,
  ParseError,
  TidyError,
  type TidyErrorCode,
} from "./organize/errors.js";
export { hashFile, HASH_CHUNK_BYTES } from "./organize/hash.js";
export { readUndoManifest, writeUndoManifest, type UndoManifest } from "./organize/manifest.js";
export { runOrganize } from "./organize/organize.js";
export { placeFile, type PlacementOutcome } from "./organize/place.js";
export { computeDestination, matchClassificationFolder } from "./organize/rules.js";
export { walkSourceFiles } from "./organize/scan.js";
export type * from "./organize/types.js";
export { runUndo } from "./organize/undo.js";
export { VERSION } from "./version.js";
