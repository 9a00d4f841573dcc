import type { PlacementMode } from "../organize/types.js";

export type OrganizeCommand = {
  kind: "organize";
  source: string;
  dest: string;
  config?: string;
  mode: PlacementMode;
  manifest?: string;
  no_hidden: boolean;
  dry_run: boolean;
};

export type UndoCommand = {
  kind: "undo";
  manifest?: string;
};

export type CliCommand =
  | OrganizeCommand
  | UndoCommand
  | { kind: "help" }
  | { kind: "version" };

export type CliParseResult = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE = `Usage:
  tidyfs organize -s <source> -d <dest> [-c <config>] [--mode move|copy|hardlink]
                  [--manifest <path>] [--no-hidden] [--dry-run]
  tidyfs plan     -s <source> -d <dest> [-c <config>] [--mode move|copy|hardlink] [--no-hidden]
  tidyfs undo     [-m|--manifest <path>]

Environment:
  TIDYFS_CONFIG    rules file used when -c is not given
  TIDYFS_MANIFEST  undo manifest used when --manifest is not given`;

const MODES: readonly PlacementMode[] = ["move", "copy", "hardlink"];

function isMode(value: string): value is PlacementMode {
  return (MODES as readonly string[]).includes(value);
}

/**
 * Parse CLI arguments (without the leading `node script` pair).
 */
export function parseCliArgs(argv: string[]): CliParseResult {
  const [cmd, ...rest] = argv;
  if (!cmd || cmd === "-h" || cmd === "--help" || cmd === "help") {
    return { ok: true, command: { kind: "help" } };
  }
  if (cmd === "-V" || cmd === "--version") {
    return { ok: true, command: { kind: "version" } };
  }

  if (cmd === "undo") {
    let manifest: string | undefined;
    for (let i = 0; i < rest.length; i++) {
      const arg = rest[i];
      if (arg === "-m" || arg === "--manifest") {
        const value = rest[++i];
        if (!value) {
          return { ok: false, error: `${arg} requires a value` };
        }
        manifest = value;
      } else if (arg === "-h" || arg === "--help") {
        return { ok: true, command: { kind: "help" } };
      } else {
        return { ok: false, error: `Unknown option for undo: ${arg}` };
      }
    }
    return { ok: true, command: { kind: "undo", manifest } };
  }

  if (cmd !== "organize" && cmd !== "plan") {
    return { ok: false, error: `Unknown command: ${cmd}` };
  }

  let source: string | undefined;
  let dest: string | undefined;
  let config: string | undefined;
  let manifest: string | undefined;
  let mode: PlacementMode = "move";
  let noHidden = false;
  let dryRun = cmd === "plan";

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "-s":
      case "--source":
      case "-d":
      case "--dest":
      case "-c":
      case "--config":
      case "--mode":
      case "--manifest": {
        const value = rest[++i];
        if (!value) {
          return { ok: false, error: `${arg} requires a value` };
        }
        if (arg === "-s" || arg === "--source") {
          source = value;
        } else if (arg === "-d" || arg === "--dest") {
          dest = value;
        } else if (arg === "-c" || arg === "--config") {
          config = value;
        } else if (arg === "--manifest") {
          manifest = value;
        } else if (isMode(value)) {
          mode = value;
        } else {
          return { ok: false, error: `--mode must be one of: ${MODES.join(", ")}` };
        }
        break;
      }
      case "--no-hidden":
        noHidden = true;
        break;
      case "--dry-run":
        dryRun = true;
        break;
      case "-h":
      case "--help":
        return { ok: true, command: { kind: "help" } };
      default:
        return { ok: false, error: `Unknown option for ${cmd}: ${arg}` };
    }
  }

  if (!source) {
    return { ok: false, error: "--source is required" };
  }
  if (!dest) {
    return { ok: false, error: "--dest is required" };
  }

  return {
    ok: true,
    command: {
      kind: "organize",
      source,
      dest,
      config,
      mode,
      manifest,
      no_hidden: noHidden,
      dry_run: dryRun,
    },
  };
}
