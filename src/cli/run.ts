import os from "node:os";
import type { OnEvent } from "../organize/types.js";
import type { CliCommand } from "./args.js";
import { loadRules } from "../config/load.js";
import { resolveConfigPath, resolveManifestPath, resolveUserPath } from "../config/paths.js";
import { TidyError } from "../organize/errors.js";
import { runOrganize } from "../organize/organize.js";
import { runUndo } from "../organize/undo.js";
import { VERSION } from "../version.js";
import { parseCliArgs, USAGE } from "./args.js";
import { emitCliBanner } from "./banner.js";
import { formatEvent } from "./format.js";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  cwd: process.cwd(),
};

export function createConsoleSink(io: Pick<CliIo, "out" | "err">): OnEvent {
  return (event) => {
    const line = formatEvent(event);
    if (line.level === "warn") {
      io.err(line.text);
    } else {
      io.out(line.text);
    }
  };
}

export async function executeCommand(command: CliCommand, io: CliIo = defaultIo): Promise<void> {
  const sink = createConsoleSink(io);
  switch (command.kind) {
    case "help":
      io.out(USAGE);
      return;
    case "version":
      io.out(VERSION);
      return;
    case "undo":
      await runUndo(resolveManifestPath(command.manifest, io.env, io.cwd), sink);
      return;
    case "organize": {
      const rules = await loadRules(resolveConfigPath(command.config, io.env, io.cwd));
      await runOrganize(
        {
          source_root: resolveUserPath(command.source, io.env, os.homedir, io.cwd),
          dest_root: resolveUserPath(command.dest, io.env, os.homedir, io.cwd),
          rules: command.no_hidden ? { ...rules, exclude_hidden: true } : rules,
          mode: command.mode,
          dry_run: command.dry_run,
          manifest_path: command.dry_run
            ? undefined
            : resolveManifestPath(command.manifest, io.env, io.cwd),
        },
        sink,
      );
      return;
    }
  }
}

/**
 * CLI entry. Resolves to the process exit code: 0 on success, 1 on a
 * failed run, 2 on bad usage.
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    io.err(parsed.error);
    io.err(USAGE);
    return 2;
  }
  emitCliBanner(VERSION, { argv });
  try {
    await executeCommand(parsed.command, io);
    return 0;
  } catch (err) {
    if (err instanceof TidyError) {
      io.err(`${err.name}: ${err.message}`);
    } else {
      io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}
