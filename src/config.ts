/**
 * Run configuration: one explicit value threaded through traversal, validation, planning and execution.
 */

import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { ParsedArgs } from "./flags.js";
import type { UserConfig } from "./user-config.js";
import { ConfigError } from "./errors.js";

export interface RenameConfig {
  /** Absolute directory all snapshot paths are relative to. */
  readonly root: string;
  readonly recursive: boolean;
  /** List hidden files and skip .gitignore/.ignore filtering. */
  readonly noIgnore: boolean;
  readonly log: boolean;
  readonly dryRun: boolean;
}

export const DEFAULT_EDITOR = process.platform === "win32" ? "code.cmd" : "code";

export function createConfig(root: string, overrides: Partial<Omit<RenameConfig, "root">> = {}): RenameConfig {
  return {
    root: resolve(root),
    recursive: overrides.recursive ?? false,
    noIgnore: overrides.noIgnore ?? false,
    log: overrides.log ?? true,
    dryRun: overrides.dryRun ?? false,
  };
}

export function resolveConfig(args: ParsedArgs, user: UserConfig): RenameConfig {
  const config = createConfig(args.path ?? ".", {
    recursive: args.recursive,
    noIgnore: args.noIgnore,
    log: !args.noLog && (user.log ?? true),
    dryRun: args.dryRun,
  });
  ensureDir(config.root);
  return config;
}

function ensureDir(dir: string): void {
  const stats = statSync(dir, { throwIfNoEntry: false });
  if (stats === undefined) {
    throw new ConfigError(`Directory does not exist: ${dir}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Not a directory: ${dir}`);
  }
}

/**
 * Editor command line as argv. `--code` wins, then the config file, then $VISUAL and $EDITOR.
 */
export function resolveEditorCommand(
  args: Pick<ParsedArgs, "code">,
  user: UserConfig,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const candidates = [
    args.code ? DEFAULT_EDITOR : undefined,
    user.editor,
    env.VISUAL,
    env.EDITOR,
    DEFAULT_EDITOR,
  ];
  const command = candidates.find((c): c is string => c !== undefined && c.trim() !== "") ?? DEFAULT_EDITOR;
  return command.trim().split(/\s+/);
}
