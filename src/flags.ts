/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  yes: boolean;
  recursive: boolean;
  noIgnore: boolean;
  noLog: boolean;
  code: boolean;
  path: string | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "recursive", "no-ignore", "no-log", "code"] as const,
  alias: { h: "help", v: "version", y: "yes", r: "recursive", n: "no-ignore", c: "code" } as const,
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  const [path] = raw._;
  // `--no-x` may arrive either as "no-x": true or as x: false
  const values = new Map(Object.entries(raw));
  const negated = (name: string): boolean =>
    values.get(`no-${name}`) === true || values.get(name) === false;
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    yes: Boolean(raw.yes),
    recursive: Boolean(raw.recursive),
    noIgnore: negated("ignore"),
    noLog: negated("log"),
    code: Boolean(raw.code),
    path: path === undefined ? undefined : String(path),
  };
}

export function printHelp(): void {
  const usage = `remv – bulk rename files by editing their paths in your editor

Usage:
  remv [path] [options]  List the files in <path> (default: .), open the list in
                         your editor, then rename every line you changed

Options:
  --recursive, -r        Include files in subdirectories
  --no-ignore, -n        Include hidden files and do not read .gitignore/.ignore
  --no-log               Do not write a remv_<timestamp>.log file
  --code, -c             Use VS Code as the editor
  --dry-run              Show the rename plan only, do not rename
  --yes, -y              Apply renames without confirmation
  --help, -h             Show this help
  --version, -v          Show version

The editor is taken from --code, then "editor" in ~/.remv/config.json,
then $VISUAL, then $EDITOR, and defaults to VS Code.

Keep one path per line and do not add or remove lines. Renames that are
already done stay done if a later one fails.

Examples:
  remv
  remv ./photos --dry-run
  remv src -r --no-ignore`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
