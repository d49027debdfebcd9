/**
 * Snapshot capture (directory traversal with ignore files) and the text format shown in the editor.
 */

import { readFileSync, statSync } from "node:fs";
import { join, posix } from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import type { RenameConfig } from "./config.js";

/** Ordered, relative, `/`-separated file paths captured at one instant. */
export type Snapshot = readonly string[];

type Ignore = ReturnType<typeof ignore>;

const IGNORE_FILES = [".gitignore", ".ignore"] as const;
const ALWAYS_SKIPPED = ["**/.git/**"];

interface IgnoreRules {
  /** Directory the ignore files live in, relative to the root ("" for the root). */
  readonly dir: string;
  readonly matcher: Ignore;
}

function depth(dir: string): number {
  return dir === "" ? 0 : dir.split("/").length;
}

/** Deepest directories first, so nested ignore files take precedence. */
function loadIgnoreRules(config: RenameConfig): IgnoreRules[] {
  const patterns = IGNORE_FILES.map((name) => (config.recursive ? `**/${name}` : name));
  const found = fg.sync(patterns, {
    cwd: config.root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: ALWAYS_SKIPPED,
  });

  const byDir = new Map<string, Ignore>();
  // .ignore is added after .gitignore so it overrides it within a directory
  for (const name of IGNORE_FILES) {
    for (const file of found.filter((f) => posix.basename(f) === name)) {
      const parent = posix.dirname(file);
      const dir = parent === "." ? "" : parent;
      const matcher = byDir.get(dir) ?? ignore();
      matcher.add(readFileSync(join(config.root, file), "utf-8"));
      byDir.set(dir, matcher);
    }
  }

  return [...byDir.entries()]
    .map(([dir, matcher]) => ({ dir, matcher }))
    .sort((a, b) => depth(b.dir) - depth(a.dir));
}

function isIgnored(path: string, rules: readonly IgnoreRules[]): boolean {
  for (const { dir, matcher } of rules) {
    if (dir !== "" && !path.startsWith(`${dir}/`)) continue;
    const result = matcher.test(dir === "" ? path : path.slice(dir.length + 1));
    if (result.ignored) return true;
    if (result.unignored) return false;
  }
  return false;
}

/** Broken and looping links are not files. */
function linksToFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * List the regular files under `config.root`, sorted. Symlinks to files count as files;
 * symlinked directories are not entered.
 */
export function takeSnapshot(config: RenameConfig): string[] {
  const entries = fg.sync(config.recursive ? "**" : "*", {
    cwd: config.root,
    dot: config.noIgnore,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    ignore: ALWAYS_SKIPPED,
  });
  const files = entries
    .filter(({ path, dirent }) =>
      dirent.isSymbolicLink() ? linksToFile(join(config.root, path)) : dirent.isFile(),
    )
    .map(({ path }) => path);
  const rules = config.noIgnore ? [] : loadIgnoreRules(config);
  return files.filter((path) => !isIgnored(path, rules)).sort();
}

/**
 * Normalized form of one path entry; equal entries have equal normalized forms.
 * Blank input stays "" so validation can report it.
 */
export function normalizeEntry(raw: string): string {
  if (raw.trim() === "") return "";
  return posix.normalize(raw);
}

export function renderList(snapshot: Snapshot): string {
  return snapshot.map((path) => `${path}\n`).join("");
}

/**
 * Parse edited text back into entries. Trailing blank lines are dropped, inner ones kept.
 */
export function parseEditedList(content: string): string[] {
  const lines = content.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }
  return lines.map(normalizeEntry);
}

/**
 * Compare a fresh snapshot with the original; returns the paths that appeared and vanished.
 * Both lists empty but `same` false means only the order differs.
 */
export function compareSnapshots(
  original: Snapshot,
  current: Snapshot,
): { same: boolean; added: string[]; removed: string[] } {
  const same = original.length === current.length && original.every((path, i) => path === current[i]);
  if (same) return { same, added: [], removed: [] };
  const before = new Set(original);
  const after = new Set(current);
  return {
    same,
    added: current.filter((path) => !before.has(path)),
    removed: original.filter((path) => !after.has(path)),
  };
}
