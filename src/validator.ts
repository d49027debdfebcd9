/**
 * Validation of an edited list against its snapshot. Pure: no filesystem access.
 */

import { posix } from "node:path";
import type { RenameConfig } from "./config.js";
import type { ValidationIssue } from "./errors.js";
import { ValidationError } from "./errors.js";
import type { Snapshot } from "./snapshot.js";
import { normalizeEntry } from "./snapshot.js";

/** One rename operation: original path → new path */
export interface RenameEntry {
  readonly oldName: string;
  readonly newName: string;
}

/** A validated edit: the changed lines plus everything needed to plan and execute them. */
export interface RenameRequest {
  readonly config: RenameConfig;
  readonly snapshot: Snapshot;
  /** Changed lines only, in snapshot order. */
  readonly mapping: readonly RenameEntry[];
  /** Paths whose line was left as is. */
  readonly unchanged: readonly string[];
}

interface Line {
  /** 1-based */
  readonly line: number;
  readonly oldName: string;
  readonly newName: string;
}

function checkLineCount(snapshot: Snapshot, edited: readonly string[]): ValidationIssue[] {
  if (edited.length === snapshot.length) return [];
  return [
    {
      code: "line-count",
      message: `The edited list has ${edited.length} lines but ${snapshot.length} files were listed. Do not add or remove lines.`,
    },
  ];
}

function checkUniqueTargets(changed: readonly Line[]): ValidationIssue[] {
  const linesByTarget = new Map<string, Line[]>();
  for (const entry of changed) {
    if (entry.newName === "") continue;
    const lines = linesByTarget.get(entry.newName) ?? [];
    lines.push(entry);
    linesByTarget.set(entry.newName, lines);
  }
  const issues: ValidationIssue[] = [];
  for (const [target, lines] of linesByTarget) {
    if (lines.length < 2) continue;
    const lineList = lines.map((l) => l.line).join(", ");
    for (const entry of lines) {
      issues.push({
        code: "duplicate-target",
        line: entry.line,
        path: target,
        message: `Lines ${lineList} would all be renamed to "${target}".`,
      });
    }
  }
  return issues.sort((a, b) => (a.line ?? 0) - (b.line ?? 0));
}

function checkUntouchedCollisions(snapshot: Snapshot, changed: readonly Line[]): ValidationIssue[] {
  const sources = new Set(changed.map((entry) => entry.oldName));
  const existing = new Set(snapshot);
  return changed
    .filter((entry) => existing.has(entry.newName) && !sources.has(entry.newName))
    .map((entry): ValidationIssue => ({
      code: "overwrites-untouched",
      line: entry.line,
      path: entry.newName,
      message: `Renaming "${entry.oldName}" would overwrite "${entry.newName}", which is not being renamed.`,
    }));
}

/** "a/b/c.txt" → ["a", "a/b"] */
function parentDirs(path: string): string[] {
  const parts = path.split("/");
  return parts.slice(1).map((_, i) => parts.slice(0, i + 1).join("/"));
}

function checkWellFormed(config: RenameConfig, snapshot: Snapshot, changed: readonly Line[]): ValidationIssue[] {
  // every path that is a file at some point of the run, and every directory those paths imply
  const files = new Set([...snapshot, ...changed.map((entry) => entry.newName)]);
  const directories = new Set([...files].flatMap(parentDirs));
  const issues: ValidationIssue[] = [];
  for (const { line, oldName, newName } of changed) {
    if (newName === "") {
      issues.push({ code: "empty", line, message: `The new name for "${oldName}" is empty.` });
    } else if (posix.isAbsolute(newName) || newName === ".." || newName.startsWith("../")) {
      issues.push({
        code: "escapes-root",
        line,
        path: newName,
        message: `"${newName}" is outside the directory being renamed.`,
      });
    } else if (newName === "." || newName.endsWith("/")) {
      issues.push({ code: "directory", line, path: newName, message: `"${newName}" names a directory.` });
    } else if (!config.recursive && newName.includes("/")) {
      issues.push({
        code: "nested-in-flat-mode",
        line,
        path: newName,
        message: `"${newName}" moves the file into a subdirectory; use --recursive for that.`,
      });
    } else if (directories.has(newName)) {
      issues.push({ code: "directory", line, path: newName, message: `"${newName}" is a directory.` });
    } else {
      const file = parentDirs(newName).find((dir) => files.has(dir));
      if (file !== undefined) {
        issues.push({
          code: "inside-file",
          line,
          path: newName,
          message: `"${newName}" would be inside "${file}", which is a file.`,
        });
      }
    }
  }
  return issues;
}

/**
 * Validate `edited` against `snapshot`. Checks run in order and the first one that fails
 * throws a ValidationError listing every offending line.
 */
export function createRenameRequest(
  config: RenameConfig,
  snapshot: Snapshot,
  edited: readonly string[],
): RenameRequest {
  const countIssues = checkLineCount(snapshot, edited);
  if (countIssues.length > 0) throw new ValidationError(countIssues);

  const changed: Line[] = [];
  const unchanged: string[] = [];
  snapshot.forEach((oldName, i) => {
    const newName = normalizeEntry(edited[i]);
    if (newName === oldName) {
      unchanged.push(oldName);
    } else {
      changed.push({ line: i + 1, oldName, newName });
    }
  });

  for (const check of [
    () => checkUniqueTargets(changed),
    () => checkUntouchedCollisions(snapshot, changed),
    () => checkWellFormed(config, snapshot, changed),
  ]) {
    const issues = check();
    if (issues.length > 0) throw new ValidationError(issues);
  }

  return {
    config,
    snapshot,
    mapping: changed.map(({ oldName, newName }) => ({ oldName, newName })),
    unchanged,
  };
}
