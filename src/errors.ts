/**
 * Error classes for every way a rename run can stop.
 */

import type { RenameStep } from "./planner.js";

export type RenameErrorKind =
  | "structural"
  | "planning"
  | "stale"
  | "precondition"
  | "filesystem"
  | "editor"
  | "config";

export class RenameError extends Error {
  readonly kind: RenameErrorKind;

  constructor(kind: RenameErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RenameError";
    this.kind = kind;
  }
}

export type ValidationIssueCode =
  | "line-count"
  | "duplicate-target"
  | "overwrites-untouched"
  | "empty"
  | "escapes-root"
  | "directory"
  | "nested-in-flat-mode"
  | "inside-file";

export interface ValidationIssue {
  readonly code: ValidationIssueCode;
  /** 1-based line in the edited list; absent for whole-list issues. */
  readonly line?: number;
  readonly path?: string;
  readonly message: string;
}

export class ValidationError extends RenameError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super("structural", formatIssues(issues));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.line === undefined ? issue.message : `line ${issue.line}: ${issue.message}`))
    .join("\n");
}

export class PlanningError extends RenameError {
  constructor(message: string) {
    super("planning", message);
    this.name = "PlanningError";
  }
}

export class StaleSnapshotError extends RenameError {
  readonly added: readonly string[];
  readonly removed: readonly string[];

  constructor(added: readonly string[], removed: readonly string[]) {
    const details = [
      ...added.map((p) => `  + ${p}`),
      ...removed.map((p) => `  - ${p}`),
    ];
    super(
      "stale",
      ["The files in the directory changed while you were editing them.", ...details].join("\n"),
    );
    this.name = "StaleSnapshotError";
    this.added = added;
    this.removed = removed;
  }
}

/** Base for failures that stop execution after some steps may have completed. */
export class ExecutionError extends RenameError {
  readonly step: RenameStep;
  readonly index: number;
  readonly completed: readonly RenameStep[];

  constructor(
    kind: "precondition" | "filesystem",
    message: string,
    step: RenameStep,
    index: number,
    completed: readonly RenameStep[],
    options?: ErrorOptions,
  ) {
    super(kind, message, options);
    this.name = "ExecutionError";
    this.step = step;
    this.index = index;
    this.completed = completed;
  }
}

export class PreconditionError extends ExecutionError {
  constructor(message: string, step: RenameStep, index: number, completed: readonly RenameStep[]) {
    super("precondition", message, step, index, completed);
    this.name = "PreconditionError";
  }
}

export class FilesystemError extends ExecutionError {
  constructor(
    message: string,
    step: RenameStep,
    index: number,
    completed: readonly RenameStep[],
    cause: unknown,
  ) {
    super("filesystem", message, step, index, completed, { cause });
    this.name = "FilesystemError";
  }
}

export class EditorError extends RenameError {
  constructor(message: string, options?: ErrorOptions) {
    super("editor", message, options);
    this.name = "EditorError";
  }
}

export class ConfigError extends RenameError {
  constructor(message: string, options?: ErrorOptions) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
