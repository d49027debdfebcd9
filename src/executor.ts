/**
 * Plan execution: re-check the filesystem, then rename step by step, stopping at the first problem.
 * Completed renames are never rolled back.
 */

import { lstatSync, mkdirSync, renameSync, statSync } from "node:fs";
import { dirname, join } from "node:path";
import { FilesystemError, PreconditionError, StaleSnapshotError, errorMessage } from "./errors.js";
import type { RenamePlan, RenameStep } from "./planner.js";
import { compareSnapshots, takeSnapshot } from "./snapshot.js";

/** Append-only record of completed steps. */
export interface RenameJournal {
  record(step: RenameStep, index: number): void;
}

export class MemoryJournal implements RenameJournal {
  readonly steps: RenameStep[] = [];

  record(step: RenameStep): void {
    this.steps.push(step);
  }
}

export interface ExecutionReport {
  readonly completed: readonly RenameStep[];
}

/** Throws StaleSnapshotError if the files under the root no longer match the plan's snapshot. */
export function ensureSnapshotUnchanged(plan: RenamePlan): void {
  const { config, snapshot } = plan.request;
  const { same, added, removed } = compareSnapshots(snapshot, takeSnapshot(config));
  if (!same) throw new StaleSnapshotError(added, removed);
}

function describe(step: RenameStep): string {
  return `"${step.from}" → "${step.to}"`;
}

/**
 * Run every step of `plan`. Before each rename the source must still be a file and the
 * target must not exist; otherwise a PreconditionError stops the run.
 */
export function executePlan(plan: RenamePlan, journal: RenameJournal = new MemoryJournal()): ExecutionReport {
  ensureSnapshotUnchanged(plan);

  const { root } = plan.request.config;
  const completed: RenameStep[] = [];

  plan.steps.forEach((step, index) => {
    const from = join(root, step.from);
    const to = join(root, step.to);

    try {
      const source = statSync(from, { throwIfNoEntry: false });
      if (source === undefined) {
        throw new PreconditionError(`Source vanished before ${describe(step)}.`, step, index, completed);
      }
      if (!source.isFile()) {
        throw new PreconditionError(`Source is no longer a file before ${describe(step)}.`, step, index, completed);
      }
      if (lstatSync(to, { throwIfNoEntry: false }) !== undefined) {
        throw new PreconditionError(`Target already exists before ${describe(step)}.`, step, index, completed);
      }
      mkdirSync(dirname(to), { recursive: true });
      renameSync(from, to);
    } catch (err: unknown) {
      if (err instanceof PreconditionError) throw err;
      throw new FilesystemError(
        `Could not rename ${describe(step)}: ${errorMessage(err)}`,
        step,
        index,
        completed,
        err,
      );
    }

    completed.push(step);
    journal.record(step, index);
  });

  return { completed };
}
