/**
 * Shared formatting for the plan preview and failure reports.
 */

import type { RenamePlan, RenameStep } from "../planner.js";
import type { RenameEntry } from "../validator.js";

export const PREVIEW_MAX_LINES = 20;

export function formatPreview(renames: readonly RenameEntry[], maxLines: number): string {
  const lines = renames.slice(0, maxLines).map((r) => `${r.oldName} → ${r.newName}`);
  if (renames.length > maxLines) {
    lines.push(`… and ${renames.length - maxLines} more`);
  }
  return lines.join("\n");
}

/** One line per cycle, naming the file that is parked under a temporary name. */
export function formatCycleBreaks(plan: RenamePlan): string[] {
  return plan.groups.flatMap((group) =>
    group.kind === "cycle"
      ? [
          `Breaking a cycle of ${group.entries.length} by temporarily renaming ` +
            `${group.entries[0].oldName} to ${group.tempName}`,
        ]
      : [],
  );
}

export function formatSteps(steps: readonly RenameStep[]): string {
  return steps.map((step) => `${step.from} → ${step.to}`).join("\n");
}
