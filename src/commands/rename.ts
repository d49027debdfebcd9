/**
 * The whole rename flow: snapshot, edit, validate, plan, confirm, execute, log.
 * Editing and confirmation are passed in so the flow runs without a terminal.
 */

import type { RenameConfig } from "../config.js";
import type { ExecutionReport, RenameJournal } from "../executor.js";
import { executePlan } from "../executor.js";
import type { PlanOptions, RenamePlan } from "../planner.js";
import { buildPlan } from "../planner.js";
import { writeRenameLog } from "../rename-log.js";
import { parseEditedList, renderList, takeSnapshot } from "../snapshot.js";
import { createRenameRequest } from "../validator.js";

export interface RenameHooks {
  /** Receives the list as text, returns the edited text. */
  edit(content: string): string;
  confirm(plan: RenamePlan): Promise<boolean>;
  journal?: RenameJournal;
  planOptions?: PlanOptions;
  now?: () => Date;
}

export type RenameOutcome =
  | { readonly status: "empty" }
  | { readonly status: "unchanged" }
  | { readonly status: "dry-run"; readonly plan: RenamePlan }
  | { readonly status: "cancelled"; readonly plan: RenamePlan }
  | {
      readonly status: "renamed";
      readonly plan: RenamePlan;
      readonly report: ExecutionReport;
      readonly logPath: string | undefined;
    };

export async function bulkRename(config: RenameConfig, hooks: RenameHooks): Promise<RenameOutcome> {
  const snapshot = takeSnapshot(config);
  if (snapshot.length === 0) return { status: "empty" };

  const edited = parseEditedList(hooks.edit(renderList(snapshot)));
  const request = createRenameRequest(config, snapshot, edited);
  if (request.mapping.length === 0) return { status: "unchanged" };

  const plan = buildPlan(request, hooks.planOptions);
  if (config.dryRun) return { status: "dry-run", plan };
  if (!(await hooks.confirm(plan))) return { status: "cancelled", plan };

  const report = executePlan(plan, hooks.journal);
  const logPath = config.log
    ? writeRenameLog(config.root, request.mapping, hooks.now?.() ?? new Date())
    : undefined;
  return { status: "renamed", plan, report, logPath };
}
