#!/usr/bin/env node
/**
 * remv – bulk rename files by editing their paths in a text editor.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { formatCycleBreaks, formatPreview, formatSteps, PREVIEW_MAX_LINES } from "./commands/common.js";
import { bulkRename } from "./commands/rename.js";
import { resolveConfig, resolveEditorCommand } from "./config.js";
import { editInEditor } from "./editor.js";
import { errorMessage, ExecutionError } from "./errors.js";
import { parseArgs, printHelp, printVersion } from "./flags.js";
import type { RenamePlan } from "./planner.js";
import { readUserConfig } from "./user-config.js";

function showPlan(plan: RenamePlan): void {
  p.note(formatPreview(plan.request.mapping, PREVIEW_MAX_LINES), "Preview");
  for (const line of formatCycleBreaks(plan)) {
    p.log.info(line);
  }
}

async function confirmPlan(plan: RenamePlan, yes: boolean): Promise<boolean> {
  showPlan(plan);
  if (yes) return true;
  const confirmResult = await p.confirm({
    message: "Rename these files?",
    initialValue: true,
  });
  if (p.isCancel(confirmResult)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return confirmResult;
}

function reportFailure(err: unknown): void {
  if (err instanceof ExecutionError && err.completed.length > 0) {
    p.note(formatSteps(err.completed), "Already renamed (not rolled back)");
  }
  p.log.error(errorMessage(err));
  p.outro(pc.red("Failed."));
  process.exitCode = 1;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  p.intro(pc.bold(pc.cyan("remv")));

  const s = p.spinner();
  let spinning = false;
  try {
    const user = readUserConfig();
    const config = resolveConfig(args, user);
    const command = resolveEditorCommand(args, user);

    const outcome = await bulkRename(config, {
      edit: (content) => {
        p.log.step(`Waiting for ${command.join(" ")} to close…`);
        return editInEditor(content, command);
      },
      confirm: async (plan) => {
        const accepted = await confirmPlan(plan, args.yes);
        if (accepted) {
          s.start("Renaming…");
          spinning = true;
        }
        return accepted;
      },
    });

    switch (outcome.status) {
      case "empty":
        p.outro(pc.yellow("No files in that folder."));
        break;
      case "unchanged":
        p.outro(pc.yellow("No files to rename."));
        break;
      case "dry-run":
        showPlan(outcome.plan);
        p.note("Dry run: no files were renamed.", "Done");
        p.outro(pc.green("Done."));
        break;
      case "cancelled":
        p.cancel("Rename cancelled.");
        break;
      case "renamed":
        s.stop(`Renamed ${outcome.plan.request.mapping.length} files.`);
        spinning = false;
        if (outcome.logPath !== undefined) {
          p.log.info(`Log written to ${outcome.logPath}`);
        }
        p.outro(pc.green("Files renamed successfully."));
        break;
    }
  } catch (err: unknown) {
    if (spinning) s.stop("Failed.");
    reportFailure(err);
  }
}

main().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
