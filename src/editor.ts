/**
 * Editor round trip: write the list to a temporary file, wait for the editor, read it back.
 */

import { spawnSync } from "node:child_process";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { EditorError } from "./errors.js";

const VS_CODE_COMMANDS = new Set(["code", "code.cmd"]);

/** argv for the editor; VS Code needs --wait to block until the tab is closed. */
export function editorArgs(command: readonly string[], file: string): string[] {
  const [program, ...args] = command;
  if (VS_CODE_COMMANDS.has(basename(program)) && !args.includes("--wait")) {
    args.push("--wait");
  }
  return [program, ...args, file];
}

/**
 * Let the user edit `content` in `command` (program plus arguments). Returns the saved text.
 * The temporary file is deleted whatever happens.
 */
export function editInEditor(content: string, command: readonly string[]): string {
  if (command.length === 0) throw new EditorError("No editor configured.");

  const dir = mkdtempSync(join(tmpdir(), "remv-"));
  const file = join(dir, "rename.txt");
  try {
    writeFileSync(file, content, "utf-8");
    const [program, ...args] = editorArgs(command, file);
    const result = spawnSync(program, args, {
      stdio: "inherit",
      shell: process.platform === "win32",
    });
    if (result.error !== undefined) {
      throw new EditorError(`Could not start editor "${program}": ${result.error.message}`, {
        cause: result.error,
      });
    }
    if (result.status !== 0) {
      throw new EditorError(`Editor "${program}" exited with ${result.status ?? result.signal ?? "an error"}.`);
    }
    return readFileSync(file, "utf-8");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
