/**
 * The remv_<timestamp>.log file written into the root after a successful run.
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type { RenameEntry } from "./validator.js";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** One line per requested rename: old path padded to the longest one, a tab, the new path. */
export function formatRenameLog(mapping: readonly RenameEntry[]): string {
  const width = Math.max(0, ...mapping.map((entry) => entry.oldName.length));
  return mapping.map(({ oldName, newName }) => `${oldName.padEnd(width)}\t${newName}`).join("\n");
}

/**
 * Write the log of requested renames (temporary steps are left out). Returns the log file path.
 */
export function writeRenameLog(root: string, mapping: readonly RenameEntry[], now: Date = new Date()): string {
  const path = join(root, `remv_${formatTimestamp(now)}.log`);
  writeFileSync(path, formatRenameLog(mapping), "utf-8");
  return path;
}
