/**
 * Global user config (~/.remv/config.json).
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError, errorMessage } from "./errors.js";

export interface UserConfig {
  /** Editor command line, e.g. "vim" or "code --wait". */
  editor?: string;
  /** Write a rename log after a successful run. Defaults to true. */
  log?: boolean;
}

const REMV_DIR = join(homedir(), ".remv");
export const USER_CONFIG_PATH = join(REMV_DIR, "config.json");

function isRecord(obj: unknown): obj is Record<string, unknown> {
  return obj !== null && typeof obj === "object" && !Array.isArray(obj);
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

/**
 * Load the user config. A missing file yields `{}`; fields of the wrong type are dropped.
 */
export function readUserConfig(path: string = USER_CONFIG_PATH): UserConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) return {};
    throw new ConfigError(`Could not read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Invalid JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Expected an object in ${path}`);
  }

  const out: UserConfig = {};
  if (typeof data.editor === "string" && data.editor.trim().length > 0) out.editor = data.editor.trim();
  if (typeof data.log === "boolean") out.log = data.log;
  return out;
}
