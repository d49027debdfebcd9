import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import fg from "fast-glob";

/** Create a temporary directory holding `files` (relative path → content). */
export function makeTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "remv-test-"));
  for (const [path, content] of Object.entries(files)) {
    mkdirSync(dirname(join(root, path)), { recursive: true });
    writeFileSync(join(root, path), content, "utf-8");
  }
  return root;
}

/** Every file under `root`, hidden ones included, as relative path → content. */
export function readTree(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const path of fg.sync("**", { cwd: root, dot: true, onlyFiles: true }).sort()) {
    out[path] = readFileSync(join(root, path), "utf-8");
  }
  return out;
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/** The fixture the traversal tests share: two files, an ignored one and a subdirectory. */
export const SAMPLE_TREE: Record<string, string> = {
  ".ignore": "ignored.txt",
  "file1.txt": "one",
  "file2.txt": "two",
  "ignored.txt": "ignored",
  "subdir/file3.txt": "three",
  "subdir/file4.txt": "four",
};
