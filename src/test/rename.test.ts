import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { bulkRename } from "../commands/rename.js";
import type { RenameConfig } from "../config.js";
import { createConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { makeTree, readTree, removeTree, SAMPLE_TREE } from "./helpers.js";

let root: string | undefined;

afterEach(() => {
  if (root !== undefined) removeTree(root);
  root = undefined;
});

function setup(overrides: Partial<Omit<RenameConfig, "root">> = {}): { dir: string; config: RenameConfig } {
  const dir = makeTree(SAMPLE_TREE);
  root = dir;
  return { dir, config: createConfig(dir, { log: false, ...overrides }) };
}

const accept = async (): Promise<boolean> => true;

describe("bulkRename", () => {
  it("renames a file in the root", async () => {
    const { dir, config } = setup();
    const outcome = await bulkRename(config, {
      edit: (content) => content.replace("file1.txt", "renamed_file1.txt"),
      confirm: accept,
    });

    expect(outcome.status).toBe("renamed");
    expect(readTree(dir)).toEqual({
      ".ignore": "ignored.txt",
      "file2.txt": "two",
      "ignored.txt": "ignored",
      "renamed_file1.txt": "one",
      "subdir/file3.txt": "three",
      "subdir/file4.txt": "four",
    });
  });

  it("renames files in subdirectories when recursive", async () => {
    const { dir, config } = setup({ recursive: true });
    const edit = vi.fn((content: string) =>
      content.replace("file1.txt", "renamed_file1.txt").replace("subdir/file3.txt", "subdir/renamed_file3.txt"),
    );
    const outcome = await bulkRename(config, { edit, confirm: accept });

    expect(edit).toHaveBeenCalledWith("file1.txt\nfile2.txt\nsubdir/file3.txt\nsubdir/file4.txt\n");
    expect(outcome.status).toBe("renamed");
    expect(readTree(dir)).toMatchObject({
      "renamed_file1.txt": "one",
      "subdir/renamed_file3.txt": "three",
      "subdir/file4.txt": "four",
    });
  });

  it("swaps two files", async () => {
    const { dir, config } = setup();
    await bulkRename(config, { edit: () => "file2.txt\nfile1.txt\n", confirm: accept });

    expect(readTree(dir)).toMatchObject({ "file1.txt": "two", "file2.txt": "one" });
    expect(Object.keys(readTree(dir)).filter((path) => path.endsWith(".tmp"))).toEqual([]);
  });

  it("does not ask for confirmation when nothing changed", async () => {
    const { dir, config } = setup();
    const confirm = vi.fn(accept);
    const outcome = await bulkRename(config, { edit: (content) => content, confirm });

    expect(outcome).toEqual({ status: "unchanged" });
    expect(confirm).not.toHaveBeenCalled();
    expect(readTree(dir)).toEqual(SAMPLE_TREE);
  });

  it("leaves files alone when the user declines", async () => {
    const { dir, config } = setup();
    const outcome = await bulkRename(config, {
      edit: () => "a.txt\nb.txt\n",
      confirm: async () => false,
    });

    expect(outcome.status).toBe("cancelled");
    expect(readTree(dir)).toEqual(SAMPLE_TREE);
  });

  it("builds the plan without renaming in a dry run", async () => {
    const { dir, config } = setup({ dryRun: true });
    const confirm = vi.fn(accept);
    const outcome = await bulkRename(config, { edit: () => "file2.txt\nfile1.txt\n", confirm });

    expect(outcome.status).toBe("dry-run");
    if (outcome.status === "dry-run") {
      expect(outcome.plan.steps).toHaveLength(3);
    }
    expect(confirm).not.toHaveBeenCalled();
    expect(readTree(dir)).toEqual(SAMPLE_TREE);
  });

  it("rejects an edit that removes a line", async () => {
    const { dir, config } = setup();
    await expect(bulkRename(config, { edit: () => "file1.txt\n", confirm: accept })).rejects.toThrow(
      ValidationError,
    );
    expect(readTree(dir)).toEqual(SAMPLE_TREE);
  });

  it("reports an empty folder without opening the editor", async () => {
    const dir = makeTree({});
    root = dir;
    const edit = vi.fn((content: string) => content);
    const outcome = await bulkRename(createConfig(dir), { edit, confirm: accept });

    expect(outcome).toEqual({ status: "empty" });
    expect(edit).not.toHaveBeenCalled();
  });

  it("writes the requested renames to a log file", async () => {
    const { dir, config } = setup({ log: true });
    const outcome = await bulkRename(config, {
      edit: () => "file2.txt\nfile1.txt\n",
      confirm: accept,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    });

    const logPath = join(dir, "remv_20240102_030405.log");
    expect(outcome.status === "renamed" ? outcome.logPath : undefined).toBe(logPath);
    expect(readFileSync(logPath, "utf-8")).toBe("file1.txt\tfile2.txt\nfile2.txt\tfile1.txt");
  });
});
