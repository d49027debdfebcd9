import { describe, expect, it } from "vitest";
import { editInEditor, editorArgs } from "../editor.js";
import { EditorError } from "../errors.js";

/** An "editor" that runs `script` with node, getting the file as process.argv[1]. */
function nodeEditor(script: string): string[] {
  return [process.execPath, "-e", script];
}

describe("editorArgs", () => {
  it("adds --wait for VS Code", () => {
    expect(editorArgs(["code"], "/tmp/list.txt")).toEqual(["code", "--wait", "/tmp/list.txt"]);
    expect(editorArgs(["/usr/bin/code", "--wait"], "/tmp/list.txt")).toEqual([
      "/usr/bin/code",
      "--wait",
      "/tmp/list.txt",
    ]);
  });

  it("passes other editors through", () => {
    expect(editorArgs(["vim", "-n"], "/tmp/list.txt")).toEqual(["vim", "-n", "/tmp/list.txt"]);
  });
});

describe("editInEditor", () => {
  it("returns the text the editor saved", () => {
    const editor = nodeEditor("require('fs').writeFileSync(process.argv[1], 'b.txt\\n')");
    expect(editInEditor("a.txt\n", editor)).toBe("b.txt\n");
  });

  it("returns the content unchanged when the editor saves nothing", () => {
    expect(editInEditor("a.txt\n", nodeEditor("process.exit(0)"))).toBe("a.txt\n");
  });

  it("fails when the editor exits with an error", () => {
    expect(() => editInEditor("a.txt\n", nodeEditor("process.exit(3)"))).toThrow(EditorError);
  });

  it("fails when the editor cannot be started", () => {
    expect(() => editInEditor("a.txt\n", ["remv-no-such-editor"])).toThrow(EditorError);
  });
});
