import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CommandNotFoundError, OutputDirectoryNotFoundError } from "../../src/core/errors/index.js";
import { executeCommand } from "../../src/platform/node/command-executor.js";
import { NodeFileSystem } from "../../src/platform/node/node-file-system.js";
import { createTempDir, removeTempDir } from "../helpers/temp-dir.js";

const roots: string[] = [];

afterEach(async () => {
  while (roots.length > 0) {
    const root = roots.pop();
    if (root) {
      await removeTempDir(root);
    }
  }
});

describe("NodeFileSystem", () => {
  it("removes a directory tree", async () => {
    const root = await createTempDir();
    roots.push(root);
    const output = path.join(root, "_build");
    await mkdir(path.join(output, "html", "_static"), { recursive: true });
    await writeFile(path.join(output, "html", "index.html"), "<html></html>", "utf8");
    const fileSystem = new NodeFileSystem();

    await fileSystem.removeDirectory(output);

    expect(await fileSystem.exists(output)).toBe(false);
    expect(await fileSystem.exists(root)).toBe(true);
  });

  it("raises OutputDirectoryNotFoundError for a missing directory", async () => {
    const root = await createTempDir();
    roots.push(root);
    const missing = path.join(root, "_build");

    await expect(new NodeFileSystem().removeDirectory(missing)).rejects.toBeInstanceOf(OutputDirectoryNotFoundError);
  });
});

// Writes U+201C as two separate chunks that split its UTF-8 encoding.
const SPLIT_QUOTE_SCRIPT = [
  "process.stdout.write(Buffer.from([0xe2, 0x80]));",
  "setTimeout(() => process.stdout.write(Buffer.from([0x9c, 0x0a])), 50);"
].join(" ");

describe("executeCommand", () => {
  it("decodes a multibyte character split across chunks before forwarding", async () => {
    const chunks: string[] = [];

    const result = await executeCommand({
      command: process.execPath,
      args: ["-e", SPLIT_QUOTE_SCRIPT],
      onStdout: (chunk) => chunks.push(chunk)
    });

    expect(result.code).toBe(0);
    expect(chunks.join("")).toBe("\u201c\n");
    expect(chunks.every((chunk) => !chunk.includes("\ufffd"))).toBe(true);
    expect(result.stdout).toBe("");
  });

  it("collects output into the result when nothing forwards it", async () => {
    const result = await executeCommand({
      command: process.execPath,
      args: ["-e", SPLIT_QUOTE_SCRIPT]
    });

    expect(result).toEqual({ code: 0, stdout: "\u201c\n", stderr: "" });
  });

  it("raises CommandNotFoundError when the executable does not exist", async () => {
    await expect(
      executeCommand({ command: "docs-preview-missing-builder", args: [] })
    ).rejects.toBeInstanceOf(CommandNotFoundError);
  });
});
