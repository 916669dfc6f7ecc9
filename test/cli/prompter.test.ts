import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { createCliPrompter } from "../../src/apps/cli/framework/prompter.js";
import { createStreamCapture } from "../helpers/stream-capture.js";

function createPromptIo(rawInput: string) {
  const stdin = new PassThrough();
  const capture = createStreamCapture();
  stdin.end(rawInput);

  return { stdin, stdout: capture.stream, output: capture.output };
}

describe("cli prompter", () => {
  it("writes intro and note as plain lines without a TTY", async () => {
    const { stdin, stdout, output } = createPromptIo("");
    const prompter = createCliPrompter({ stdin, stdout });

    await prompter.intro("Building . into _build/html");
    await prompter.note("build: exit 2", "Some steps failed");

    expect(output()).toBe("Building . into _build/html\nSome steps failed\nbuild: exit 2\n");
  });

  it("resolves true once a line is read", async () => {
    const { stdin, stdout } = createPromptIo("\n");
    const prompter = createCliPrompter({ stdin, stdout });

    await expect(prompter.waitForLine()).resolves.toBe(true);
  });

  it("resolves false when the last line has no newline", async () => {
    const { stdin, stdout } = createPromptIo("done");
    const prompter = createCliPrompter({ stdin, stdout });

    await expect(prompter.waitForLine()).resolves.toBe(false);
  });

  it("resolves false when input closes without a line", async () => {
    const { stdin, stdout } = createPromptIo("");
    const prompter = createCliPrompter({ stdin, stdout });

    await expect(prompter.waitForLine()).resolves.toBe(false);
  });
});
