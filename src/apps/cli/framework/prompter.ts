import { createInterface } from "node:readline";
import { intro as clackIntro, note as clackNote } from "@clack/prompts";
import type { PreviewPrompter } from "../../../core/ports/prompter.port.js";

interface CliPrompterParams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

export function createCliPrompter(params: CliPrompterParams): PreviewPrompter {
  if (isTty(params.stdin) && isTty(params.stdout)) {
    return createClackPrompter(params);
  }

  return createPlainPrompter(params);
}

function createClackPrompter(params: CliPrompterParams): PreviewPrompter {
  return {
    async intro(message) {
      clackIntro(message);
    },
    async note(message, title) {
      clackNote(message, title);
    },
    waitForLine: () => readLine(params.stdin)
  };
}

function createPlainPrompter(params: CliPrompterParams): PreviewPrompter {
  return {
    async intro(message) {
      params.stdout.write(`${message}\n`);
    },
    async note(message, title) {
      if (title) {
        params.stdout.write(`${title}\n`);
      }
      params.stdout.write(`${message}\n`);
    },
    waitForLine: () => readLine(params.stdin)
  };
}

// A trailing line without a newline counts as closed input, like `read`.
async function readLine(input: NodeJS.ReadableStream): Promise<boolean> {
  let ended = false;
  const markEnded = () => {
    ended = true;
  };
  // Registered before readline's own end handler, which flushes a partial line.
  input.once("end", markEnded);
  const rl = createInterface({ input, terminal: false });

  try {
    return await new Promise<boolean>((resolve) => {
      rl.once("line", () => resolve(!ended));
      rl.once("close", () => resolve(false));
    });
  } finally {
    input.removeListener("end", markEnded);
    rl.close();
  }
}

function isTty(stream: NodeJS.ReadableStream | NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}
