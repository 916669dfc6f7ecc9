import type { DocsPreviewOverrides } from "../../../core/config/index.js";
import type { CliCommand } from "../framework/command.js";
import { createCliPrompter } from "../framework/prompter.js";
import { readOptionValue, resolveCommandConfig } from "./config.shared.js";

const USAGE =
  "Usage: docs-preview build [--source <dir>] [--output <dir>] [--entry <file>] [--builder <cmd>] [--no-open] [--no-wait] [--strict] [-- <builder-args>]\n";

const VALUE_FLAGS = {
  "--source": "sourceDir",
  "--output": "outputDir",
  "--entry": "entryDocument",
  "--builder": "builder"
} as const;

export const buildCommand: CliCommand = {
  path: ["build"],
  description: "Rebuild the HTML docs, open them and wait for Enter.",
  async run(args, context): Promise<number> {
    const parsed = parseBuildArgs(args);
    if (!parsed.ok) {
      context.stderr.write(`${parsed.error}\n`);
      context.stderr.write(USAGE);
      return 1;
    }

    if (parsed.help) {
      context.stdout.write(USAGE);
      return 0;
    }

    const config = resolveCommandConfig(context, parsed.overrides);
    if (!config) {
      return 1;
    }

    const result = await context.service.run({
      config,
      announceAs: context.invokedAs,
      stdout: context.stdout,
      stderr: context.stderr,
      prompter: createCliPrompter({ stdin: context.stdin, stdout: context.stdout })
    });

    return result.exitCode;
  }
};

type BuildArgsResult =
  | {
      ok: true;
      help: boolean;
      overrides: DocsPreviewOverrides;
    }
  | {
      ok: false;
      error: string;
    };

export function parseBuildArgs(args: string[]): BuildArgsResult {
  const separator = args.indexOf("--");
  const known = separator >= 0 ? args.slice(0, separator) : args;
  const overrides: DocsPreviewOverrides = {};
  if (separator >= 0) {
    overrides.builderArgs = args.slice(separator + 1);
  }

  let help = false;
  for (let index = 0; index < known.length; index += 1) {
    const token = known[index];
    if (token === undefined) {
      continue;
    }

    if (token === "--help" || token === "-h") {
      help = true;
      continue;
    }
    if (token === "--no-open") {
      overrides.open = false;
      continue;
    }
    if (token === "--no-wait") {
      overrides.wait = false;
      continue;
    }
    if (token === "--strict") {
      overrides.strict = true;
      continue;
    }

    if (isValueFlag(token)) {
      const value = readOptionValue(known, index, token);
      if (!value.ok) {
        return value;
      }
      overrides[VALUE_FLAGS[token]] = value.value;
      index += 1;
      continue;
    }

    return { ok: false, error: `Unknown option: ${token}` };
  }

  return { ok: true, help, overrides };
}

function isValueFlag(token: string): token is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, token);
}
