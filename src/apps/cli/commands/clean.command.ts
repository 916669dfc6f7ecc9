import { OUTPUT_NOT_FOUND } from "../../../core/preview/index.js";
import type { CliCommand } from "../framework/command.js";
import { readOptionValue, resolveCommandConfig } from "./config.shared.js";

const USAGE = "Usage: docs-preview clean [--output <dir>]\n";

export const cleanCommand: CliCommand = {
  path: ["clean"],
  description: "Remove the generated output directory.",
  async run(args, context): Promise<number> {
    let outputDir: string | undefined;
    for (let index = 0; index < args.length; index += 1) {
      const token = args[index];
      if (token === "--help" || token === "-h") {
        context.stdout.write(USAGE);
        return 0;
      }
      if (token === "--output") {
        const value = readOptionValue(args, index, token);
        if (!value.ok) {
          context.stderr.write(`${value.error}\n${USAGE}`);
          return 1;
        }
        outputDir = value.value;
        index += 1;
        continue;
      }

      context.stderr.write(`Unknown option: ${token}\n${USAGE}`);
      return 1;
    }

    const config = resolveCommandConfig(context, { outputDir });
    if (!config) {
      return 1;
    }

    const result = await context.service.clean(config);
    if (result.status === "ok") {
      context.stdout.write(`Removed ${config.outputDir}\n`);
      return 0;
    }
    if (result.detail === OUTPUT_NOT_FOUND) {
      context.stdout.write(`Nothing to remove at ${config.outputDir}\n`);
      return 0;
    }

    context.stderr.write(`Could not remove ${config.outputDir}: ${result.detail ?? "unknown error"}\n`);
    return 1;
  }
};
