import { resolveConfig, type DocsPreviewConfig, type DocsPreviewOverrides } from "../../../core/config/index.js";
import { InvalidConfigError } from "../../../core/errors/index.js";
import type { CliContext } from "../framework/command.js";

/** Resolves config for a command, reporting validation errors on stderr. */
export function resolveCommandConfig(
  context: CliContext,
  overrides: DocsPreviewOverrides
): DocsPreviewConfig | undefined {
  try {
    return resolveConfig({ cwd: context.cwd, env: context.env, overrides });
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      context.stderr.write(`${error.message}\n`);
      return undefined;
    }
    throw error;
  }
}

export type OptionValueResult = { ok: true; value: string } | { ok: false; error: string };

export function readOptionValue(args: string[], index: number, flag: string): OptionValueResult {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    return { ok: false, error: `Missing value for ${flag}.` };
  }
  return { ok: true, value };
}
