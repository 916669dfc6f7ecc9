import path from "node:path";
import { InvalidConfigError } from "../../errors/index.js";
import {
  DEFAULT_SETTINGS,
  docsPreviewSettingsSchema,
  type DocsPreviewConfig,
  type DocsPreviewOverrides
} from "../domain/config.js";

export interface ResolveConfigParams {
  cwd: string;
  env: NodeJS.ProcessEnv;
  overrides?: DocsPreviewOverrides;
}

const TRUE_TOKENS = new Set(["1", "true", "yes", "on"]);
const FALSE_TOKENS = new Set(["0", "false", "no", "off"]);

/**
 * Layers defaults, `DOCS_PREVIEW_*` environment variables and CLI overrides,
 * in that order, and validates the result.
 *
 * @throws InvalidConfigError listing every offending field.
 */
export function resolveConfig(params: ResolveConfigParams): DocsPreviewConfig {
  const { env } = params;
  const overrides = params.overrides ?? {};
  const issues: string[] = [];

  const parsed = docsPreviewSettingsSchema.safeParse({
    sourceDir: overrides.sourceDir ?? readString(env, "DOCS_PREVIEW_SOURCE_DIR") ?? DEFAULT_SETTINGS.sourceDir,
    outputDir: overrides.outputDir ?? readString(env, "DOCS_PREVIEW_OUTPUT_DIR") ?? DEFAULT_SETTINGS.outputDir,
    htmlSubdir: readString(env, "DOCS_PREVIEW_HTML_SUBDIR") ?? DEFAULT_SETTINGS.htmlSubdir,
    entryDocument: overrides.entryDocument ?? readString(env, "DOCS_PREVIEW_ENTRY") ?? DEFAULT_SETTINGS.entryDocument,
    builder: overrides.builder ?? readString(env, "DOCS_PREVIEW_BUILDER") ?? DEFAULT_SETTINGS.builder,
    builderArgs: overrides.builderArgs ?? DEFAULT_SETTINGS.builderArgs,
    openCommand: readString(env, "DOCS_PREVIEW_OPEN_COMMAND"),
    open: overrides.open ?? readBoolean(env, "DOCS_PREVIEW_OPEN", issues) ?? DEFAULT_SETTINGS.open,
    wait: overrides.wait ?? readBoolean(env, "DOCS_PREVIEW_WAIT", issues) ?? DEFAULT_SETTINGS.wait,
    strict: overrides.strict ?? readBoolean(env, "DOCS_PREVIEW_STRICT", issues) ?? DEFAULT_SETTINGS.strict
  });

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join(".")}: ${issue.message}`);
    }
  }
  if (!parsed.success || issues.length > 0) {
    throw new InvalidConfigError(issues);
  }

  const settings = parsed.data;
  const outputDir = path.resolve(params.cwd, settings.outputDir);
  const htmlDir = path.join(outputDir, settings.htmlSubdir);

  return {
    ...settings,
    cwd: params.cwd,
    paths: {
      sourceDir: path.resolve(params.cwd, settings.sourceDir),
      outputDir,
      htmlDir,
      entryDocument: path.join(htmlDir, settings.entryDocument)
    }
  };
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, issues: string[]): boolean | undefined {
  const raw = readString(env, key);
  if (raw === undefined) {
    return undefined;
  }

  const token = raw.toLowerCase();
  if (TRUE_TOKENS.has(token)) {
    return true;
  }
  if (FALSE_TOKENS.has(token)) {
    return false;
  }

  issues.push(`${key}: expected a boolean, got "${raw}"`);
  return undefined;
}
