import { readFile } from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "./node-file-system.js";

export interface LoadDotEnvParams {
  cwd?: string;
  filename?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Merges `<cwd>/.env` into `env`. Variables that are already set win.
 * Returns the keys that were applied from the file.
 */
export async function loadDotEnv(params: LoadDotEnvParams = {}): Promise<string[]> {
  const envPath = path.join(params.cwd ?? process.cwd(), params.filename ?? ".env");
  const env = params.env ?? process.env;

  let content: string;
  try {
    content = await readFile(envPath, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}

export function parseDotEnv(content: string): Record<string, string> {
  const entries: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const assignment = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed;
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      continue;
    }

    const key = assignment.slice(0, separator).trim();
    if (key) {
      entries[key] = unquote(assignment.slice(separator + 1).trim());
    }
  }

  return entries;
}

function unquote(raw: string): string {
  if (raw.length < 2) {
    return raw;
  }

  const quote = raw[0];
  if ((quote !== '"' && quote !== "'") || !raw.endsWith(quote)) {
    return raw;
  }

  const inner = raw.slice(1, -1);
  if (quote === "'") {
    return inner;
  }

  return inner
    .replace(/\\n/g, "\n")
    .replace(/\\t/g, "\t")
    .replace(/\\"/g, '"')
    .replace(/\\\\/g, "\\");
}
