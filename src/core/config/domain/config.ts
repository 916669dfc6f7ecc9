import path from "node:path";
import { z } from "zod";

const requiredText = z.string().trim().min(1, "must not be empty");
const relativePath = requiredText.refine((value) => !path.isAbsolute(value), "must be a relative path");

export const docsPreviewSettingsSchema = z.object({
  sourceDir: requiredText,
  outputDir: requiredText,
  htmlSubdir: relativePath,
  entryDocument: relativePath,
  builder: requiredText,
  builderArgs: z.array(z.string()),
  openCommand: requiredText.optional(),
  open: z.boolean(),
  wait: z.boolean(),
  strict: z.boolean()
});

export type DocsPreviewSettings = z.infer<typeof docsPreviewSettingsSchema>;

export type DocsPreviewOverrides = Partial<Omit<DocsPreviewSettings, "htmlSubdir" | "openCommand">>;

export const DEFAULT_SETTINGS = {
  sourceDir: ".",
  outputDir: "_build",
  htmlSubdir: "html",
  entryDocument: "index.html",
  builder: "sphinx-build",
  builderArgs: [],
  open: true,
  wait: true,
  strict: false
} satisfies DocsPreviewSettings;

/** Absolute locations derived from the settings and the working directory. */
export interface DocsPreviewPaths {
  sourceDir: string;
  outputDir: string;
  htmlDir: string;
  entryDocument: string;
}

export interface DocsPreviewConfig extends DocsPreviewSettings {
  cwd: string;
  paths: DocsPreviewPaths;
}
