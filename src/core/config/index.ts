export {
  DEFAULT_SETTINGS,
  docsPreviewSettingsSchema,
  type DocsPreviewConfig,
  type DocsPreviewOverrides,
  type DocsPreviewPaths,
  type DocsPreviewSettings
} from "./domain/config.js";
export { resolveConfig, type ResolveConfigParams } from "./application/resolve-config.js";
