export {
  OUTPUT_NOT_FOUND,
  describeFailure,
  resolveExitCode,
  type PreviewRunResult,
  type PreviewStepName,
  type PreviewStepOutcome,
  type PreviewStepResult,
  type PreviewStepStatus
} from "./domain/preview-step.js";
export { DocsPreviewService, type PreviewRunRequest } from "./application/docs-preview.service.js";
