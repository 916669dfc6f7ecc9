import type { DocsPreviewPaths } from "../../config/index.js";

/** Detail of a clean step that found no output directory to remove. */
export const OUTPUT_NOT_FOUND = "not found";

export const PREVIEW_STEPS = ["clean", "build", "open", "announce", "wait"] as const;

export type PreviewStepName = (typeof PREVIEW_STEPS)[number];

export type PreviewStepStatus = "ok" | "failed" | "skipped";

export interface PreviewStepOutcome {
  status: PreviewStepStatus;
  /** Exit status of the step. Skipped steps carry 0. */
  code: number;
  detail?: string;
}

export interface PreviewStepResult extends PreviewStepOutcome {
  step: PreviewStepName;
}

export interface PreviewRunResult {
  steps: PreviewStepResult[];
  exitCode: number;
  paths: DocsPreviewPaths;
}

export function stepOk(): PreviewStepOutcome {
  return { status: "ok", code: 0 };
}

export function stepFailed(code: number, detail: string): PreviewStepOutcome {
  return { status: "failed", code, detail };
}

export function stepSkipped(): PreviewStepOutcome {
  return { status: "skipped", code: 0 };
}

/** Exit status of a run: the code of the last step that actually ran. */
export function resolveExitCode(steps: readonly PreviewStepResult[]): number {
  for (let index = steps.length - 1; index >= 0; index -= 1) {
    const step = steps[index];
    if (step && step.status !== "skipped") {
      return step.code;
    }
  }
  return 0;
}

export function describeFailure(result: PreviewStepResult): string {
  const detail = result.detail ? ` (${result.detail})` : "";
  return `${result.step}: exit ${result.code}${detail}`;
}
