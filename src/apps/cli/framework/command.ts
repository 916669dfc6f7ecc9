import type { DocsPreviewService } from "../../../core/preview/index.js";

export interface CliContext {
  service: DocsPreviewService;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Base name the program was started under. */
  invokedAs: string;
}

export interface CliCommand {
  path: string[];
  description: string;
  run(args: string[], context: CliContext): Promise<number>;
}
