import { PassThrough } from "node:stream";
import type { CliContext } from "../../src/apps/cli/framework/command.js";
import { CommandNotFoundError, OutputDirectoryNotFoundError } from "../../src/core/errors/index.js";
import type { CommandRequest, CommandResult, CommandRunnerPort } from "../../src/core/ports/command-runner.port.js";
import type { FileSystemPort } from "../../src/core/ports/file-system.port.js";
import type { PreviewPrompter } from "../../src/core/ports/prompter.port.js";
import { DocsPreviewService } from "../../src/core/preview/index.js";
import { createStreamCapture, type StreamCapture } from "./stream-capture.js";

export class FakeFileSystem implements FileSystemPort {
  public readonly directories = new Set<string>();
  public readonly files = new Set<string>();
  public removeError: Error | undefined;

  public constructor(private readonly timeline: string[] = []) {}

  public async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.directories.has(path);
  }

  public async removeDirectory(path: string): Promise<void> {
    this.timeline.push(`remove ${path}`);
    if (this.removeError) {
      throw this.removeError;
    }
    if (!this.directories.delete(path)) {
      throw new OutputDirectoryNotFoundError(path);
    }
    for (const file of [...this.files]) {
      if (file.startsWith(`${path}/`)) {
        this.files.delete(file);
      }
    }
  }
}

export type FakeCommandHandler = (request: CommandRequest) => CommandResult | Promise<CommandResult>;

/** Unknown commands behave like a missing executable. */
export class FakeCommandRunner implements CommandRunnerPort {
  public readonly calls: CommandRequest[] = [];

  public constructor(
    private readonly handlers: Record<string, FakeCommandHandler> = {},
    private readonly timeline: string[] = []
  ) {}

  public async run(request: CommandRequest): Promise<CommandResult> {
    this.calls.push(request);
    this.timeline.push(`run ${request.command}`);
    const handler = this.handlers[request.command];
    if (!handler) {
      throw new CommandNotFoundError(request.command);
    }
    return handler(request);
  }
}

export function succeed(stdout = ""): CommandResult {
  return { code: 0, stdout, stderr: "" };
}

export class FakePrompter implements PreviewPrompter {
  public readonly intros: string[] = [];
  public readonly notes: Array<{ message: string; title?: string }> = [];
  public waits = 0;

  public constructor(
    private readonly lineAvailable = true,
    private readonly timeline: string[] = []
  ) {}

  public async intro(message: string): Promise<void> {
    this.timeline.push("intro");
    this.intros.push(message);
  }

  public async note(message: string, title?: string): Promise<void> {
    this.timeline.push("note");
    this.notes.push({ message, title });
  }

  public async waitForLine(): Promise<boolean> {
    this.timeline.push("wait");
    this.waits += 1;
    return this.lineAvailable;
  }
}

export interface TestCliContext {
  context: CliContext;
  stdout: StreamCapture;
  stderr: StreamCapture;
}

export function createCliContext(params: {
  service: DocsPreviewService;
  stdinInput?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  invokedAs?: string;
}): TestCliContext {
  const stdout = createStreamCapture();
  const stderr = createStreamCapture();
  const stdin = new PassThrough();
  stdin.end(params.stdinInput ?? "\n");

  return {
    context: {
      service: params.service,
      stdin,
      stdout: stdout.stream,
      stderr: stderr.stream,
      cwd: params.cwd ?? "/work/docs",
      env: params.env ?? {},
      invokedAs: params.invokedAs ?? "docs-preview"
    },
    stdout,
    stderr
  };
}

export function createFakeService(params: {
  fileSystem?: FakeFileSystem;
  commandRunner?: FakeCommandRunner;
} = {}): DocsPreviewService {
  return new DocsPreviewService({
    fileSystem: params.fileSystem ?? new FakeFileSystem(),
    commandRunner: params.commandRunner ?? new FakeCommandRunner(),
    platform: "linux",
    env: {}
  });
}
