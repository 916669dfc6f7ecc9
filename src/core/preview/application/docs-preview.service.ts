import path from "node:path";
import type { DocsPreviewConfig } from "../../config/index.js";
import { CommandNotFoundError, OutputDirectoryNotFoundError } from "../../errors/index.js";
import { createNoopLogger, type Logger } from "../../logging/index.js";
import { resolveOpenCommand } from "../../opener/open-command.js";
import type { CommandRequest, CommandRunnerPort } from "../../ports/command-runner.port.js";
import type { FileSystemPort } from "../../ports/file-system.port.js";
import type { PreviewPrompter } from "../../ports/prompter.port.js";
import {
  OUTPUT_NOT_FOUND,
  describeFailure,
  resolveExitCode,
  stepFailed,
  stepOk,
  stepSkipped,
  type PreviewRunResult,
  type PreviewStepName,
  type PreviewStepOutcome,
  type PreviewStepResult
} from "../domain/preview-step.js";

interface DocsPreviewServiceDeps {
  fileSystem: FileSystemPort;
  commandRunner: CommandRunnerPort;
  logger?: Logger;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

export interface PreviewRunRequest {
  config: DocsPreviewConfig;
  /** Printed on its own line once the site has been opened. */
  announceAs: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  prompter: PreviewPrompter;
}

interface PlannedStep {
  step: PreviewStepName;
  enabled: boolean;
  execute(): Promise<PreviewStepOutcome>;
}

export class DocsPreviewService {
  private readonly fileSystem: FileSystemPort;
  private readonly commandRunner: CommandRunnerPort;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;

  public constructor(deps: DocsPreviewServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.commandRunner = deps.commandRunner;
    this.logger = (deps.logger ?? createNoopLogger()).child({ scope: "preview" });
    this.platform = deps.platform ?? process.platform;
    this.env = deps.env ?? process.env;
  }

  /**
   * Clean, build, open, announce, wait. Failed steps do not stop the run
   * unless `config.strict` is set, in which case every later step is skipped.
   * A clean that finds no output directory never halts.
   */
  public async run(request: PreviewRunRequest): Promise<PreviewRunResult> {
    const { config } = request;
    const steps: PreviewStepResult[] = [];

    await request.prompter.intro(
      `Building ${config.sourceDir} into ${path.join(config.outputDir, config.htmlSubdir)}`
    );

    const plan: PlannedStep[] = [
      { step: "clean", enabled: true, execute: () => this.removeOutput(config) },
      { step: "build", enabled: true, execute: () => this.build(request) },
      { step: "open", enabled: config.open, execute: () => this.open(request) },
      { step: "announce", enabled: true, execute: () => this.announce(request, steps) },
      { step: "wait", enabled: config.wait, execute: () => this.waitForInput(request) }
    ];

    let halted = false;
    for (const planned of plan) {
      if (halted || !planned.enabled) {
        steps.push({ step: planned.step, ...stepSkipped() });
        continue;
      }

      this.logger.debug("Running step.", { step: planned.step });
      const result: PreviewStepResult = { step: planned.step, ...(await planned.execute()) };
      steps.push(result);
      this.logResult(result);

      if (config.strict && haltsStrictRun(result)) {
        halted = true;
      }
    }

    return {
      steps,
      exitCode: resolveExitCode(steps),
      paths: config.paths
    };
  }

  public async clean(config: DocsPreviewConfig): Promise<PreviewStepResult> {
    const result: PreviewStepResult = { step: "clean", ...(await this.removeOutput(config)) };
    this.logResult(result);
    return result;
  }

  private async removeOutput(config: DocsPreviewConfig): Promise<PreviewStepOutcome> {
    try {
      await this.fileSystem.removeDirectory(config.paths.outputDir);
      return stepOk();
    } catch (error) {
      if (error instanceof OutputDirectoryNotFoundError) {
        return stepFailed(1, OUTPUT_NOT_FOUND);
      }
      return stepFailed(1, toErrorMessage(error));
    }
  }

  private async build(request: PreviewRunRequest): Promise<PreviewStepOutcome> {
    const { config } = request;
    const outcome = await this.runExternal({
      command: config.builder,
      args: [...config.builderArgs, config.paths.sourceDir, config.paths.htmlDir],
      cwd: config.cwd,
      env: this.env,
      stdio: "pipe",
      onStdout: (chunk) => {
        request.stdout.write(chunk);
      },
      onStderr: (chunk) => {
        request.stderr.write(chunk);
      }
    });

    if (!(await this.fileSystem.exists(config.paths.entryDocument))) {
      this.logger.warn("Entry document is missing after build.", {
        entryDocument: config.paths.entryDocument
      });
    }

    return outcome;
  }

  private open(request: PreviewRunRequest): Promise<PreviewStepOutcome> {
    const { config } = request;
    const opener = resolveOpenCommand(config.paths.entryDocument, {
      platform: this.platform,
      override: config.openCommand
    });

    return this.runExternal({
      command: opener.command,
      args: opener.args,
      cwd: config.cwd,
      env: this.env,
      stdio: "inherit"
    });
  }

  private async announce(request: PreviewRunRequest, completed: readonly PreviewStepResult[]): Promise<PreviewStepOutcome> {
    const failures = completed.filter((result) => result.status === "failed");
    if (failures.length > 0) {
      await request.prompter.note(failures.map(describeFailure).join("\n"), "Some steps failed");
    }

    request.stdout.write(`${request.announceAs}\n`);
    return stepOk();
  }

  private async waitForInput(request: PreviewRunRequest): Promise<PreviewStepOutcome> {
    const received = await request.prompter.waitForLine();
    return received ? stepOk() : stepFailed(1, "input closed");
  }

  private async runExternal(command: CommandRequest): Promise<PreviewStepOutcome> {
    try {
      const result = await this.commandRunner.run(command);
      return result.code === 0 ? stepOk() : stepFailed(result.code, `${command.command} exited with code ${result.code}`);
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        return stepFailed(127, error.message);
      }
      return stepFailed(1, toErrorMessage(error));
    }
  }

  private logResult(result: PreviewStepResult): void {
    if (result.status === "failed") {
      this.logger.warn("Step failed.", { step: result.step, code: result.code, detail: result.detail });
      return;
    }
    this.logger.debug("Step finished.", { step: result.step, status: result.status });
  }
}

// A first run has no output directory yet; that must not stop the build.
function haltsStrictRun(result: PreviewStepResult): boolean {
  return result.status === "failed" && !(result.step === "clean" && result.detail === OUTPUT_NOT_FOUND);
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
