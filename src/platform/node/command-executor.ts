import { spawn } from "node:child_process";
import { CommandNotFoundError } from "../../core/errors/index.js";
import type { CommandRequest, CommandResult, CommandRunnerPort } from "../../core/ports/command-runner.port.js";
import { isNotFound } from "./node-file-system.js";

export function executeCommand(options: CommandRequest): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const inherit = options.stdio === "inherit";
    const child = spawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: inherit ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (text: string) => {
      if (options.onStdout) {
        options.onStdout(text);
      } else {
        stdout += text;
      }
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (text: string) => {
      if (options.onStderr) {
        options.onStderr(text);
      } else {
        stderr += text;
      }
    });

    let settled = false;
    child.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      reject(isNotFound(error) ? new CommandNotFoundError(options.command) : error);
    });
    child.on("close", (code) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        code: code ?? 1,
        stdout,
        stderr
      });
    });
  });
}

export class NodeCommandRunner implements CommandRunnerPort {
  public run(request: CommandRequest): Promise<CommandResult> {
    return executeCommand(request);
  }
}
