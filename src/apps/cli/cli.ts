import path from "node:path";
import { DocsPreviewService } from "../../core/preview/index.js";
import { NodeCommandRunner } from "../../platform/node/command-executor.js";
import { NodeFileSystem } from "../../platform/node/node-file-system.js";
import { createNodeLogger } from "../../platform/node/node-logger.js";
import { buildCommand } from "./commands/build.command.js";
import { cleanCommand } from "./commands/clean.command.js";
import { CommandRouter, PROGRAM_NAME } from "./framework/router.js";

export async function runCli(argv: string[]): Promise<number> {
  const service = new DocsPreviewService({
    fileSystem: new NodeFileSystem(),
    commandRunner: new NodeCommandRunner(),
    logger: createNodeLogger()
  });

  const router = new CommandRouter(
    [buildCommand, cleanCommand],
    {
      service,
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr,
      cwd: process.cwd(),
      env: process.env,
      invokedAs: resolveInvokedName(process.argv[1])
    },
    buildCommand.path
  );

  return router.dispatch(argv);
}

export function resolveInvokedName(scriptPath: string | undefined): string {
  const name = scriptPath ? path.basename(scriptPath) : "";
  return name || PROGRAM_NAME;
}
