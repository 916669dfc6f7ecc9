import type { CliCommand, CliContext } from "./command.js";

export const PROGRAM_NAME = "docs-preview";

export class CommandRouter {
  private readonly commands: CliCommand[];
  private readonly context: CliContext;
  private readonly defaultCommand: CliCommand | undefined;

  public constructor(commands: CliCommand[], context: CliContext, defaultPath?: string[]) {
    this.commands = [...commands].sort((left, right) => right.path.length - left.path.length);
    this.context = context;
    this.defaultCommand = defaultPath
      ? commands.find((command) => command.path.join(" ") === defaultPath.join(" "))
      : undefined;
  }

  public async dispatch(argv: string[]): Promise<number> {
    const first = argv[0];
    if (first === "help" || first === "--help" || first === "-h") {
      this.printHelp();
      return 0;
    }

    // Bare invocation, or options with no command, go to the default command.
    if (this.defaultCommand && (first === undefined || first.startsWith("-"))) {
      return this.defaultCommand.run(argv, this.context);
    }

    const match = this.commands.find((command) => isPathMatch(argv, command.path));
    if (!match) {
      this.context.stderr.write(`Unknown command: ${argv.join(" ")}\n\n`);
      this.printHelp();
      return 1;
    }

    return match.run(argv.slice(match.path.length), this.context);
  }

  public printHelp(): void {
    const { stdout } = this.context;
    stdout.write(`${PROGRAM_NAME}\n\n`);
    stdout.write("Usage:\n");
    stdout.write(`  ${PROGRAM_NAME} [command] [options]\n\n`);
    stdout.write("Commands:\n");

    const sorted = [...this.commands].sort((left, right) => left.path.join(" ").localeCompare(right.path.join(" ")));
    for (const command of sorted) {
      const path = command.path.join(" ").padEnd(20, " ");
      const marker = command === this.defaultCommand ? " (default)" : "";
      stdout.write(`  ${path}${command.description}${marker}\n`);
    }
  }
}

function isPathMatch(argv: string[], path: string[]): boolean {
  if (argv.length < path.length) {
    return false;
  }

  return path.every((segment, index) => argv[index] === segment);
}
