export class DocsPreviewError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidConfigError extends DocsPreviewError {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class CommandNotFoundError extends DocsPreviewError {
  public readonly command: string;

  public constructor(command: string) {
    super(`Command "${command}" was not found or not executable.`);
    this.command = command;
  }
}

export class OutputDirectoryNotFoundError extends DocsPreviewError {
  public readonly path: string;

  public constructor(path: string) {
    super(`Output directory ${path} does not exist.`);
    this.path = path;
  }
}
