export type CommandStdio = "pipe" | "inherit";

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio?: CommandStdio;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

export interface CommandResult {
  code: number;
  /** Collected output; empty when the stream was forwarded to `onStdout`. */
  stdout: string;
  /** Collected output; empty when the stream was forwarded to `onStderr`. */
  stderr: string;
}

export interface CommandRunnerPort {
  run(request: CommandRequest): Promise<CommandResult>;
}
