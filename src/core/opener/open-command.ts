export interface OpenCommand {
  command: string;
  args: string[];
}

export interface ResolveOpenCommandOptions {
  platform: NodeJS.Platform;
  override?: string;
}

export function resolveOpenCommand(target: string, options: ResolveOpenCommandOptions): OpenCommand {
  const overrideTokens = options.override?.trim().split(/\s+/).filter(Boolean) ?? [];
  const [overrideCommand, ...overrideArgs] = overrideTokens;
  if (overrideCommand) {
    return { command: overrideCommand, args: [...overrideArgs, target] };
  }

  if (options.platform === "darwin") {
    return { command: "open", args: [target] };
  }

  if (options.platform === "win32") {
    // `start` is a cmd builtin; the empty arg fills its window-title slot.
    return { command: "cmd", args: ["/c", "start", "", target] };
  }

  return { command: "xdg-open", args: [target] };
}
