export function escapeCommandArg(arg: string): string {
  if (arg.includes('"') || arg.includes(' ')) {
    return `"${arg.replaceAll('"', '\\"')}"`;
  }
  return arg;
}

export function formatCommandLine(command: readonly string[]): string {
  return command.map((arg) => escapeCommandArg(arg)).join(' ');
}
