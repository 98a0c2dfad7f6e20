export interface Reporter {
  info(line: string): void;
  error(line: string): void;
}

export function createStdioReporter(
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): Reporter {
  return {
    info: (line) => {
      stdout.write(`${line}\n`);
    },
    error: (line) => {
      stderr.write(`${line}\n`);
    }
  };
}
