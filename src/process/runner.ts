/**
 * Child process execution for toolchain invocations.
 */

import { execa } from 'execa';

export interface ProcessOptions {
  /** Complete environment for the child; the parent environment is not merged in again. */
  readonly env: NodeJS.ProcessEnv;
}

export interface RunResult {
  /** Exit status, or -1 when the process could not be started or was killed by a signal. */
  exitCode: number;
}

export interface CaptureResult extends RunResult {
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  /** Runs a command with inherited stdio and waits for it to exit. */
  run(command: string, args: readonly string[], options: ProcessOptions): Promise<RunResult>;
  /** Runs a command and collects its output. */
  capture(command: string, args: readonly string[], options: ProcessOptions): Promise<CaptureResult>;
}

export class ExecaProcessRunner implements ProcessRunner {
  async run(command: string, args: readonly string[], options: ProcessOptions): Promise<RunResult> {
    const result = await execa(command, args, {
      env: options.env,
      extendEnv: false,
      stdin: 'inherit',
      stdout: 'inherit',
      stderr: 'inherit',
      reject: false
    });
    return { exitCode: result.exitCode ?? -1 };
  }

  async capture(command: string, args: readonly string[], options: ProcessOptions): Promise<CaptureResult> {
    const result = await execa(command, args, {
      env: options.env,
      extendEnv: false,
      stdout: 'pipe',
      stderr: 'pipe',
      reject: false
    });
    return {
      exitCode: result.exitCode ?? -1,
      stdout: result.stdout,
      stderr: result.stderr
    };
  }
}
