import { formatErrorReport, type BuildHelperError } from '../core/error-codes.js';
import type { BuildAction } from '../types/invocation.js';
import { formatCommandLine } from '../process/command-line.js';

export type BuildStage = 'update' | BuildAction;

export interface CommandFailure {
  command: readonly string[];
  exitCode: number;
  /** Captured stderr of a command whose output was collected. */
  output?: string;
}

export type StepResult<T = void> = { ok: true; value: T } | { ok: false; failure: CommandFailure };

interface StageFailureBase {
  stage: BuildStage;
  message: string;
}

export type StageFailure =
  | (StageFailureBase & { kind: 'command' } & CommandFailure)
  | (StageFailureBase & { kind: 'error'; error: BuildHelperError });

export type RunOutcome =
  | { ok: true; completed: BuildStage[] }
  | { ok: false; completed: BuildStage[]; failure: StageFailure };

export function captureFailure(command: readonly string[], exitCode: number, stderr: string): CommandFailure {
  const output = stderr.trim();
  return output ? { command, exitCode, output } : { command, exitCode };
}

export const stepDone: StepResult = { ok: true, value: undefined };

export function formatStageFailure(failure: StageFailure): string[] {
  const lines = [`FAIL: ${failure.message}`];
  if (failure.kind === 'error') {
    return [...lines, ...formatErrorReport(failure.error)];
  }

  lines.push(`Executing: ${formatCommandLine(failure.command)}`);
  if (failure.output) {
    lines.push(...failure.output.split('\n').map((line) => `  ${line}`));
  }
  return lines;
}
