import { targetInfoSchema } from '../contracts/target-info.contract.js';
import { BuildHelperError } from '../core/error-codes.js';
import { parseTargetPlatform } from '../platform/target-platform.js';
import type { ProcessRunner } from '../process/runner.js';
import { captureFailure, type StepResult } from '../orchestration/step.js';
import type { InvocationConfig } from '../types/invocation.js';
import type { TargetInfo, TargetPlatform } from '../types/target-info.js';

export function targetInfoCommand(config: InvocationConfig): string[] {
  return [config.toolExecutable, '-print-target-info'];
}

export function parseTargetInfo(output: string): TargetInfo {
  let json: unknown;
  try {
    json = JSON.parse(output.trim());
  } catch (error) {
    throw new BuildHelperError('E_TARGET_INFO', 'Toolchain target info is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = targetInfoSchema.safeParse(json);
  if (!parsed.success) {
    throw new BuildHelperError('E_TARGET_INFO', 'Toolchain target info is missing the target triple', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  return parsed.data;
}

/** Apple triples are used without the OS version; everything else keeps the full triple. */
export function selectBuildTriple(info: TargetInfo): string {
  if (info.target.unversionedTriple.includes('-apple-macosx')) {
    return info.target.unversionedTriple;
  }
  return info.target.triple;
}

export async function queryTargetPlatform(
  runner: ProcessRunner,
  config: InvocationConfig,
  env: NodeJS.ProcessEnv
): Promise<StepResult<TargetPlatform>> {
  const command = targetInfoCommand(config);
  const [executable, ...args] = command;
  const result = await runner.capture(executable, args, { env });
  if (result.exitCode !== 0) {
    return { ok: false, failure: captureFailure(command, result.exitCode, result.stderr) };
  }
  return { ok: true, value: parseTargetPlatform(selectBuildTriple(parseTargetInfo(result.stdout))) };
}
