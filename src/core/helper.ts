import { parseArguments, usageText } from '../cli/parser.js';
import type { OrchestratorDeps } from '../orchestration/context.js';
import type { Reporter } from '../orchestration/reporter.js';
import { runBuildActions } from '../orchestration/sequencer.js';
import type { RunOutcome } from '../orchestration/step.js';
import type { ProcessRunner } from '../process/runner.js';
import { exitCodeByError, formatErrorReport, normalizeError } from './error-codes.js';
import { loadHelperConfig } from './helper-config.js';
import { resolveInvocationConfig } from './resolve-config.js';

export interface HelperEnvironment {
  helperRoot: string;
  cwd: string;
  runner: ProcessRunner;
  reporter: Reporter;
  baseEnv: Readonly<NodeJS.ProcessEnv>;
  hostPlatform: NodeJS.Platform;
}

export interface HelperResult {
  exitCode: number;
  outcome?: RunOutcome;
}

export async function runHelper(argv: readonly string[], environment: HelperEnvironment): Promise<HelperResult> {
  const { reporter } = environment;
  try {
    const parsed = parseArguments(argv);
    if (parsed.kind === 'help') {
      reporter.info(usageText);
      return { exitCode: 0 };
    }

    const config = resolveInvocationConfig(parsed.options, {
      helperRoot: environment.helperRoot,
      cwd: environment.cwd
    });
    const deps: OrchestratorDeps = {
      runner: environment.runner,
      reporter,
      helperConfig: await loadHelperConfig(environment.helperRoot),
      baseEnv: environment.baseEnv,
      hostPlatform: environment.hostPlatform
    };

    const outcome = await runBuildActions(config, deps);
    return { exitCode: outcome.ok ? 0 : exitCodeByError.E_COMMAND_FAILED, outcome };
  } catch (error) {
    const normalized = normalizeError(error);
    for (const line of formatErrorReport(normalized)) {
      reporter.error(line);
    }
    if (normalized.code === 'E_USAGE') {
      reporter.error('run with --help for usage');
    }
    return { exitCode: exitCodeByError[normalized.code] };
  }
}
