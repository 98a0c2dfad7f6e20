import { normalizeError } from '../core/error-codes.js';
import { buildGenerateProjectCommand, buildUpdateCommand } from '../toolchain/commands.js';
import type { InvocationConfig } from '../types/invocation.js';
import { createStepContext, executeCommand, runProduct, type OrchestratorDeps, type StepContext } from './context.js';
import { installArtifacts } from './install.js';
import {
  formatStageFailure,
  type BuildStage,
  type RunOutcome,
  type StageFailure,
  type StepResult
} from './step.js';

interface Stage {
  name: BuildStage;
  banner: string;
  failureMessage: string;
  selected: boolean;
  run: (ctx: StepContext) => Promise<StepResult>;
}

function planStages(config: InvocationConfig, ctx: StepContext): Stage[] {
  const { packageName, requestedActions } = config;
  const { product, testProduct } = ctx.helperConfig;

  return [
    {
      name: 'update',
      banner: `Updating dependencies of ${packageName}`,
      failureMessage: `Updating dependencies of ${packageName} failed`,
      selected: config.update,
      run: (stepCtx) => executeCommand(stepCtx, buildUpdateCommand(config))
    },
    {
      name: 'build',
      banner: `Building ${packageName}`,
      failureMessage: `Building ${packageName} failed`,
      selected: requestedActions.includes('build'),
      run: (stepCtx) => runProduct(stepCtx, 'build', product, 'build')
    },
    {
      name: 'generate-xcodeproj',
      banner: `Generating Xcode project for ${packageName}`,
      failureMessage: 'Generating the Xcode project failed',
      selected: requestedActions.includes('generate-xcodeproj'),
      run: (stepCtx) => executeCommand(stepCtx, buildGenerateProjectCommand(config))
    },
    {
      name: 'test',
      banner: `Testing ${packageName}`,
      failureMessage: `Testing ${packageName} failed`,
      selected: requestedActions.includes('test'),
      run: (stepCtx) => runProduct(stepCtx, 'test', testProduct, 'test')
    },
    {
      name: 'install',
      banner: `Installing ${packageName}`,
      failureMessage: `Installing ${packageName} failed`,
      selected: requestedActions.includes('install'),
      run: async (stepCtx) => {
        const built = await runProduct(stepCtx, 'build', product, 'install');
        if (!built.ok) {
          return built;
        }
        return installArtifacts(stepCtx);
      }
    }
  ];
}

async function runStage(stage: Stage, ctx: StepContext): Promise<StageFailure | undefined> {
  const base = { stage: stage.name, message: stage.failureMessage };
  try {
    const result = await stage.run(ctx);
    return result.ok ? undefined : { ...base, kind: 'command', ...result.failure };
  } catch (error) {
    // Anything thrown inside a stage still fails that stage.
    return { ...base, kind: 'error', error: normalizeError(error) };
  }
}

/**
 * Runs the selected stages in their fixed order and stops at the first
 * failing one. Earlier stages are not undone.
 */
export async function runBuildActions(config: InvocationConfig, deps: OrchestratorDeps): Promise<RunOutcome> {
  const ctx = createStepContext(config, deps);
  const completed: BuildStage[] = [];

  for (const stage of planStages(config, ctx)) {
    if (!stage.selected) {
      continue;
    }

    deps.reporter.info(`** ${stage.banner} **`);
    const failure = await runStage(stage, ctx);
    if (failure) {
      for (const line of formatStageFailure(failure)) {
        deps.reporter.error(line);
      }
      return { ok: false, completed, failure };
    }
    completed.push(stage.name);
  }

  return { ok: true, completed };
}
