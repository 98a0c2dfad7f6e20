import { formatCommandLine } from '../process/command-line.js';
import { baseOverlay, mergeEnv, productOverlay, type EnvOverlay } from '../process/env.js';
import type { ProcessRunner } from '../process/runner.js';
import type { PackageAction } from '../platform/target-platform.js';
import { buildPackageOptions } from '../toolchain/package-options.js';
import { buildProductCommand, type ProductAction } from '../toolchain/commands.js';
import { queryTargetPlatform } from '../toolchain/target-info.js';
import type { HelperConfig } from '../types/helper-config.js';
import type { InvocationConfig } from '../types/invocation.js';
import type { TargetPlatform } from '../types/target-info.js';
import type { Reporter } from './reporter.js';
import { captureFailure, stepDone, type StepResult } from './step.js';

export interface OrchestratorDeps {
  runner: ProcessRunner;
  reporter: Reporter;
  helperConfig: HelperConfig;
  baseEnv: Readonly<NodeJS.ProcessEnv>;
  hostPlatform: NodeJS.Platform;
}

export interface StepContext extends OrchestratorDeps {
  config: InvocationConfig;
  /** Build platform, queried from the toolchain on first use and reused afterwards. */
  resolvePlatform(): Promise<StepResult<TargetPlatform>>;
}

export function createStepContext(config: InvocationConfig, deps: OrchestratorDeps): StepContext {
  let platform: TargetPlatform | undefined;

  return {
    ...deps,
    config,
    async resolvePlatform() {
      if (platform) {
        return { ok: true, value: platform };
      }
      const result = await queryTargetPlatform(deps.runner, config, mergeEnv(deps.baseEnv));
      if (result.ok) {
        platform = result.value;
      }
      return result;
    }
  };
}

function childEnv(ctx: StepContext, overlays: readonly EnvOverlay[]): NodeJS.ProcessEnv {
  return mergeEnv(ctx.baseEnv, baseOverlay(ctx.config, ctx.helperConfig), ...overlays);
}

export async function executeCommand(
  ctx: StepContext,
  command: readonly string[],
  overlays: readonly EnvOverlay[] = []
): Promise<StepResult> {
  if (ctx.config.verbose) {
    ctx.reporter.info(formatCommandLine(command));
  }
  const [executable, ...args] = command;
  const result = await ctx.runner.run(executable, args, { env: childEnv(ctx, overlays) });
  if (result.exitCode !== 0) {
    return { ok: false, failure: { command, exitCode: result.exitCode } };
  }
  return stepDone;
}

export async function captureCommand(
  ctx: StepContext,
  command: readonly string[],
  overlays: readonly EnvOverlay[] = []
): Promise<StepResult<string>> {
  if (ctx.config.verbose) {
    ctx.reporter.info(formatCommandLine(command));
  }
  const [executable, ...args] = command;
  const result = await ctx.runner.capture(executable, args, { env: childEnv(ctx, overlays) });
  if (result.exitCode !== 0) {
    return { ok: false, failure: captureFailure(command, result.exitCode, result.stderr) };
  }
  return { ok: true, value: result.stdout };
}

export async function productCommand(
  ctx: StepContext,
  action: ProductAction,
  product: string,
  packageAction: PackageAction
): Promise<StepResult<string[]>> {
  const platform = await ctx.resolvePlatform();
  if (!platform.ok) {
    return platform;
  }

  const options = buildPackageOptions(packageAction, ctx.config, platform.value);
  for (const warning of options.warnings) {
    ctx.reporter.error(warning);
  }

  return {
    ok: true,
    value: buildProductCommand(action, product, ctx.config, options.args, ctx.hostPlatform)
  };
}

export async function runProduct(
  ctx: StepContext,
  action: ProductAction,
  product: string,
  packageAction: PackageAction
): Promise<StepResult> {
  const command = await productCommand(ctx, action, product, packageAction);
  if (!command.ok) {
    return command;
  }
  return executeCommand(ctx, command.value, [productOverlay(ctx.helperConfig)]);
}
