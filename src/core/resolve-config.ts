import path from 'node:path';

import type { ParsedRunOptions } from '../cli/types.js';
import { invocationConfigSchema } from '../contracts/invocation.contract.js';
import type { InvocationConfig } from '../types/invocation.js';
import { realpathIfExists } from '../utils/fs.js';
import { expandActions } from './actions.js';
import { BuildHelperError } from './error-codes.js';

export interface ResolveContext {
  /** Directory the helper itself lives in; `--package-path` is relative to it. */
  helperRoot: string;
  /** Working directory the other relative paths resolve against. */
  cwd: string;
}

export function resolveInvocationConfig(options: ParsedRunOptions, context: ResolveContext): InvocationConfig {
  const requestedActions = expandActions(options.actions);

  if (requestedActions.includes('install') && !options.installDir) {
    throw new BuildHelperError('E_MISSING_ARGUMENT', "Missing required '--install-dir' argument.", {
      argument: '--install-dir'
    });
  }

  if (options.copyDoccRenderFrom && !options.copyDoccRenderTo) {
    throw new BuildHelperError(
      'E_MISSING_ARGUMENT',
      "Missing required '--copy-doccrender-to' argument since '--copy-doccrender-from' was passed.",
      { argument: '--copy-doccrender-to' }
    );
  }

  const fromCwd = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(context.cwd, value);

  const packagePath = realpathIfExists(path.resolve(context.helperRoot, options.packagePath));
  const toolchainPath = path.resolve(context.cwd, options.toolchain);

  const config = invocationConfigSchema.parse({
    packagePath,
    packageName: path.basename(packagePath),
    buildDirectory: fromCwd(options.buildDir) ?? path.join(packagePath, '.build'),
    configuration: options.configuration,
    toolchainPath,
    toolExecutable: path.join(toolchainPath, 'bin', 'swift'),
    requestedActions,
    installDirectory: fromCwd(options.installDir),
    renderTemplateSource: fromCwd(options.copyDoccRenderFrom),
    renderTemplateDestination: fromCwd(options.copyDoccRenderTo),
    crossCompileHosts: options.crossCompileHosts,
    multirootDataFile: fromCwd(options.multirootDataFile),
    prefix: fromCwd(options.prefix),
    update: options.update,
    useLocalDependencies: !options.noLocalDeps,
    verbose: options.verbose
  });

  return Object.freeze(config);
}
