import { crossCompileFlags, libraryPathFlags, type PackageAction } from '../platform/target-platform.js';
import type { InvocationConfig } from '../types/invocation.js';
import type { TargetPlatform } from '../types/target-info.js';

export interface PackageOptions {
  args: string[];
  /** Non-fatal problems to report on stderr. */
  warnings: string[];
}

export function buildPackageOptions(
  action: PackageAction,
  config: InvocationConfig,
  platform: TargetPlatform
): PackageOptions {
  const args = [
    '--package-path',
    config.packagePath,
    '--scratch-path',
    config.buildDirectory,
    '--configuration',
    config.configuration
  ];

  // Install builds are always verbose so CI failures carry the full log.
  if (config.verbose || action === 'install') {
    args.push('--verbose');
  }

  args.push(...libraryPathFlags(platform, action));

  const cross = crossCompileFlags(platform, config.crossCompileHosts);
  args.push(...cross.args);

  // An installed binary resolves runtime libraries relative to itself, not the host toolchain.
  if (action === 'install' || action === 'show-bin-path') {
    args.push('-Xswiftc', '-no-toolchain-stdlib-rpath');
  }

  if (action === 'test') {
    args.push('--parallel');
  }

  if (action === 'show-bin-path') {
    args.push('--show-bin-path');
  }

  return { args, warnings: cross.warnings };
}
