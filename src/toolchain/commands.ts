import path from 'node:path';

import type { InvocationConfig } from '../types/invocation.js';

export type ProductAction = 'build' | 'test';

export function buildProductCommand(
  action: ProductAction,
  product: string,
  config: InvocationConfig,
  packageArgs: readonly string[],
  hostPlatform: NodeJS.Platform
): string[] {
  const command = [config.toolExecutable, action, ...packageArgs];

  if (hostPlatform !== 'darwin') {
    command.push('--enable-test-discovery');
  }
  if (config.multirootDataFile) {
    command.push('--multiroot-data-file', config.multirootDataFile);
  }
  if (action === 'test') {
    command.push('--test-product', product);
  } else {
    command.push('--product', product);
  }

  return command;
}

export function buildUpdateCommand(config: InvocationConfig): string[] {
  return [
    config.toolExecutable,
    'package',
    '--package-path',
    config.packagePath,
    '--scratch-path',
    config.buildDirectory,
    'update'
  ];
}

export function projectFilePath(config: InvocationConfig): string {
  return path.join(config.packagePath, `${config.packageName}.xcodeproj`);
}

export function buildGenerateProjectCommand(config: InvocationConfig): string[] {
  return [
    config.toolExecutable,
    'package',
    '--package-path',
    config.packagePath,
    'generate-xcodeproj',
    '--output',
    projectFilePath(config)
  ];
}
