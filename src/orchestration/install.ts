import path from 'node:path';

import { BuildHelperError } from '../core/error-codes.js';
import { productOverlay } from '../process/env.js';
import { ensureDir, exists, withTrailingSeparator } from '../utils/fs.js';
import { captureCommand, executeCommand, productCommand, type StepContext } from './context.js';
import { stepDone, type StepResult } from './step.js';

export function syncCommand(source: string, destination: string): string[] {
  return ['rsync', '-a', source, destination];
}

async function createIntermediateDirectories(ctx: StepContext, dirPath: string): Promise<void> {
  ctx.reporter.info(`-- note: creating intermediate directories ${dirPath}`);
  await ensureDir(dirPath);
}

async function syncPath(ctx: StepContext, source: string, destination: string): Promise<StepResult> {
  const command = syncCommand(source, destination);
  ctx.reporter.info(`-- note: installing ${path.basename(source)}: ${command.join(' ')}`);
  return executeCommand(ctx, command);
}

export async function locateBuiltBinary(ctx: StepContext): Promise<StepResult<string>> {
  const command = await productCommand(ctx, 'build', ctx.helperConfig.product, 'show-bin-path');
  if (!command.ok) {
    return command;
  }

  const output = await captureCommand(ctx, command.value, [productOverlay(ctx.helperConfig)]);
  if (!output.ok) {
    return output;
  }
  return { ok: true, value: path.join(output.value.trim(), ctx.helperConfig.binaryName) };
}

/**
 * Copies the built binary, its feature metadata and, optionally, a render
 * template into place. Expects the product to be built already.
 */
export async function installArtifacts(ctx: StepContext): Promise<StepResult> {
  const { config, helperConfig } = ctx;
  const installDirectory = config.installDirectory;
  if (!installDirectory) {
    throw new BuildHelperError('E_MISSING_ARGUMENT', "Missing required '--install-dir' argument.", {
      argument: '--install-dir'
    });
  }

  const binary = await locateBuiltBinary(ctx);
  if (!binary.ok) {
    return binary;
  }

  const installParent = path.dirname(installDirectory);
  await createIntermediateDirectories(ctx, installParent);
  const binaryCopy = await syncPath(ctx, binary.value, installDirectory);
  if (!binaryCopy.ok) {
    return binaryCopy;
  }

  const metadataSource = path.join(config.packagePath, helperConfig.metadataFile);
  if (await exists(metadataSource)) {
    const metadataDestination = path.join(installParent, ...helperConfig.metadataInstallPath);
    await createIntermediateDirectories(ctx, path.dirname(metadataDestination));
    const metadataCopy = await syncPath(ctx, metadataSource, metadataDestination);
    if (!metadataCopy.ok) {
      return metadataCopy;
    }
  } else {
    ctx.reporter.info(`-- note: no ${helperConfig.metadataFile} in ${config.packagePath}, skipping`);
  }

  const templateSource = config.renderTemplateSource;
  if (templateSource !== undefined) {
    const templateDestination = config.renderTemplateDestination;
    if (templateDestination === undefined) {
      throw new BuildHelperError(
        'E_MISSING_ARGUMENT',
        "Missing required '--copy-doccrender-to' argument since '--copy-doccrender-from' was passed.",
        { argument: '--copy-doccrender-to' }
      );
    }
    // Trailing separator: copy the directory's contents, not the directory itself.
    await createIntermediateDirectories(ctx, templateDestination);
    const templateCopy = await syncPath(ctx, withTrailingSeparator(templateSource), templateDestination);
    if (!templateCopy.ok) {
      return templateCopy;
    }
  }

  return stepDone;
}
