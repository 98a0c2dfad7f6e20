#!/usr/bin/env node
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { BuildHelperError, exitCodeByError, formatErrorReport, normalizeError } from '../core/error-codes.js';
import { runHelper } from '../core/helper.js';
import { createStdioReporter } from '../orchestration/reporter.js';
import { ExecaProcessRunner } from '../process/runner.js';
import { findUpDirectory } from '../utils/fs.js';

async function main(): Promise<void> {
  const reporter = createStdioReporter();
  try {
    const scriptDir = path.dirname(fileURLToPath(import.meta.url));
    const helperRoot = await findUpDirectory(scriptDir, 'package.json');
    if (!helperRoot) {
      throw new BuildHelperError('E_INTERNAL', `Cannot locate the helper's package root from ${scriptDir}`);
    }

    const result = await runHelper(process.argv.slice(2), {
      helperRoot,
      cwd: process.cwd(),
      runner: new ExecaProcessRunner(),
      reporter,
      baseEnv: process.env,
      hostPlatform: process.platform
    });
    process.exitCode = result.exitCode;
  } catch (error) {
    const normalized = normalizeError(error);
    for (const line of formatErrorReport(normalized)) {
      reporter.error(line);
    }
    process.exitCode = exitCodeByError[normalized.code];
  }
}

void main();
