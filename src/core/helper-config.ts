import path from 'node:path';

import { helperConfigSchema } from '../contracts/helper-config.contract.js';
import type { HelperConfig } from '../types/helper-config.js';
import { readJsonFileOrDefault } from '../utils/fs.js';
import { BuildHelperError } from './error-codes.js';

export const HELPER_CONFIG_RELATIVE_PATH = path.join('config', 'build-helper.json');

export function defaultHelperConfig(): HelperConfig {
  return helperConfigSchema.parse({});
}

export async function loadHelperConfig(helperRoot: string): Promise<HelperConfig> {
  const filePath = path.join(helperRoot, HELPER_CONFIG_RELATIVE_PATH);
  let raw: unknown;
  try {
    raw = await readJsonFileOrDefault(filePath, {});
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new BuildHelperError('E_CONFIG_INVALID', `Helper config is not valid JSON: ${filePath}`, {
        reason: error.message
      });
    }
    throw error;
  }

  const parsed = helperConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BuildHelperError('E_CONFIG_INVALID', `Helper config failed validation: ${filePath}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  return parsed.data;
}
