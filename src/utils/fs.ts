import { promises as fs, realpathSync } from 'node:fs';
import path from 'node:path';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  return JSON.parse(raw) as unknown;
}

export async function readJsonFileOrDefault(filePath: string, fallback: unknown): Promise<unknown> {
  if (!(await exists(filePath))) {
    return fallback;
  }
  return readJsonFile(filePath);
}

/** Walks up from `startDir` to the first directory containing `marker`. */
export async function findUpDirectory(startDir: string, marker: string): Promise<string | null> {
  let current = path.resolve(startDir);
  for (;;) {
    if (await exists(path.join(current, marker))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/** Resolves symlinks in an existing path; a path that does not exist yet is returned as given. */
export function realpathIfExists(filePath: string): string {
  try {
    return realpathSync(filePath);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return filePath;
    }
    throw error;
  }
}

export function withTrailingSeparator(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : `${dirPath}${path.sep}`;
}
