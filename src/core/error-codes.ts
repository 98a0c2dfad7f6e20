export type ErrorCode =
  | 'E_USAGE'
  | 'E_MISSING_ARGUMENT'
  | 'E_CONFIG_INVALID'
  | 'E_TARGET_INFO'
  | 'E_COMMAND_FAILED'
  | 'E_FILESYSTEM'
  | 'E_INTERNAL';

export const exitCodeByError: Record<ErrorCode, number> = {
  E_USAGE: 2,
  E_MISSING_ARGUMENT: 1,
  E_CONFIG_INVALID: 1,
  E_TARGET_INFO: 1,
  E_COMMAND_FAILED: 1,
  E_FILESYSTEM: 1,
  E_INTERNAL: 1
};

export class BuildHelperError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BuildHelperError';
    this.code = code;
    this.details = details;
  }
}

const INTERNAL_ERROR_MESSAGE = 'Internal error';

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return Boolean(
    value &&
      typeof value === 'object' &&
      'code' in value &&
      typeof (value as NodeJS.ErrnoException).code === 'string'
  );
}

export function normalizeError(error: unknown): BuildHelperError {
  if (error instanceof BuildHelperError) {
    return error;
  }
  if (isErrnoException(error)) {
    const target = typeof error.path === 'string' ? ` (${error.path})` : '';
    return new BuildHelperError('E_FILESYSTEM', `File system error ${error.code ?? 'UNKNOWN'}${target}`, {
      reason: error.code
    });
  }
  if (error instanceof Error) {
    return new BuildHelperError('E_INTERNAL', `${INTERNAL_ERROR_MESSAGE}: ${error.message}`);
  }
  return new BuildHelperError('E_INTERNAL', INTERNAL_ERROR_MESSAGE);
}

function formatDetail(key: string, value: unknown): string[] {
  if (Array.isArray(value)) {
    return [`  ${key}:`, ...value.map((item) => `    - ${String(item)}`)];
  }
  return [`  ${key}: ${String(value)}`];
}

export function formatErrorReport(error: BuildHelperError): string[] {
  const prefix = error.code === 'E_USAGE' ? 'usage error' : 'error';
  const lines = [`${prefix}: ${error.message}`];
  if (error.code !== 'E_INTERNAL' && error.details) {
    for (const [key, value] of Object.entries(error.details)) {
      lines.push(...formatDetail(key, value));
    }
  }
  return lines;
}
