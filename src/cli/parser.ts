import { buildConfigurationSchema, requestedActionSchema } from '../contracts/invocation.contract.js';
import { BuildHelperError } from '../core/error-codes.js';
import type { RequestedAction } from '../types/invocation.js';
import type { ParsedCommand } from './types.js';

const valueFlags = new Set<string>([
  'package-path',
  'prefix',
  'configuration',
  'build-dir',
  'multiroot-data-file',
  'toolchain',
  'install-dir',
  'copy-doccrender-from',
  'copy-doccrender-to',
  'cross-compile-hosts'
]);

const booleanFlags = new Set<string>(['verbose', 'update', 'no-local-deps', 'help']);

const shortFlags: Record<string, string> = {
  '-v': 'verbose',
  '-h': 'help'
};

export const usageText = `usage: docc-build-helper [options] [build_actions ...]

build_actions: any of all, build, test, generate-xcodeproj, install (default: build)

options:
  --toolchain <dir>              The toolchain to use when building this package (required).
  --package-path <dir>           Package root, relative to the helper's location.
  --configuration <debug|release>
  --build-dir <dir>              Build output directory (default: <package-path>/.build).
  --prefix <dir>                 The install path.
  --multiroot-data-file <file>   Xcode workspace for a unified build with other projects.
  --update                       Update all package dependencies first.
  --no-local-deps                Use normal remote dependencies when building.
  --install-dir <path>           The location to install the docc executable to.
  --copy-doccrender-from <dir>   The location to copy an existing render template from.
  --copy-doccrender-to <dir>     The location to install an existing render template to.
  --cross-compile-hosts <hosts>  List of cross compile host targets.
  -v, --verbose                  Log the executed commands.
  -h, --help                     Show this help.
`;

function splitToken(token: string): { name: string; inlineValue?: string } {
  const short = shortFlags[token];
  if (short) {
    return { name: short };
  }
  const body = token.slice(2);
  const equalsAt = body.indexOf('=');
  if (equalsAt === -1) {
    return { name: body };
  }
  return { name: body.slice(0, equalsAt), inlineValue: body.slice(equalsAt + 1) };
}

function parseAction(token: string): RequestedAction {
  const parsed = requestedActionSchema.safeParse(token);
  if (!parsed.success) {
    throw new BuildHelperError(
      'E_USAGE',
      `Invalid build action: '${token}' (choose from ${requestedActionSchema.options.join(', ')})`
    );
  }
  return parsed.data;
}

export function parseArguments(argv: readonly string[]): ParsedCommand {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const actions: RequestedAction[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (!token.startsWith('-') || token === '-') {
      actions.push(parseAction(token));
      continue;
    }

    const { name, inlineValue } = splitToken(token);

    if (booleanFlags.has(name)) {
      if (inlineValue !== undefined) {
        throw new BuildHelperError('E_USAGE', `Flag --${name} does not take a value`);
      }
      switches.add(name);
      continue;
    }

    if (!valueFlags.has(name)) {
      throw new BuildHelperError('E_USAGE', `Unknown flag: ${token}`);
    }

    if (inlineValue !== undefined) {
      values.set(name, inlineValue);
      continue;
    }

    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new BuildHelperError('E_USAGE', `Missing value for --${name}`);
    }
    values.set(name, value);
    index += 1;
  }

  if (switches.has('help')) {
    return { kind: 'help' };
  }

  const toolchain = values.get('toolchain');
  if (!toolchain) {
    throw new BuildHelperError('E_USAGE', 'Missing required flag --toolchain');
  }

  const configuration = buildConfigurationSchema.safeParse(values.get('configuration') ?? 'debug');
  if (!configuration.success) {
    throw new BuildHelperError(
      'E_USAGE',
      `Invalid configuration: '${values.get('configuration') ?? ''}' (choose from debug, release)`
    );
  }

  const optional = (name: string): string | undefined => {
    const value = values.get(name);
    return value === undefined || value.length === 0 ? undefined : value;
  };

  return {
    kind: 'run',
    options: {
      packagePath: values.get('package-path') ?? '',
      toolchain,
      prefix: optional('prefix'),
      configuration: configuration.data,
      buildDir: optional('build-dir'),
      multirootDataFile: optional('multiroot-data-file'),
      update: switches.has('update'),
      noLocalDeps: switches.has('no-local-deps'),
      installDir: optional('install-dir'),
      copyDoccRenderFrom: optional('copy-doccrender-from'),
      copyDoccRenderTo: optional('copy-doccrender-to'),
      crossCompileHosts: optional('cross-compile-hosts'),
      verbose: switches.has('verbose'),
      actions: actions.length > 0 ? actions : ['build']
    }
  };
}
