import { BuildHelperError } from '../core/error-codes.js';
import type { TargetPlatform } from '../types/target-info.js';

export type PackageAction = 'build' | 'test' | 'install' | 'show-bin-path';

export function parseTargetPlatform(triple: string): TargetPlatform {
  const components = triple.split('-');
  const os = components[2];
  if (components.length < 3 || !os) {
    throw new BuildHelperError('E_TARGET_INFO', `Unrecognized target triple: '${triple}'`, { triple });
  }

  // FreeBSD and macOS triples carry a version suffix; the library install dirs do not.
  if (os.startsWith('macosx')) {
    return { kind: 'macosx', triple };
  }
  if (os.startsWith('freebsd')) {
    return { kind: 'freebsd', triple };
  }
  if (os.startsWith('openbsd')) {
    return { kind: 'openbsd', triple };
  }
  return { kind: 'other', triple, os };
}

function rpath(value: string): string[] {
  return ['-Xlinker', '-rpath', '-Xlinker', value];
}

/**
 * Linker flags that let the installed binary find the toolchain's runtime
 * libraries relative to its own location.
 */
export function libraryPathFlags(platform: TargetPlatform, action: PackageAction): string[] {
  const disableLocalRpath = action === 'install' ? ['--disable-local-rpath'] : [];

  switch (platform.kind) {
    case 'macosx':
      return rpath('@executable_path/../lib/swift/macosx');
    case 'freebsd':
      return [...rpath('$ORIGIN/../lib/swift/freebsd'), ...disableLocalRpath];
    case 'openbsd':
      return [...rpath('$ORIGIN/../lib/swift/openbsd'), '-Xlinker', '-z', '-Xlinker', 'origin'];
    case 'other':
      return [...rpath(`$ORIGIN/../lib/swift/${platform.os}`), ...disableLocalRpath];
    default: {
      const unreachable: never = platform;
      throw new BuildHelperError('E_INTERNAL', `Unhandled platform ${JSON.stringify(unreachable)}`);
    }
  }
}

export interface CrossCompileFlags {
  args: string[];
  warnings: string[];
}

export function crossCompileFlags(platform: TargetPlatform, hosts: string | undefined): CrossCompileFlags {
  if (!hosts) {
    return { args: [], warnings: [] };
  }
  if (platform.kind === 'macosx' && hosts.startsWith('macosx-')) {
    return { args: ['--arch', 'x86_64', '--arch', 'arm64'], warnings: [] };
  }
  return { args: [], warnings: [`cannot cross-compile for ${hosts}`] };
}
