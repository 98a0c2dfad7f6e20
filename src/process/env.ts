import type { HelperConfig } from '../types/helper-config.js';
import type { InvocationConfig } from '../types/invocation.js';

export type EnvOverlay = Readonly<Record<string, string>>;

export function mergeEnv(base: Readonly<NodeJS.ProcessEnv>, ...overlays: EnvOverlay[]): NodeJS.ProcessEnv {
  return overlays.reduce<NodeJS.ProcessEnv>((env, overlay) => ({ ...env, ...overlay }), { ...base });
}

export function baseOverlay(config: InvocationConfig, helperConfig: HelperConfig): EnvOverlay {
  // Prefer dependencies checked out next to the package.
  return config.useLocalDependencies ? { [helperConfig.environment.localDependencies]: '1' } : {};
}

/** Marks toolchain product invocations as coming from this helper so finished builds are reused. */
export function productOverlay(helperConfig: HelperConfig): EnvOverlay {
  return { [helperConfig.environment.buildScript]: '1' };
}
