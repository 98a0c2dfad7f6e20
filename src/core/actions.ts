import { buildActionSchema } from '../contracts/invocation.contract.js';
import type { BuildAction, RequestedAction } from '../types/invocation.js';

export const allBuildActions: readonly BuildAction[] = buildActionSchema.options;

export function expandActions(requested: readonly RequestedAction[]): BuildAction[] {
  if (requested.includes('all')) {
    return [...allBuildActions];
  }
  return allBuildActions.filter((action) => requested.includes(action));
}

export function shouldRunAction(action: BuildAction, selected: readonly RequestedAction[]): boolean {
  return selected.includes(action) || selected.includes('all');
}
