import type { BuildConfiguration, RequestedAction } from '../types/invocation.js';

export interface ParsedRunOptions {
  packagePath: string;
  toolchain: string;
  prefix?: string;
  configuration: BuildConfiguration;
  buildDir?: string;
  multirootDataFile?: string;
  update: boolean;
  noLocalDeps: boolean;
  installDir?: string;
  copyDoccRenderFrom?: string;
  copyDoccRenderTo?: string;
  crossCompileHosts?: string;
  verbose: boolean;
  actions: RequestedAction[];
}

export interface ParsedHelpCommand {
  kind: 'help';
}

export interface ParsedRunCommand {
  kind: 'run';
  options: ParsedRunOptions;
}

export type ParsedCommand = ParsedHelpCommand | ParsedRunCommand;
