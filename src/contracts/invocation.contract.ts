import { z } from 'zod';

export const buildActionSchema = z.enum(['build', 'test', 'generate-xcodeproj', 'install']);

export const requestedActionSchema = z.enum(['all', 'build', 'test', 'generate-xcodeproj', 'install']);

export const buildConfigurationSchema = z.enum(['debug', 'release']);

export const invocationConfigSchema = z.object({
  packagePath: z.string().min(1),
  packageName: z.string().min(1),
  buildDirectory: z.string().min(1),
  configuration: buildConfigurationSchema,
  toolchainPath: z.string().min(1),
  toolExecutable: z.string().min(1),
  requestedActions: z.array(buildActionSchema),
  installDirectory: z.string().min(1).optional(),
  renderTemplateSource: z.string().min(1).optional(),
  renderTemplateDestination: z.string().min(1).optional(),
  crossCompileHosts: z.string().min(1).optional(),
  multirootDataFile: z.string().min(1).optional(),
  prefix: z.string().min(1).optional(),
  update: z.boolean(),
  useLocalDependencies: z.boolean(),
  verbose: z.boolean()
});
