import { z } from 'zod';

const envVarName = z
  .string()
  .min(1)
  .regex(/^[A-Z_][A-Z0-9_]*$/, 'Environment variable names must be uppercase snake_case');

export const helperConfigSchema = z.object({
  product: z.string().min(1).default('docc'),
  testProduct: z.string().min(1).default('SwiftDocCPackageTests'),
  binaryName: z.string().min(1).default('docc'),
  metadataFile: z.string().min(1).default('features.json'),
  metadataInstallPath: z.array(z.string().min(1)).min(1).default(['share', 'docc', 'features.json']),
  environment: z
    .object({
      localDependencies: envVarName.default('SWIFTCI_USE_LOCAL_DEPS'),
      buildScript: envVarName.default('SWIFT_BUILD_SCRIPT_ENVIRONMENT')
    })
    .default({})
});
