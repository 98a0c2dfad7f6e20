import type { z } from 'zod';

import type {
  buildActionSchema,
  buildConfigurationSchema,
  invocationConfigSchema,
  requestedActionSchema
} from '../contracts/invocation.contract.js';

export type BuildAction = z.infer<typeof buildActionSchema>;
export type RequestedAction = z.infer<typeof requestedActionSchema>;
export type BuildConfiguration = z.infer<typeof buildConfigurationSchema>;
export type InvocationConfig = Readonly<z.infer<typeof invocationConfigSchema>>;
