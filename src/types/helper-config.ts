import type { z } from 'zod';

import type { helperConfigSchema } from '../contracts/helper-config.contract.js';

export type HelperConfig = z.infer<typeof helperConfigSchema>;
