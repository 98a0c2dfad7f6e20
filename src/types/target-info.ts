import type { z } from 'zod';

import type { targetInfoSchema } from '../contracts/target-info.contract.js';

export type TargetInfo = z.infer<typeof targetInfoSchema>;

export type TargetPlatform =
  | { kind: 'macosx'; triple: string }
  | { kind: 'freebsd'; triple: string }
  | { kind: 'openbsd'; triple: string }
  | { kind: 'other'; triple: string; os: string };
