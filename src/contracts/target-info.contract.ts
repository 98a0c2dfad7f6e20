import { z } from 'zod';

// Output of `swift -print-target-info`; only the triples are read.
export const targetInfoSchema = z
  .object({
    target: z
      .object({
        triple: z.string().min(1),
        unversionedTriple: z.string().min(1)
      })
      .passthrough()
  })
  .passthrough();
