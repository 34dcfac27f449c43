import { z } from 'zod';

export const pactCheckConfigSchema = z
  .object({
    provider: z
      .object({
        name: z.string().min(1).max(200).optional(),
        base_url: z.string().url().optional(),
        timeout_ms: z.number().int().min(100).max(600_000).optional(),
      })
      .strict()
      .optional(),

    consumer: z
      .object({
        name: z.string().min(1).max(200).optional(),
      })
      .strict()
      .optional(),

    pact: z
      .object({
        uri: z.string().min(1).optional(),
        username: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    filter: z
      .object({
        description: z.string().optional(),
        state: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type PactCheckConfigInput = z.infer<typeof pactCheckConfigSchema>;
