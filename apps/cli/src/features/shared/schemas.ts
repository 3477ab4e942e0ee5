import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const TransactionFileArgumentSchema = z
  .string({ required_error: 'A transaction file is required' })
  .trim()
  .min(1, { message: 'A transaction file is required' });

/**
 * Process command options
 */
export const ProcessCommandOptionsSchema = JsonFlagSchema.extend(VerboseFlagSchema.shape);
