import { z } from 'zod';

// ── Output format ───────────────────────────────────────────

export const outputFormatSchema = z.enum(['json', 'yaml', 'text']);

export type OutputFormat = z.infer<typeof outputFormatSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    oracleHome: z.string().min(1).optional(),
    commandTimeout: z.number().positive().optional(),
    format: outputFormatSchema.optional(),
    olrLoc: z.string().min(1).optional(),
    oratab: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
