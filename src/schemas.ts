/**
 * Zod schemas for CLI options and the JSON report
 */
import { z } from 'zod';

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const CliOptions = z.object({
  path: z.string().min(1, 'path is required'),
  format: z.enum(OUTPUT_FORMATS).default('text'),
  output: z.string().min(1, '--output needs a file path').optional(),
});
export type CliOptions = z.infer<typeof CliOptions>;

export const ResultRecord = z.object({
  file: z.string(),
  classes: z.array(z.string()),
  equipment: z.array(z.string()),
  error: z.string().optional(),
});

export const ResultRecords = z.array(ResultRecord);
