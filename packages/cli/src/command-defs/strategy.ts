import { z } from 'zod';

export const outputFormatSchema = z.enum(['json', 'table']).default('json');

export type OutputFormat = z.infer<typeof outputFormatSchema>;

/**
 * Comma-separated list ("a,b") or repeated values; empty entries dropped
 */
const listSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    (Array.isArray(value) ? value : (value ?? '').split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

/**
 * evaluate: run the full pipeline for one strategy file
 */
export const evaluateSchema = z.object({
  strategy: z.string().min(1),
  bars: z.string().min(1),
  cash: z.coerce.number().positive().default(100_000),
  execute: z.boolean().default(false),
  walkForward: z.boolean().default(false),
  mode: z.enum(['split', 'windows']).default('split'),
  gating: z.boolean().default(false),
  tags: listSchema,
  requireGatingPass: z.boolean().default(true),
  outDir: z.string().min(1).optional(),
  format: outputFormatSchema,
});

export type EvaluateArgs = z.infer<typeof evaluateSchema>;

/**
 * quality: data-quality report for every symbol in a bars file
 */
export const qualitySchema = z.object({
  bars: z.string().min(1),
  gapDays: z.coerce.number().positive().optional(),
  outlierPct: z.coerce.number().positive().optional(),
  strict: z.boolean().optional(),
  format: outputFormatSchema,
});

export type QualityArgs = z.infer<typeof qualitySchema>;

/**
 * scenarios: list the crisis scenario registry
 */
export const scenariosSchema = z.object({
  tags: listSchema,
  format: outputFormatSchema,
});

export type ScenariosArgs = z.infer<typeof scenariosSchema>;
