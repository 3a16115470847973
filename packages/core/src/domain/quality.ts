/**
 * Data quality report types
 */

import { z } from 'zod';

export const QualityStatusSchema = z.enum(['pass', 'warning', 'fail']);
export type QualityStatus = z.infer<typeof QualityStatusSchema>;

export const QualitySeveritySchema = z.enum(['error', 'warning']);
export type QualitySeverity = z.infer<typeof QualitySeveritySchema>;

export const QualityCheckNameSchema = z.enum([
  'empty_data',
  'missing_values',
  'ohlc_relationships',
  'duplicate_timestamps',
  'gaps',
  'outliers',
]);
export type QualityCheckName = z.infer<typeof QualityCheckNameSchema>;

export const QualityIssueSchema = z.object({
  check: QualityCheckNameSchema,
  severity: QualitySeveritySchema,
  message: z.string(),
  index: z.number().int().optional(),
  timestamp: z.number().optional(),
});

export type QualityIssue = z.infer<typeof QualityIssueSchema>;

export const DataGapSchema = z.object({
  start: z.number(),
  end: z.number(),
  gap_days: z.number(),
});

export type DataGap = z.infer<typeof DataGapSchema>;

export const DataOutlierSchema = z.object({
  timestamp: z.number().optional(),
  index: z.number().int(),
  kind: z.enum(['price', 'volume']),
  value: z.number(),
});

export type DataOutlier = z.infer<typeof DataOutlierSchema>;

export const QualityReportSchema = z.object({
  status: QualityStatusSchema,
  row_count: z.number().int().nonnegative(),
  checks_performed: z.array(QualityCheckNameSchema),
  issues: z.array(QualityIssueSchema),
  gaps: z.array(DataGapSchema),
  outliers: z.array(DataOutlierSchema),
  validation_errors: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export type QualityReport = z.infer<typeof QualityReportSchema>;

export interface FreshnessReport {
  is_fresh: boolean;
  age_hours: number;
  max_age_hours: number;
  message: string;
}
