import { z } from 'zod';

import { isDateKey, isValidTimezone } from '../utils/dateUtilities';

// Raw record as yielded by the export reader. Metric and workout names stay
// strings here; unknown names are rejected later, per record, by the normalizer.
export const RawRecordSchema = z.object({
  metricType: z.string().min(1),
  value: z.number().finite(),
  unit: z.string().optional(),
  start: z.string().min(1),
  end: z.string().min(1),
  source: z.string().default(''),
  workoutType: z.string().optional(),
});

const DateKeySchema = z
  .string()
  .refine((value) => isDateKey(value), { message: 'Expected a YYYY-MM-DD date' });

const TimezoneSchema = z
  .string()
  .refine((value) => isValidTimezone(value), { message: 'Unknown IANA timezone' });

// Options a caller may set per run; anything omitted comes from configuration
export const TransformOptionsSchema = z
  .object({
    localTimezone: TimezoneSchema.optional(),
    mergeGapSeconds: z.number().int().nonnegative().optional(),
    midnightPolicy: z.enum(['start-day', 'split']).optional(),
    since: DateKeySchema.optional(),
  })
  .strict();

// Body of POST /api/transform
export const TransformRequestSchema = z.object({
  records: z.array(z.unknown()),
  options: TransformOptionsSchema.optional(),
});

// YAML pipeline configuration file
export const PipelineConfigFileSchema = z
  .object({
    localTimezone: TimezoneSchema.optional(),
    mergeGapSeconds: z.number().int().nonnegative().optional(),
    midnightPolicy: z.enum(['start-day', 'split']).optional(),
    since: DateKeySchema.optional(),
    canonicalUnits: z.record(z.string(), z.string()).optional(),
  })
  .strict();

// JSON record file: a bare array or an object with a records array
export const RecordFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ records: z.array(z.unknown()) }).transform((file) => file.records),
]);

export type TransformOptions = z.infer<typeof TransformOptionsSchema>;
