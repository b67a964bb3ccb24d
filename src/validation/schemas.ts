import { z } from 'zod';

import { isValidDate, parseHealthDate } from '../utils/dateUtilities';

import type { CardiacKind } from '../types';

// Shape is strict; content is not. Unparseable timestamps and non-numeric values
// pass validation and are counted by the pipeline instead of failing the request.
const TimestampSchema = z.string();

const DaysBackSchema = z.number().int().nonnegative();

// Reference time must parse, since it anchors the whole window
const ReferenceTimeSchema = z
  .string()
  .refine((value) => isValidDate(parseHealthDate(value)), {
    message: 'Expected a date-time like "2024-01-31 08:00:00"',
  });

const SleepStageEventSchema = z.object({
  kind: z.literal('SleepStage'),
  start: TimestampSchema,
  end: TimestampSchema.optional(),
  value: z.string(),
  source: z.string().optional(),
});

function cardiacEventSchema<K extends CardiacKind>(kind: K) {
  return z.object({
    kind: z.literal(kind),
    start: TimestampSchema,
    end: TimestampSchema.optional(),
    value: z.union([z.number(), z.string()]).optional(),
    unit: z.string().optional(),
    source: z.string().optional(),
  });
}

const EventInputSchema = z.discriminatedUnion('kind', [
  SleepStageEventSchema,
  cardiacEventSchema('HeartRate'),
  cardiacEventSchema('RestingHeartRate'),
  cardiacEventSchema('HRV'),
]);

// POST /api/export body
export const ExportRequestSchema = z.object({
  events: z.array(EventInputSchema),
  daysBack: DaysBackSchema.optional(),
  now: ReferenceTimeSchema.optional(),
});

export const ExportQuerySchema = z.object({
  format: z.enum(['csv', 'json']).default('json'),
});

// CLI options after argument parsing; numbers arrive as strings
export const CliOptionsSchema = z.object({
  input: z.string().min(1, 'Input file is required'),
  days: z.coerce.number().pipe(DaysBackSchema),
  output: z.string().min(1),
  now: ReferenceTimeSchema.optional(),
});

export type EventInput = z.infer<typeof EventInputSchema>;
export type ValidatedCliOptions = z.infer<typeof CliOptionsSchema>;
