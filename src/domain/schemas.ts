import { z } from 'zod';
import { InvalidInputError } from './errors.js';

export const ActivityCategorySchema = z.enum(['run', 'bike', 'swim', 'strength', 'other']);
export const IntensityBandSchema = z.enum(['recovery', 'endurance', 'tempo', 'highIntensity']);
export const DerivationMethodSchema = z.enum(['direct', 'ctlDerived', 'atlDerived', 'crossValidated']);

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().min(0);
const unit = z.number().min(0).max(1);

export const WorkoutObservationSchema = z.object({
  sourceId: z.string().min(1),
  source: z.string().min(1),
  startTime: z.coerce.date(),
  durationSeconds: nonNegative,
  distanceMeters: nonNegative.optional(),
  activityCategory: ActivityCategorySchema,
  averageHeartRate: positive.optional(),
  maxHeartRate: positive.optional(),
  averagePower: nonNegative.optional(),
  normalizedPower: nonNegative.optional(),
  totalAscentMeters: nonNegative.optional(),
  title: z.string().optional(),
  route: z.string().optional()
});

export const AthleteThresholdsSchema = z.object({
  ftp: positive.optional(),
  runningFtp: positive.optional(),
  thresholdPace: positive.optional(),
  swimThresholdPace: positive.optional(),
  thresholdHeartRate: z.number().int().min(60).max(230).optional()
});

export const TextFragmentSchema = z.object({
  text: z.string(),
  confidence: unit,
  box: z.object({ x: unit, y: unit, width: unit, height: unit })
});

export const PmcValuesSchema = z.object({
  ctl: z.number().finite(),
  atl: z.number().finite(),
  tsb: z.number().finite()
});

export const GroundTruthImportSchema = z.object({
  workoutId: z.string().min(1),
  groundTruthStress: positive,
  groundTruthIntensityFactor: positive.optional(),
  pmc: PmcValuesSchema.optional(),
  matchConfidence: unit
});

export type GroundTruthImport = z.infer<typeof GroundTruthImportSchema>;

// Supabase rows

const FactorEntrySchema = z.object({ factor: z.number(), sampleCount: z.number().int().min(0) });

export const ScalingProfileRowSchema = z.object({
  athlete_id: z.string(),
  version: z.number().int(),
  global_factor: z.number(),
  global_confidence: z.number(),
  global_sample_count: z.number().int(),
  per_sport: z.record(ActivityCategorySchema, FactorEntrySchema).default({}),
  per_intensity_band: z.record(IntensityBandSchema, FactorEntrySchema).default({}),
  learning_enabled: z.boolean(),
  min_samples: z.number().int(),
  min_confidence: z.number(),
  factor_min: z.number(),
  factor_max: z.number(),
  updated_at: z.string()
});

export type ScalingProfileRow = z.infer<typeof ScalingProfileRowSchema>;

export const CalibrationPointRowSchema = z.object({
  id: z.string(),
  athlete_id: z.string(),
  effective_date: z.string(),
  created_at: z.string(),
  extracted_value: z.number(),
  calculated_value: z.number(),
  source_confidence: z.number(),
  activity_category: ActivityCategorySchema.nullable(),
  is_multi_sport: z.boolean(),
  intensity_factor: z.number().nullable(),
  intensity_band: IntensityBandSchema.nullable(),
  derivation_method: DerivationMethodSchema,
  is_valid: z.boolean(),
  invalid_reason: z.string().nullable(),
  calibration_record_id: z.string().nullable()
});

export type CalibrationPointRow = z.infer<typeof CalibrationPointRowSchema>;

export const DailyLoadRowSchema = z.object({
  athlete_id: z.string(),
  date: z.string(),
  ctl: z.number(),
  atl: z.number()
});

export const CalibrationRecordRowSchema = z.object({
  id: z.string(),
  athlete_id: z.string(),
  effective_date: z.string(),
  extracted_ctl: z.number().nullable(),
  extracted_atl: z.number().nullable(),
  extracted_tsb: z.number().nullable(),
  calculated_ctl: z.number(),
  calculated_atl: z.number(),
  calculated_tsb: z.number(),
  source_confidence: z.number(),
  source: z.enum(['screenshot', 'manual', 'import', 'initialSeed']),
  applied: z.boolean(),
  note: z.string().nullable()
});

export type CalibrationRecordRow = z.infer<typeof CalibrationRecordRowSchema>;

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what = 'input'): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new InvalidInputError(what, parsed.error.issues);
  return parsed.data;
}
