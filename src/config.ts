import 'dotenv/config';
import { z } from 'zod';

const must = (key: string): string => {
  const val = process.env[key];
  if (val) return val;
  if (process.env.NODE_ENV === 'test') {
    if (key === 'SUPABASE_URL') return 'http://localhost';
    return `test-${key}`;
  }
  throw new Error(`Missing env var: ${key}`);
};

const num = (key: string, fallback: number, schema = z.coerce.number().positive()): number => {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid numeric env var: ${key}=${raw}`);
  return parsed.data;
};

export const CONFIG = {
  supabaseUrl: () => must('SUPABASE_URL'),
  supabaseServiceKey: () => must('SUPABASE_SERVICE_ROLE_KEY'),
  athleteId: process.env.ATHLETE_ID || 'default',
  tz: process.env.TZ || 'Europe/Moscow',
  recomputeCron: process.env.RECOMPUTE_CRON || '15 3 * * *',
  calibration: {
    halfLifeDays: num('CALIBRATION_HALF_LIFE_DAYS', 30),
    minSamples: num('CALIBRATION_MIN_SAMPLES', 3, z.coerce.number().int().min(1)),
    minConfidence: num('CALIBRATION_MIN_CONFIDENCE', 0.5, z.coerce.number().min(0).max(1))
  }
} as const;
