import { v4 as uuidv4 } from 'uuid';
import type { ActivityCategory, IntensityBand } from '../domain/types.js';
import type { CalibrationDataPoint, DerivationMethod } from '../domain/calibration.js';
import { DEFAULT_HALF_LIFE_DAYS, intensityBandFor, isUsableForLearning, scalingRatio, timeWeight } from '../domain/calibration.js';
import type { FactorEntry, ScalingProfile } from '../domain/scaling-profile.js';
import { nextVersion } from '../domain/scaling-profile.js';
import { CTL_TAU, ATL_TAU } from './load-model.js';
import { logInfo } from '../utils/logger.js';

export const AGREEMENT_THRESHOLD = 0.8;
export const CTL_DERIVED_CONFIDENCE = 0.9;

const LEARNED_SPORTS: ActivityCategory[] = ['run', 'bike', 'swim'];
const BANDS: IntensityBand[] = ['recovery', 'endurance', 'tempo', 'highIntensity'];

export interface DataPointInput {
  effectiveDate: string;
  calculatedDailyStress: number;
  sourceConfidence: number;
  groundTruthStress?: number;
  today?: { ctl?: number; atl?: number };
  previous?: { ctl: number; atl: number } | null;
  activityCategory?: ActivityCategory;
  isMultiSport: boolean;
  intensityFactor?: number;
  calibrationRecordId?: string;
  now?: Date;
}

function point(input: DataPointInput, extractedValue: number, sourceConfidence: number, derivationMethod: DerivationMethod): CalibrationDataPoint {
  const intensityFactor = input.intensityFactor && input.intensityFactor > 0 ? input.intensityFactor : undefined;
  return {
    id: uuidv4(),
    effectiveDate: input.effectiveDate,
    createdAt: input.now ?? new Date(),
    extractedValue,
    calculatedValue: input.calculatedDailyStress,
    sourceConfidence,
    activityCategory: input.isMultiSport ? undefined : input.activityCategory,
    isMultiSport: input.isMultiSport,
    intensityFactor,
    intensityBand: intensityFactor !== undefined ? intensityBandFor(intensityFactor) : undefined,
    derivationMethod,
    isValid: true,
    calibrationRecordId: input.calibrationRecordId
  };
}

// Inverts the load recurrence: S = τ·(today − yesterday) + yesterday
export function stressFromDelta(today: number, previous: number, tau: number): number {
  return tau * (today - previous) + previous;
}

/**
 * Direct ground truth wins. Otherwise daily stress is recovered from the
 * day-over-day CTL and ATL change; when both agree the mean is used.
 */
export function createDataPoints(input: DataPointInput): CalibrationDataPoint[] {
  if (input.calculatedDailyStress <= 0) {
    logInfo('calibration-skip', { reason: 'no calculated stress', date: input.effectiveDate });
    return [];
  }

  if (input.groundTruthStress !== undefined && input.groundTruthStress > 0) {
    return [point(input, input.groundTruthStress, input.sourceConfidence, 'direct')];
  }

  const ctl = input.today?.ctl;
  const atl = input.today?.atl;
  if (ctl === undefined || atl === undefined || !input.previous) {
    logInfo('calibration-skip', { reason: 'no previous day load', date: input.effectiveDate });
    return [];
  }

  const fromCTL = stressFromDelta(ctl, input.previous.ctl, CTL_TAU);
  const fromATL = stressFromDelta(atl, input.previous.atl, ATL_TAU);

  if (fromCTL >= 0 && fromATL >= 0) {
    const mean = (fromCTL + fromATL) / 2;
    const agreement = mean > 0 ? 1 - Math.abs(fromCTL - fromATL) / mean : 0;
    if (agreement >= AGREEMENT_THRESHOLD) {
      return [point(input, mean, input.sourceConfidence * Math.min(1, agreement), 'crossValidated')];
    }
  }

  return [point(input, Math.max(0, fromCTL), input.sourceConfidence * CTL_DERIVED_CONFIDENCE, 'ctlDerived')];
}

function sampleVariance(values: number[]): number {
  if (values.length <= 1) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  return values.reduce((s, v) => s + (v - mean) ** 2, 0) / (values.length - 1);
}

export interface WeightedFactor {
  factor: number;
  confidence: number;
  count: number;
}

export function weightedFactor(points: CalibrationDataPoint[], now: Date, halfLifeDays = DEFAULT_HALF_LIFE_DAYS): WeightedFactor {
  const usable = points.filter(isUsableForLearning);
  if (!usable.length) return { factor: 1, confidence: 0, count: 0 };

  let weightedSum = 0;
  let totalWeight = 0;
  let timeWeights = 0;
  const ratios: number[] = [];

  for (const p of usable) {
    const ratio = scalingRatio(p);
    if (ratio === undefined) continue;
    const tw = timeWeight(p, now, halfLifeDays);
    const w = tw * p.sourceConfidence;
    weightedSum += ratio * w;
    totalWeight += w;
    timeWeights += tw;
    ratios.push(ratio);
  }

  const factor = totalWeight > 0 ? weightedSum / totalWeight : 1;
  const sampleScore = Math.min(1, usable.length / 10);
  const varianceScore = Math.max(0, 1 - Math.sqrt(sampleVariance(ratios)) / 0.3);
  const recencyScore = timeWeights / usable.length;

  return {
    factor,
    confidence: sampleScore * 0.4 + varianceScore * 0.4 + recencyScore * 0.2,
    count: usable.length
  };
}

function subsetFactors<K extends string>(
  keys: K[],
  points: CalibrationDataPoint[],
  keyOf: (p: CalibrationDataPoint) => K | undefined,
  prior: Partial<Record<K, FactorEntry>>,
  now: Date,
  halfLifeDays: number
): Partial<Record<K, FactorEntry>> {
  const res: Partial<Record<K, FactorEntry>> = { ...prior };
  for (const key of keys) {
    const subset = points.filter((p) => keyOf(p) === key);
    if (!subset.length) continue;
    const { factor, count } = weightedFactor(subset, now, halfLifeDays);
    res[key] = { factor, sampleCount: count };
  }
  return res;
}

export function recomputeProfile(profile: ScalingProfile, points: CalibrationDataPoint[], now = new Date(), halfLifeDays = DEFAULT_HALF_LIFE_DAYS): ScalingProfile {
  const usable = points.filter(isUsableForLearning);
  if (!usable.length) return profile;

  const global = weightedFactor(usable, now, halfLifeDays);
  const perSport = subsetFactors(
    LEARNED_SPORTS,
    usable,
    (p) => (p.isMultiSport ? undefined : p.activityCategory),
    profile.perSport,
    now,
    halfLifeDays
  );
  const perIntensityBand = subsetFactors(BANDS, usable, (p) => p.intensityBand, profile.perIntensityBand, now, halfLifeDays);

  return nextVersion(
    profile,
    {
      globalFactor: global.factor,
      globalConfidence: global.confidence,
      globalSampleCount: global.count,
      perSport,
      perIntensityBand
    },
    now
  );
}
