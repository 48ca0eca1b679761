import type { ActivityCategory, IntensityBand, LoadState } from './types.js';
import { dayDiff, fromISO } from '../utils/dates.js';

export type DerivationMethod = 'direct' | 'ctlDerived' | 'atlDerived' | 'crossValidated';

export type CalibrationSource = 'screenshot' | 'manual' | 'import' | 'initialSeed';

export interface CalibrationDataPoint {
  id: string;
  effectiveDate: string;
  createdAt: Date;
  extractedValue: number;
  calculatedValue: number;
  sourceConfidence: number;
  activityCategory?: ActivityCategory;
  isMultiSport: boolean;
  intensityFactor?: number;
  intensityBand?: IntensityBand;
  derivationMethod: DerivationMethod;
  isValid: boolean;
  invalidReason?: string;
  calibrationRecordId?: string;
}

export interface PmcValues {
  ctl?: number;
  atl?: number;
  tsb?: number;
}

export interface CalibrationRecord {
  id: string;
  effectiveDate: string;
  extracted: PmcValues;
  calculated: LoadState;
  deltas: LoadState;
  sourceConfidence: number;
  source: CalibrationSource;
  applied: boolean;
  note?: string;
}

export interface PmcObservation extends PmcValues {
  effectiveDate?: string;
  dailyStress?: number;
  weeklyStress?: number;
  confidence: number;
  rawText: string;
}

export const DEFAULT_HALF_LIFE_DAYS = 30;
export const MIN_SOURCE_CONFIDENCE = 0.5;
export const TRUSTWORTHY_CONFIDENCE = 0.7;
export const CALIBRATION_DELTA_THRESHOLD = 5;

export function intensityBandFor(intensityFactor: number): IntensityBand {
  if (intensityFactor < 0.75) return 'recovery';
  if (intensityFactor < 0.9) return 'endurance';
  if (intensityFactor < 1.05) return 'tempo';
  return 'highIntensity';
}

export function scalingRatio(point: CalibrationDataPoint): number | undefined {
  if (point.calculatedValue <= 0) return undefined;
  return point.extractedValue / point.calculatedValue;
}

export function ageInDays(point: CalibrationDataPoint, now: Date): number {
  return Math.max(0, dayDiff(fromISO(point.effectiveDate), now));
}

export function timeWeight(point: CalibrationDataPoint, now: Date, halfLifeDays = DEFAULT_HALF_LIFE_DAYS): number {
  return Math.pow(0.5, ageInDays(point, now) / halfLifeDays);
}

export function learningWeight(point: CalibrationDataPoint, now: Date, halfLifeDays = DEFAULT_HALF_LIFE_DAYS): number {
  return timeWeight(point, now, halfLifeDays) * point.sourceConfidence;
}

export function isUsableForLearning(point: CalibrationDataPoint): boolean {
  return (
    point.isValid &&
    scalingRatio(point) !== undefined &&
    point.sourceConfidence >= MIN_SOURCE_CONFIDENCE &&
    point.calculatedValue > 0
  );
}

export function invalidate(point: CalibrationDataPoint, reason: string): CalibrationDataPoint {
  return { ...point, isValid: false, invalidReason: reason };
}

// Record helpers

// Missing extracted values count as agreeing with the local one
export function deltasOf(extracted: PmcValues, calculated: LoadState): LoadState {
  return {
    ctl: (extracted.ctl ?? calculated.ctl) - calculated.ctl,
    atl: (extracted.atl ?? calculated.atl) - calculated.atl,
    tsb: (extracted.tsb ?? calculated.tsb) - calculated.tsb
  };
}

export function buildCalibrationRecord(params: {
  id: string;
  effectiveDate: string;
  extracted: PmcValues;
  calculated: LoadState;
  sourceConfidence: number;
  source: CalibrationSource;
  note?: string;
}): CalibrationRecord {
  const { extracted, calculated } = params;
  return {
    id: params.id,
    effectiveDate: params.effectiveDate,
    extracted: { ...extracted },
    calculated: { ...calculated },
    deltas: deltasOf(extracted, calculated),
    sourceConfidence: params.sourceConfidence,
    source: params.source,
    applied: false,
    note: params.note
  };
}

export function hasExtractedValues(record: CalibrationRecord): boolean {
  const { ctl, atl, tsb } = record.extracted;
  return ctl !== undefined || atl !== undefined || tsb !== undefined;
}

export function isTrustworthy(record: CalibrationRecord): boolean {
  return record.sourceConfidence >= TRUSTWORTHY_CONFIDENCE && hasExtractedValues(record);
}

export function needsCalibration(record: CalibrationRecord): boolean {
  const { ctl, atl, tsb } = record.deltas;
  return [ctl, atl, tsb].some((d) => Math.abs(d) > CALIBRATION_DELTA_THRESHOLD);
}

export function isValidObservation(obs: PmcObservation): boolean {
  return obs.confidence >= MIN_SOURCE_CONFIDENCE && (obs.ctl !== undefined || obs.atl !== undefined || obs.tsb !== undefined);
}

export function hasLearningData(obs: PmcObservation): boolean {
  return obs.dailyStress !== undefined || (obs.ctl !== undefined && obs.atl !== undefined);
}
