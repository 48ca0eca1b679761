import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ActivityCategory, DailyLoadPoint, LoadState, WorkoutRecord } from '../domain/types.js';
import type { CalibrationDataPoint, CalibrationRecord, PmcObservation } from '../domain/calibration.js';
import {
  CALIBRATION_DELTA_THRESHOLD,
  buildCalibrationRecord,
  hasLearningData,
  isTrustworthy,
  isValidObservation,
  needsCalibration
} from '../domain/calibration.js';
import { CalibrationError, InvalidParameterError } from '../domain/errors.js';
import { GroundTruthImportSchema, TextFragmentSchema, parseOrThrow } from '../domain/schemas.js';
import { parsePmcFragments } from '../engine/pmc-layout.js';
import type { CalibrationStore } from './calibration-store.js';
import type { LearningEngine } from './learning-engine.js';
import { toISO } from '../utils/dates.js';
import { logInfo, logWarn, logError } from '../utils/logger.js';

export interface DayWorkout {
  startTime: Date;
  stress: number;
  activityCategory: ActivityCategory;
}

export interface CalibrationContext {
  series: DailyLoadPoint[];
  workouts: DayWorkout[];
}

export interface CalibrationCheck {
  isNeeded: boolean;
  reason: string;
  ctlDelta?: number;
  atlDelta?: number;
  tsbDelta?: number;
}

const fmt = (v: number) => `${v >= 0 ? '+' : ''}${v.toFixed(1)}`;

export function loadOn(series: DailyLoadPoint[], date: string): DailyLoadPoint | undefined {
  let res: DailyLoadPoint | undefined;
  for (const p of series) {
    if (p.date <= date && (!res || p.date > res.date)) res = p;
  }
  return res;
}

export function primaryCategory(workouts: DayWorkout[]): { category?: ActivityCategory; isMultiSport: boolean } {
  if (!workouts.length) return { isMultiSport: false };

  const byCategory = new Map<ActivityCategory, number>();
  for (const w of workouts) byCategory.set(w.activityCategory, (byCategory.get(w.activityCategory) ?? 0) + w.stress);

  let category: ActivityCategory | undefined;
  let best = -Infinity;
  for (const [c, total] of byCategory) {
    if (total > best) {
      best = total;
      category = c;
    }
  }
  return { category, isMultiSport: byCategory.size > 1 };
}

export function checkCalibrationNeeded(observation: PmcObservation, current: LoadState | null): CalibrationCheck {
  if (!current) {
    return { isNeeded: true, reason: 'No existing load - initial calibration required' };
  }

  const ctlDelta = observation.ctl !== undefined ? observation.ctl - current.ctl : undefined;
  const atlDelta = observation.atl !== undefined ? observation.atl - current.atl : undefined;
  const tsbDelta = observation.tsb !== undefined ? observation.tsb - current.tsb : undefined;
  const over = (d?: number): d is number => d !== undefined && Math.abs(d) > CALIBRATION_DELTA_THRESHOLD;
  const isNeeded = [ctlDelta, atlDelta, tsbDelta].some(over);

  let reason = 'Values are within acceptable range of calculated load';
  if (isNeeded) {
    reason = 'Values differ significantly from calculated:';
    if (over(ctlDelta)) reason += ` CTL by ${Math.trunc(ctlDelta)}`;
    if (over(atlDelta)) reason += ` ATL by ${Math.trunc(atlDelta)}`;
  }
  return { isNeeded, reason, ctlDelta, atlDelta, tsbDelta };
}

// Shifts extracted values only, from the record's date forward
export function applyCalibration(record: CalibrationRecord, series: DailyLoadPoint[]): { record: CalibrationRecord; series: DailyLoadPoint[] } {
  if (!isTrustworthy(record)) throw new CalibrationError('lowConfidence');

  const ctlShift = record.extracted.ctl !== undefined ? record.deltas.ctl : 0;
  const atlShift = record.extracted.atl !== undefined ? record.deltas.atl : 0;

  const adjusted = series.map((p) => {
    if (p.date < record.effectiveDate) return p;
    const ctl = p.ctl + ctlShift;
    const atl = p.atl + atlShift;
    return { ...p, ctl, atl, tsb: ctl - atl };
  });

  return {
    record: { ...record, applied: true, note: `Applied delta: CTL ${fmt(record.deltas.ctl)}, ATL ${fmt(record.deltas.atl)}` },
    series: adjusted
  };
}

export interface CalibrationDeps {
  store: CalibrationStore;
  engine: LearningEngine;
  clock?: () => Date;
}

const today = (deps: CalibrationDeps) => toISO((deps.clock ?? (() => new Date()))());

export async function processObservation(
  deps: CalibrationDeps,
  observation: PmcObservation,
  context: CalibrationContext,
  source: 'screenshot' | 'manual' | 'import' = 'manual'
): Promise<CalibrationRecord> {
  if (!isValidObservation(observation)) throw new CalibrationError('noValuesFound');

  const effectiveDate = observation.effectiveDate ?? today(deps);
  const current = loadOn(context.series, effectiveDate);
  const record = buildCalibrationRecord({
    id: uuidv4(),
    effectiveDate,
    extracted: { ctl: observation.ctl, atl: observation.atl, tsb: observation.tsb },
    calculated: { ctl: current?.ctl ?? 0, atl: current?.atl ?? 0, tsb: current?.tsb ?? 0 },
    sourceConfidence: observation.confidence,
    source
  });

  await deps.store.saveRecord(record);
  if (observation.ctl !== undefined && observation.atl !== undefined) {
    await deps.store.putKnownLoad(effectiveDate, { ctl: observation.ctl, atl: observation.atl });
  }
  logInfo('calibration recorded', { id: record.id, date: effectiveDate, deltas: record.deltas, confidence: record.sourceConfidence });
  if (current && needsCalibration(record)) {
    logWarn('calculated load drifted from source', { id: record.id, date: effectiveDate, deltas: record.deltas });
  }

  if (hasLearningData(observation)) {
    await triggerLearning(deps.engine, { ...observation, effectiveDate }, record.id, context.workouts);
  }
  return record;
}

export async function processFragments(deps: CalibrationDeps, raw: unknown, context: CalibrationContext): Promise<CalibrationRecord> {
  const fragments = parseOrThrow(z.array(TextFragmentSchema), raw, 'text fragments');
  return processObservation(deps, parsePmcFragments(fragments), context, 'screenshot');
}

export async function importGroundTruth(deps: CalibrationDeps, raw: unknown, workouts: WorkoutRecord[]): Promise<CalibrationDataPoint[]> {
  const input = parseOrThrow(GroundTruthImportSchema, raw, 'ground truth import');
  const workout = workouts.find((w) => w.id === input.workoutId);
  if (!workout) throw new InvalidParameterError('workoutId', input.workoutId, `Workout not found: ${input.workoutId}`);

  if (input.pmc) {
    return deps.engine.recordCombinedCalibration(workout, input.groundTruthStress, input.groundTruthIntensityFactor, input.pmc, input.matchConfidence);
  }
  return deps.engine.recordDirectComparison(workout, input.groundTruthStress, input.groundTruthIntensityFactor, input.matchConfidence);
}

export async function applyStoredCalibration(
  deps: CalibrationDeps,
  record: CalibrationRecord,
  series: DailyLoadPoint[]
): Promise<{ record: CalibrationRecord; series: DailyLoadPoint[] }> {
  const res = applyCalibration(record, series);
  await deps.store.saveRecord(res.record);
  logInfo('calibration applied', { id: record.id, note: res.record.note });
  return res;
}

export async function createInitialSeed(deps: CalibrationDeps, ctl: number, atl: number, effectiveDate = today(deps)): Promise<CalibrationRecord> {
  const record: CalibrationRecord = {
    ...buildCalibrationRecord({
      id: uuidv4(),
      effectiveDate,
      extracted: { ctl, atl, tsb: ctl - atl },
      calculated: { ctl, atl, tsb: ctl - atl },
      sourceConfidence: 1,
      source: 'initialSeed'
    }),
    applied: true
  };
  await deps.store.saveRecord(record);
  await deps.store.putKnownLoad(effectiveDate, { ctl, atl });
  return record;
}

export function calibrationHistory(deps: CalibrationDeps): Promise<CalibrationRecord[]> {
  return deps.store.listRecords();
}

// Best effort: a failure is logged and the record stands
async function triggerLearning(engine: LearningEngine, observation: PmcObservation & { effectiveDate: string }, recordId: string, workouts: DayWorkout[]) {
  const day = workouts.filter((w) => toISO(w.startTime) === observation.effectiveDate);
  const calculatedDailyStress = day.reduce((s, w) => s + w.stress, 0);
  const { category, isMultiSport } = primaryCategory(day);

  try {
    await engine.processObservation({
      observation,
      calculatedDailyStress,
      activityCategory: category,
      isMultiSport,
      calibrationRecordId: recordId
    });
  } catch (err) {
    logError('calibration learning failed', { recordId, err });
  }
}
