import type { DailyLoadPoint, LoadState } from '../domain/types.js';
import { InvalidParameterError } from '../domain/errors.js';
import { addDays, eachDay, startOfDay, toISO } from '../utils/dates.js';

export const CTL_TAU = 42;
export const ATL_TAU = 7;

export interface LoadModelOptions {
  ctlTau?: number;
  atlTau?: number;
}

function assertFinite(parameter: string, value: number) {
  if (!Number.isFinite(value)) throw new InvalidParameterError(parameter, value);
}

function assertStress(value: number) {
  if (!Number.isFinite(value) || value < 0) throw new InvalidParameterError('todayStress', value);
}

function assertTau(parameter: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) throw new InvalidParameterError(parameter, value);
}

export function advance(previousCTL: number, previousATL: number, todayStress: number, ctlTau = CTL_TAU, atlTau = ATL_TAU): LoadState {
  assertTau('ctlTau', ctlTau);
  assertTau('atlTau', atlTau);
  assertFinite('previousCTL', previousCTL);
  assertFinite('previousATL', previousATL);
  assertStress(todayStress);

  const ctl = previousCTL + (todayStress - previousCTL) / ctlTau;
  const atl = previousATL + (todayStress - previousATL) / atlTau;
  return { ctl, atl, tsb: ctl - atl };
}

export function computeSeries(
  dailyStressByDate: Record<string, number>,
  start: Date,
  end: Date,
  initialCTL = 0,
  initialATL = 0,
  options: LoadModelOptions = {}
): DailyLoadPoint[] {
  const { ctlTau = CTL_TAU, atlTau = ATL_TAU } = options;
  assertTau('ctlTau', ctlTau);
  assertTau('atlTau', atlTau);

  const days = eachDay(start, end);
  const { points } = days.reduce(
    (acc, date) => {
      const stress = dailyStressByDate[date] ?? 0;
      const next = advance(acc.ctl, acc.atl, stress, ctlTau, atlTau);
      acc.points.push({ date, dailyStress: stress, ...next });
      return { ctl: next.ctl, atl: next.atl, points: acc.points };
    },
    { ctl: initialCTL, atl: initialATL, points: [] as DailyLoadPoint[] }
  );
  return points;
}

export function aggregateDailyStress(workouts: Array<{ startTime: Date; stress: number }>): Record<string, number> {
  const res: Record<string, number> = {};
  for (const w of workouts) {
    const day = toISO(w.startTime);
    res[day] = (res[day] ?? 0) + w.stress;
  }
  return res;
}

export function computeSeriesFromWorkouts(
  workouts: Array<{ startTime: Date; stress: number }>,
  start: Date,
  end: Date,
  initialCTL = 0,
  initialATL = 0,
  options: LoadModelOptions = {}
): DailyLoadPoint[] {
  return computeSeries(aggregateDailyStress(workouts), start, end, initialCTL, initialATL, options);
}

// One point per planned day, starting the day after `from`
export function project(
  currentCTL: number,
  currentATL: number,
  plannedStress: number[],
  from = new Date(),
  options: LoadModelOptions = {}
): DailyLoadPoint[] {
  const { ctlTau = CTL_TAU, atlTau = ATL_TAU } = options;
  const res: DailyLoadPoint[] = [];
  let ctl = currentCTL;
  let atl = currentATL;
  let date = startOfDay(from);

  for (const stress of plannedStress) {
    date = addDays(date, 1);
    const next = advance(ctl, atl, stress, ctlTau, atlTau);
    ctl = next.ctl;
    atl = next.atl;
    res.push({ date: toISO(date), dailyStress: stress, ...next });
  }
  return res;
}

// Rest days needed for form to reach `targetTSB`, or null within `maxDays`
export function daysToTargetTSB(currentCTL: number, currentATL: number, targetTSB: number, maxDays = 30): number | null {
  let ctl = currentCTL;
  let atl = currentATL;
  for (let day = 1; day <= maxDays; day++) {
    const next = advance(ctl, atl, 0);
    ctl = next.ctl;
    atl = next.atl;
    if (next.tsb >= targetTSB) return day;
  }
  return null;
}

// Load analysis

export type AcwrStatus = 'optimal' | 'undertraining' | 'caution' | 'highRisk' | 'veryLow' | 'unknown';

export function acwr(ctl: number, atl: number): number | null {
  if (ctl <= 0) return null;
  return atl / ctl;
}

export function classifyAcwr(ratio: number | null): AcwrStatus {
  if (ratio === null) return 'unknown';
  if (ratio >= 0.8 && ratio <= 1.3) return 'optimal';
  if (ratio >= 0.5 && ratio < 0.8) return 'undertraining';
  if (ratio > 1.3 && ratio < 1.5) return 'caution';
  if (ratio >= 1.5) return 'highRisk';
  return 'veryLow';
}

export function monotony(dailyStress: number[]): number | null {
  if (dailyStress.length < 7) return null;
  const week = dailyStress.slice(-7);
  const mean = week.reduce((s, v) => s + v, 0) / 7;
  if (mean <= 0) return null;
  const variance = week.reduce((s, v) => s + (v - mean) ** 2, 0) / 7;
  const stdDev = Math.sqrt(variance);
  if (stdDev === 0) return null;
  return mean / stdDev;
}

export function strain(dailyStress: number[]): number | null {
  const m = monotony(dailyStress);
  if (m === null) return null;
  const weekSum = dailyStress.slice(-7).reduce((s, v) => s + v, 0);
  return weekSum * m;
}

export type FormStatus = 'veryFresh' | 'fresh' | 'neutral' | 'tired' | 'veryTired';

export interface FormRecommendation {
  status: FormStatus;
  recommendation: string;
  suggestedStress: { min: number; max: number };
}

export function recommendForm(tsb: number): FormRecommendation {
  if (tsb >= 25) {
    return { status: 'veryFresh', recommendation: 'Very fresh: good day for high intensity or racing', suggestedStress: { min: 80, max: 150 } };
  }
  if (tsb >= 10) {
    return { status: 'fresh', recommendation: 'Fresh: quality training or competition', suggestedStress: { min: 60, max: 120 } };
  }
  if (tsb >= -10) {
    return { status: 'neutral', recommendation: 'Balanced: normal training load', suggestedStress: { min: 40, max: 100 } };
  }
  if (tsb >= -25) {
    return { status: 'tired', recommendation: 'Fatigued: easier training or rest', suggestedStress: { min: 20, max: 60 } };
  }
  return { status: 'veryTired', recommendation: 'Very fatigued: rest or active recovery only', suggestedStress: { min: 0, max: 30 } };
}
