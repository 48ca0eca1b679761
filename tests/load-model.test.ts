import { describe, it, expect } from 'vitest';
import {
  acwr,
  advance,
  aggregateDailyStress,
  classifyAcwr,
  computeSeries,
  computeSeriesFromWorkouts,
  daysToTargetTSB,
  monotony,
  project,
  recommendForm,
  strain
} from '../src/engine/load-model.js';
import { InvalidParameterError } from '../src/domain/errors.js';
import { fromISO } from '../src/utils/dates.js';

describe('load model', () => {
  it('advances one day from zero', () => {
    const res = advance(0, 0, 50);
    expect(res.ctl).toBeCloseTo(50 / 42, 10);
    expect(res.atl).toBeCloseTo(50 / 7, 10);
    expect(res.tsb).toBeCloseTo(50 / 42 - 50 / 7, 10);
    expect(res.tsb).toBeCloseTo(-5.952, 3);
  });

  it('rejects non-positive time constants', () => {
    expect(() => advance(0, 0, 50, 0)).toThrow(InvalidParameterError);
    expect(() => advance(0, 0, 50, 42, -7)).toThrow(InvalidParameterError);
    expect(() => advance(0, 0, Number.NaN)).toThrow(InvalidParameterError);
  });

  it('rejects negative daily stress', () => {
    expect(() => advance(10, 10, -1)).toThrow(InvalidParameterError);
    expect(() => advance(10, 10, -1)).toThrow('Invalid parameter todayStress: -1');
    expect(() => computeSeries({ '2026-03-01': -5 }, fromISO('2026-03-01'), fromISO('2026-03-01'))).toThrow(InvalidParameterError);
    expect(advance(10, 10, 0).ctl).toBeCloseTo(10 * (41 / 42), 10);
  });

  it('decays toward zero without overshooting when no stress is logged', () => {
    const series = computeSeries({}, fromISO('2026-03-01'), fromISO('2026-06-30'), 80, 95);
    let prev = { ctl: 80, atl: 95 };
    for (const p of series) {
      expect(p.ctl).toBeLessThan(prev.ctl);
      expect(p.atl).toBeLessThan(prev.atl);
      expect(p.ctl).toBeGreaterThan(0);
      expect(p.atl).toBeGreaterThan(0);
      prev = p;
    }
    expect(series.at(-1)?.ctl).toBeCloseTo(80 * (41 / 42) ** series.length, 10);
  });

  it('follows a single hard day through the following week', () => {
    const stress = [50, 0, 0, 0, 0, 0, 0];
    const byDate: Record<string, number> = {};
    stress.forEach((v, i) => {
      byDate[`2026-03-0${i + 1}`] = v;
    });
    const series = computeSeries(byDate, fromISO('2026-03-01'), fromISO('2026-03-07'));
    expect(series).toHaveLength(7);
    series.forEach((p, i) => {
      const ctl = (50 / 42) * (41 / 42) ** i;
      const atl = (50 / 7) * (6 / 7) ** i;
      expect(p.date).toBe(`2026-03-0${i + 1}`);
      expect(p.dailyStress).toBe(stress[i]);
      expect(p.ctl).toBeCloseTo(ctl, 10);
      expect(p.atl).toBeCloseTo(atl, 10);
      expect(p.tsb).toBeCloseTo(ctl - atl, 10);
    });
    expect(series[6].ctl).toBeCloseTo(1.03, 2);
    expect(series[6].atl).toBeCloseTo(2.83, 2);
  });

  it('fills missing days with zero stress and keeps tsb = ctl - atl', () => {
    const series = computeSeries({ '2026-03-01': 50 }, fromISO('2026-03-01'), fromISO('2026-03-05'));
    expect(series.map((p) => p.date)).toEqual(['2026-03-01', '2026-03-02', '2026-03-03', '2026-03-04', '2026-03-05']);
    expect(series[0].ctl).toBeCloseTo(1.1905, 4);
    expect(series[0].atl).toBeCloseTo(7.1429, 4);
    expect(series[1].dailyStress).toBe(0);
    expect(series[1].ctl).toBeCloseTo((50 / 42) * (41 / 42), 10);
    for (const p of series) expect(p.tsb).toBe(p.ctl - p.atl);
  });

  it('returns an empty series when start is after end', () => {
    expect(computeSeries({}, fromISO('2026-03-05'), fromISO('2026-03-01'))).toEqual([]);
  });

  it('is monotone in daily stress', () => {
    const start = fromISO('2026-01-01');
    const end = fromISO('2026-01-20');
    const low = computeSeries({ '2026-01-05': 40, '2026-01-10': 60 }, start, end);
    const high = computeSeries({ '2026-01-05': 80, '2026-01-10': 60 }, start, end);
    low.forEach((p, i) => {
      expect(high[i].ctl).toBeGreaterThanOrEqual(p.ctl);
      expect(high[i].atl).toBeGreaterThanOrEqual(p.atl);
    });
  });

  it('converges to a constant load', () => {
    const stress: Record<string, number> = {};
    const start = fromISO('2025-01-01');
    const end = fromISO('2025-12-31');
    for (const p of computeSeries({}, start, end)) stress[p.date] = 100;
    const series = computeSeries(stress, start, end);
    const last = series[series.length - 1];
    expect(last.ctl).toBeCloseTo(100, 1);
    expect(last.atl).toBeCloseTo(100, 5);
  });

  it('sums workouts per day', () => {
    const workouts = [
      { startTime: new Date(2026, 2, 1, 7, 0), stress: 30 },
      { startTime: new Date(2026, 2, 1, 18, 0), stress: 20 },
      { startTime: new Date(2026, 2, 3, 9, 0), stress: 40 }
    ];
    expect(aggregateDailyStress(workouts)).toEqual({ '2026-03-01': 50, '2026-03-03': 40 });
    const series = computeSeriesFromWorkouts(workouts, fromISO('2026-03-01'), fromISO('2026-03-03'));
    expect(series[0].dailyStress).toBe(50);
    expect(series[2].dailyStress).toBe(40);
  });

  it('projects from the day after the reference', () => {
    const res = project(50, 60, [100, 0], new Date(2026, 2, 10, 15, 0));
    expect(res.map((p) => p.date)).toEqual(['2026-03-11', '2026-03-12']);
    expect(res[0].ctl).toBeCloseTo(50 + 50 / 42, 10);
    expect(res[0].atl).toBeCloseTo(60 + 40 / 7, 10);
  });

  it('counts rest days until form reaches a target', () => {
    expect(daysToTargetTSB(50, 70, 0)).toBe(3);
    expect(daysToTargetTSB(50, 70, 100)).toBeNull();
    expect(daysToTargetTSB(50, 70, 0, 0)).toBeNull();
  });
});

describe('load analysis', () => {
  it('computes and classifies ACWR', () => {
    expect(acwr(0, 10)).toBeNull();
    expect(acwr(50, 60)).toBeCloseTo(1.2, 10);
    expect(classifyAcwr(null)).toBe('unknown');
    expect(classifyAcwr(1.3)).toBe('optimal');
    expect(classifyAcwr(0.8)).toBe('optimal');
    expect(classifyAcwr(1.4)).toBe('caution');
    expect(classifyAcwr(1.5)).toBe('highRisk');
    expect(classifyAcwr(0.6)).toBe('undertraining');
    expect(classifyAcwr(0.3)).toBe('veryLow');
  });

  it('computes monotony and strain over the last week', () => {
    const week = [50, 150, 50, 150, 50, 150, 100];
    const expected = 100 / Math.sqrt(15000 / 7);
    expect(monotony(week)).toBeCloseTo(expected, 10);
    expect(monotony([999, ...week])).toBeCloseTo(expected, 10);
    expect(strain(week)).toBeCloseTo(700 * expected, 8);
  });

  it('has no monotony without a full varied week', () => {
    expect(monotony([10, 20, 30])).toBeNull();
    expect(monotony([0, 0, 0, 0, 0, 0, 0])).toBeNull();
    expect(monotony([80, 80, 80, 80, 80, 80, 80])).toBeNull();
    expect(strain([80, 80, 80, 80, 80, 80, 80])).toBeNull();
  });

  it('maps form to a readiness band', () => {
    expect(recommendForm(25).status).toBe('veryFresh');
    expect(recommendForm(24.9).status).toBe('fresh');
    expect(recommendForm(-10).status).toBe('neutral');
    expect(recommendForm(-10.1).status).toBe('tired');
    expect(recommendForm(-25).status).toBe('tired');
    expect(recommendForm(-25.1)).toEqual({
      status: 'veryTired',
      recommendation: 'Very fatigued: rest or active recovery only',
      suggestedStress: { min: 0, max: 30 }
    });
  });
});
