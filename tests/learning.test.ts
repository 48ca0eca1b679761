import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createDataPoints, recomputeProfile, stressFromDelta, weightedFactor } from '../src/engine/learning.js';
import type { DataPointInput } from '../src/engine/learning.js';
import type { CalibrationDataPoint } from '../src/domain/calibration.js';
import { createDefaultProfile } from '../src/domain/scaling-profile.js';

const now = new Date(2026, 2, 31, 12, 0);

const dp = (patch: Partial<CalibrationDataPoint> = {}): CalibrationDataPoint => ({
  id: 'p',
  effectiveDate: '2026-03-31',
  createdAt: now,
  extractedValue: 120,
  calculatedValue: 100,
  sourceConfidence: 1,
  isMultiSport: false,
  derivationMethod: 'direct',
  isValid: true,
  ...patch
});

const input = (patch: Partial<DataPointInput> = {}): DataPointInput => ({
  effectiveDate: '2026-03-31',
  calculatedDailyStress: 80,
  sourceConfidence: 0.9,
  isMultiSport: false,
  activityCategory: 'run',
  now,
  ...patch
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createDataPoints', () => {
  it('uses ground truth directly', () => {
    const [p, ...rest] = createDataPoints(input({ groundTruthStress: 110, intensityFactor: 0.8 }));
    expect(rest).toEqual([]);
    expect(p).toMatchObject({
      effectiveDate: '2026-03-31',
      extractedValue: 110,
      calculatedValue: 80,
      sourceConfidence: 0.9,
      activityCategory: 'run',
      intensityBand: 'endurance',
      derivationMethod: 'direct',
      isValid: true
    });
    expect(p.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('cross-validates when CTL and ATL agree', () => {
    const [p] = createDataPoints(input({ today: { ctl: 51, atl: 56 }, previous: { ctl: 50, atl: 50 } }));
    expect(p.derivationMethod).toBe('crossValidated');
    expect(p.extractedValue).toBeCloseTo(92, 10);
    expect(p.sourceConfidence).toBeCloseTo(0.9, 10);
  });

  it('falls back to the CTL derivation when they disagree', () => {
    const [p] = createDataPoints(input({ today: { ctl: 51, atl: 50 }, previous: { ctl: 50, atl: 50 } }));
    expect(p.derivationMethod).toBe('ctlDerived');
    expect(p.extractedValue).toBeCloseTo(92, 10);
    expect(p.sourceConfidence).toBeCloseTo(0.81, 10);
  });

  it('clamps a negative CTL derivation to zero', () => {
    const [p] = createDataPoints(input({ today: { ctl: 40, atl: 56 }, previous: { ctl: 50, atl: 50 } }));
    expect(p.derivationMethod).toBe('ctlDerived');
    expect(p.extractedValue).toBe(0);
  });

  it('drops the category of multi-sport days', () => {
    const [p] = createDataPoints(input({ groundTruthStress: 110, isMultiSport: true }));
    expect(p.activityCategory).toBeUndefined();
    expect(p.isMultiSport).toBe(true);
  });

  it('skips without calculated stress or a previous day', () => {
    expect(createDataPoints(input({ calculatedDailyStress: 0, groundTruthStress: 50 }))).toEqual([]);
    expect(createDataPoints(input({ today: { ctl: 51, atl: 56 }, previous: null }))).toEqual([]);
    expect(createDataPoints(input({ today: { ctl: 51 }, previous: { ctl: 50, atl: 50 } }))).toEqual([]);
  });

  it('inverts the load recurrence', () => {
    expect(stressFromDelta(51, 50, 42)).toBe(92);
  });
});

describe('weightedFactor', () => {
  it('learns a consistent ratio with full confidence', () => {
    const points = Array.from({ length: 10 }, (_, i) => dp({ id: `p${i}` }));
    const res = weightedFactor(points, now);
    expect(res.factor).toBeCloseTo(1.2, 10);
    expect(res.confidence).toBeCloseTo(1, 10);
    expect(res.count).toBe(10);
  });

  it('halves the weight of a point one half-life old', () => {
    const res = weightedFactor([dp({ extractedValue: 100 }), dp({ effectiveDate: '2026-03-01', extractedValue: 160 })], now, 30);
    expect(res.factor).toBeCloseTo(1.2, 10);
    expect(res.count).toBe(2);
    expect(res.confidence).toBeCloseTo(0.23, 10);
  });

  it('ignores unusable points', () => {
    const res = weightedFactor([dp({ isValid: false }), dp({ sourceConfidence: 0.4 }), dp({ calculatedValue: 0 })], now);
    expect(res).toEqual({ factor: 1, confidence: 0, count: 0 });
  });
});

describe('recomputeProfile', () => {
  it('returns the same snapshot when nothing is usable', () => {
    const profile = createDefaultProfile({ now });
    expect(recomputeProfile(profile, [dp({ isValid: false })], now)).toBe(profile);
  });

  it('learns global, per-sport and per-band factors', () => {
    const profile = { ...createDefaultProfile({ now }), perSport: { swim: { factor: 1.1, sampleCount: 4 } } };
    const points = [
      ...Array.from({ length: 4 }, () => dp({ activityCategory: 'run', intensityBand: 'endurance' })),
      ...Array.from({ length: 3 }, () => dp({ activityCategory: 'bike', intensityBand: 'highIntensity', extractedValue: 130 })),
      dp({ isMultiSport: true, activityCategory: 'run' })
    ];
    const next = recomputeProfile(profile, points, now);
    expect(next.version).toBe(1);
    expect(next.globalSampleCount).toBe(8);
    expect(next.perSport.run?.factor).toBeCloseTo(1.2, 10);
    expect(next.perSport.run?.sampleCount).toBe(4);
    expect(next.perSport.bike?.factor).toBeCloseTo(1.3, 10);
    expect(next.perSport.bike?.sampleCount).toBe(3);
    expect(next.perSport.swim).toEqual({ factor: 1.1, sampleCount: 4 });
    expect(next.perIntensityBand.endurance?.sampleCount).toBe(4);
    expect(next.perIntensityBand.highIntensity?.factor).toBeCloseTo(1.3, 10);
    expect(next.globalFactor).toBeCloseTo((5 * 1.2 + 3 * 1.3) / 8, 10);
    expect(next.updatedAt).toBe(now);
  });
});
