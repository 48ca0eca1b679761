import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ingestObservation } from '../src/services/workout-intake.js';
import { createDefaultProfile } from '../src/domain/scaling-profile.js';
import type { ScalingProfile } from '../src/domain/scaling-profile.js';
import type { WorkoutRecord } from '../src/domain/types.js';
import { InvalidInputError } from '../src/domain/errors.js';

const now = new Date(2026, 2, 12, 18, 0);
const neutral = createDefaultProfile({ now });
const learned: ScalingProfile = { ...neutral, globalFactor: 1.2, globalConfidence: 0.8, globalSampleCount: 5 };

const raw = {
  sourceId: 'g1',
  source: 'garmin',
  startTime: '2026-03-10T07:30:00',
  durationSeconds: 3000,
  distanceMeters: 10000,
  activityCategory: 'run'
};

const existing = (patch: Partial<WorkoutRecord> = {}): WorkoutRecord => ({
  id: 'w1',
  startTime: new Date(2026, 2, 10, 7, 30),
  durationSeconds: 3000,
  activityCategory: 'run',
  stress: 80,
  stressMethod: 'heartRate',
  intensityFactor: 0.9,
  linkedSources: { health: 'h1' },
  ...patch
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ingestObservation', () => {
  it('creates and scores a new workout', () => {
    const res = ingestObservation(raw, [], { thresholds: { thresholdPace: 300 }, profile: neutral, now });
    expect(res.action).toBe('create');
    expect(res.record).toMatchObject({
      startTime: new Date(2026, 2, 10, 7, 30),
      stressMethod: 'pace',
      intensityFactor: 1,
      linkedSources: { garmin: 'g1' }
    });
    expect(res.record.stress).toBeCloseTo(83.333, 3);
    expect(res.record.unscaledStress).toBeUndefined();
  });

  it('applies the learned factor and keeps the calculated value', () => {
    const res = ingestObservation(raw, [], { thresholds: { thresholdPace: 300 }, profile: learned, now });
    expect(res.record.stress).toBeCloseTo(100, 10);
    expect(res.record.unscaledStress).toBeCloseTo(83.333, 3);
  });

  it('scores power streams sent with the summary', () => {
    const powerSamples = Array.from({ length: 61 }, (_, i) => ({ timestamp: i, watts: 250 }));
    const res = ingestObservation(
      { ...raw, activityCategory: 'bike', durationSeconds: 3600, distanceMeters: undefined },
      [],
      { thresholds: { ftp: 250 }, profile: neutral, samples: { powerSamples }, now }
    );
    expect(res.record.stressMethod).toBe('power');
    expect(res.record.stress).toBeCloseTo(100, 10);
    expect(res.record.normalizedPower).toBeCloseTo(250, 10);
  });

  it('links a source id seen before', () => {
    const record = existing({ linkedSources: { garmin: 'g1' } });
    expect(ingestObservation(raw, [record], { thresholds: {}, profile: neutral, now })).toEqual({ action: 'link', record });
  });

  it('enriches a matching record', () => {
    const res = ingestObservation({ ...raw, title: 'Tempo' }, [existing()], { thresholds: {}, profile: neutral, now });
    expect(res.action).toBe('enrich');
    expect(res.record).toMatchObject({ id: 'w1', title: 'Tempo', stress: 80, distanceMeters: 10000 });
    expect(res.match?.score).toBe(105);
  });

  it('rejects malformed input', () => {
    expect(() => ingestObservation({ ...raw, durationSeconds: -1 }, [], { thresholds: {}, profile: neutral, now })).toThrow(InvalidInputError);
    expect(() => ingestObservation(raw, [], { thresholds: { thresholdHeartRate: 300 }, profile: neutral, now })).toThrow(
      'Invalid athlete thresholds: thresholdHeartRate'
    );
  });
});
