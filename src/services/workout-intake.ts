import { v4 as uuidv4 } from 'uuid';
import type { PowerSample, TrackPoint, WorkoutRecord, WorkoutSignals } from '../domain/types.js';
import { AthleteThresholdsSchema, WorkoutObservationSchema, parseOrThrow } from '../domain/schemas.js';
import { intensityBandFor } from '../domain/calibration.js';
import type { ScalingProfile } from '../domain/scaling-profile.js';
import type { ScoreOptions } from '../engine/stress-scorer.js';
import { applyScaling, scoreWorkout } from '../engine/stress-scorer.js';
import type { MatchResult } from '../engine/matcher.js';
import { createRecord, reconcileObservation } from '../engine/fusion.js';
import { logInfo } from '../utils/logger.js';

// Raw streams a source may send alongside the summary
export interface WorkoutSamples {
  powerSamples?: PowerSample[];
  heartRateSamples?: number[];
  trackPoints?: TrackPoint[];
  totalDescentMeters?: number;
  perceivedIntensity?: number;
}

export interface IntakeOptions {
  thresholds: unknown;
  profile: ScalingProfile;
  samples?: WorkoutSamples;
  scoring?: ScoreOptions;
  now?: Date;
}

export interface IntakeResult {
  action: 'link' | 'enrich' | 'create';
  record: WorkoutRecord;
  match?: MatchResult<WorkoutRecord>;
}

/**
 * Validates an incoming workout and folds it into the known records: an
 * already linked source id is a no-op, a matching record is enriched, and
 * anything else becomes a new record scored with the learned factor.
 */
export function ingestObservation(raw: unknown, existing: WorkoutRecord[], options: IntakeOptions): IntakeResult {
  const observation = parseOrThrow(WorkoutObservationSchema, raw, 'workout observation');
  const thresholds = parseOrThrow(AthleteThresholdsSchema, options.thresholds, 'athlete thresholds');
  const now = options.now ?? new Date();

  const res = reconcileObservation(observation, existing, now);
  if (res.action === 'link') return { action: 'link', record: res.record };
  if (res.action === 'enrich') {
    logInfo('workout enriched', { id: res.record.id, source: observation.source, score: res.match.score });
    return { action: 'enrich', record: res.record, match: res.match };
  }

  const signals: WorkoutSignals = {
    activityCategory: observation.activityCategory,
    durationSeconds: observation.durationSeconds,
    distanceMeters: observation.distanceMeters,
    averagePower: observation.normalizedPower ?? observation.averagePower,
    averageHeartRate: observation.averageHeartRate,
    totalAscentMeters: observation.totalAscentMeters,
    ...options.samples
  };
  const scored = scoreWorkout(signals, thresholds, options.scoring);
  const stress = applyScaling(scored, options.profile, observation.activityCategory, intensityBandFor(scored.intensityFactor));
  const record = createRecord(uuidv4(), observation, stress);

  logInfo('workout created', {
    id: record.id,
    source: observation.source,
    method: stress.method,
    stress: stress.value,
    scaled: stress.scaling !== undefined
  });
  return { action: 'create', record };
}
