import type { StressResult, WorkoutObservation, WorkoutRecord } from '../domain/types.js';
import type { MatchResult } from './matcher.js';
import { findBestMatch, hasImpreciseTime } from './matcher.js';
import { toISO } from '../utils/dates.js';

export type Reconciliation =
  | { action: 'link'; record: WorkoutRecord }
  | { action: 'enrich'; record: WorkoutRecord; match: MatchResult<WorkoutRecord> }
  | { action: 'create' };

export function reconcileObservation(observation: WorkoutObservation, existing: WorkoutRecord[], now = new Date()): Reconciliation {
  const linked = existing.find((r) => r.linkedSources[observation.source] === observation.sourceId);
  if (linked) return { action: 'link', record: linked };

  // a record already carrying another id from this source is a different activity
  const pool = existing.filter((r) => r.linkedSources[observation.source] === undefined);
  const match = findBestMatch(observation, pool, { now });
  if (match) return { action: 'enrich', record: enrichRecord(match.candidate, observation, now), match };
  return { action: 'create' };
}

// Source-provided descriptive fields win; measured fields only fill gaps. Stress is left as is
export function enrichRecord(record: WorkoutRecord, observation: WorkoutObservation, now = new Date()): WorkoutRecord {
  const res: WorkoutRecord = {
    ...record,
    linkedSources: { ...record.linkedSources, [observation.source]: observation.sourceId },
    averageHeartRate: record.averageHeartRate ?? observation.averageHeartRate,
    maxHeartRate: record.maxHeartRate ?? observation.maxHeartRate,
    averagePower: record.averagePower ?? observation.averagePower,
    normalizedPower: record.normalizedPower ?? observation.normalizedPower,
    totalAscentMeters: record.totalAscentMeters ?? observation.totalAscentMeters,
    distanceMeters: record.distanceMeters ?? observation.distanceMeters
  };

  if (observation.title) res.title = observation.title;
  if (!hasImpreciseTime(observation.startTime, now)) res.startTime = observation.startTime;
  if (observation.route) res.route = observation.route;
  return res;
}

export function createRecord(id: string, observation: WorkoutObservation, stress: StressResult): WorkoutRecord {
  return {
    id,
    startTime: observation.startTime,
    durationSeconds: observation.durationSeconds,
    activityCategory: observation.activityCategory,
    distanceMeters: observation.distanceMeters,
    averageHeartRate: observation.averageHeartRate,
    maxHeartRate: observation.maxHeartRate,
    averagePower: observation.averagePower,
    normalizedPower: observation.normalizedPower ?? stress.normalizedPower,
    totalAscentMeters: observation.totalAscentMeters,
    title: observation.title,
    route: observation.route,
    stress: stress.value,
    unscaledStress: stress.scaling?.preScalingValue,
    stressMethod: stress.method,
    intensityFactor: stress.intensityFactor,
    linkedSources: { [observation.source]: observation.sourceId }
  };
}

export function dedupKey(day: string, category: string, durationSeconds: number): string {
  return `${day}_${category}_${Math.trunc(durationSeconds)}`;
}

function keyOf(w: { startTime: Date; activityCategory: string; durationSeconds: number }) {
  return dedupKey(toISO(w.startTime), w.activityCategory, w.durationSeconds);
}

// Splits a bulk import into new entries and ones already present (or repeated within the batch)
export function partitionDuplicates<T extends { startTime: Date; activityCategory: string; durationSeconds: number }>(
  incoming: T[],
  existing: Array<{ startTime: Date; activityCategory: string; durationSeconds: number }>
): { fresh: T[]; duplicates: T[] } {
  const seen = new Set(existing.map(keyOf));
  const fresh: T[] = [];
  const duplicates: T[] = [];
  for (const item of incoming) {
    const key = keyOf(item);
    if (seen.has(key)) {
      duplicates.push(item);
      continue;
    }
    seen.add(key);
    fresh.push(item);
  }
  return { fresh, duplicates };
}
