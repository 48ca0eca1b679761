import type { ActivityCategory, AthleteThresholds, IntensityBand, StressMethod, StressResult, WorkoutSignals } from '../domain/types.js';
import type { ScalingProfile } from '../domain/scaling-profile.js';
import { canApplyScaling, selectFactor } from '../domain/scaling-profile.js';
import { normalizedGradedPace, normalizedGradedPaceFromTotals, normalizedPower } from './intensity.js';
import { paceFromDistance, swimPaceFromDistance } from '../utils/pace.js';

export const DEFAULT_PERCEIVED_INTENSITY: Record<ActivityCategory, number> = {
  run: 0.7,
  bike: 0.65,
  swim: 0.7,
  strength: 0.6,
  other: 0.5
};

const zero = (method: StressMethod): StressResult => ({ value: 0, method, intensityFactor: 0 });

// hours × IF² × 100: one hour at threshold is 100
function fromIntensity(durationSeconds: number, intensityFactor: number): number {
  return (durationSeconds / 3600) * intensityFactor ** 2 * 100;
}

export function powerStress(normalizedPowerWatts: number, durationSeconds: number, ftp: number): StressResult {
  if (ftp <= 0 || durationSeconds <= 0 || normalizedPowerWatts <= 0) return zero('power');
  const intensityFactor = normalizedPowerWatts / ftp;
  return {
    value: (durationSeconds * normalizedPowerWatts * intensityFactor) / (ftp * 3600) * 100,
    method: 'power',
    intensityFactor,
    normalizedPower: normalizedPowerWatts
  };
}

export function runningPowerStress(normalizedPowerWatts: number, durationSeconds: number, runningFtp: number): StressResult {
  const res = powerStress(normalizedPowerWatts, durationSeconds, runningFtp);
  return { ...res, method: 'runningPower' };
}

// Pace in seconds per unit (km for running, 100 m for swimming); faster than threshold means IF > 1
export function paceStress(actualPace: number, durationSeconds: number, thresholdPace: number): StressResult {
  if (thresholdPace <= 0 || durationSeconds <= 0 || actualPace <= 0) return zero('pace');
  const intensityFactor = thresholdPace / actualPace;
  return {
    value: fromIntensity(durationSeconds, intensityFactor),
    method: 'pace',
    intensityFactor,
    normalizedPace: actualPace
  };
}

export function heartRateStress(averageHeartRate: number, durationSeconds: number, thresholdHeartRate: number): StressResult {
  if (thresholdHeartRate <= 0 || durationSeconds <= 0 || averageHeartRate <= 0) return zero('heartRate');
  const intensityFactor = averageHeartRate / thresholdHeartRate;
  return {
    value: fromIntensity(durationSeconds, intensityFactor),
    method: 'heartRate',
    intensityFactor,
    averageHeartRate
  };
}

export function estimateStress(durationSeconds: number, perceivedIntensity: number): StressResult {
  if (durationSeconds <= 0) return zero('estimated');
  const p = Math.max(0, Math.min(1, perceivedIntensity));
  const intensityFactor = 0.5 + p * 0.6;
  return { value: fromIntensity(durationSeconds, intensityFactor), method: 'estimated', intensityFactor };
}

function workoutPower(signals: WorkoutSignals): number | undefined {
  const np = signals.powerSamples?.length ? normalizedPower(signals.powerSamples) : undefined;
  if (np !== undefined) return np;
  if (signals.averagePower && signals.averagePower > 0) return signals.averagePower;
  if (signals.powerSamples?.length) {
    return signals.powerSamples.reduce((s, p) => s + p.watts, 0) / signals.powerSamples.length;
  }
  return undefined;
}

function runningPace(signals: WorkoutSignals): number | undefined {
  const avgPace = paceFromDistance(signals.durationSeconds, signals.distanceMeters);
  if (avgPace === undefined) return undefined;

  const fromTrack = signals.trackPoints ? normalizedGradedPace(signals.trackPoints) : undefined;
  if (fromTrack !== undefined) return fromTrack;

  if (signals.totalAscentMeters !== undefined || signals.totalDescentMeters !== undefined) {
    const fromTotals = normalizedGradedPaceFromTotals(
      avgPace,
      signals.durationSeconds,
      signals.totalAscentMeters ?? 0,
      signals.totalDescentMeters ?? 0,
      signals.distanceMeters ?? 0
    );
    if (fromTotals !== undefined) return fromTotals;
  }
  return avgPace;
}

function averageHeartRate(signals: WorkoutSignals): number | undefined {
  if (signals.averageHeartRate && signals.averageHeartRate > 0) return signals.averageHeartRate;
  const samples = signals.heartRateSamples ?? [];
  if (!samples.length) return undefined;
  return samples.reduce((s, v) => s + v, 0) / samples.length;
}

export interface ScoreOptions {
  perceivedIntensity?: Partial<Record<ActivityCategory, number>>;
}

export function scoreWorkout(signals: WorkoutSignals, thresholds: AthleteThresholds, options: ScoreOptions = {}): StressResult {
  const { activityCategory: category, durationSeconds } = signals;

  if (category === 'bike' && thresholds.ftp) {
    const watts = workoutPower(signals);
    if (watts !== undefined) return powerStress(watts, durationSeconds, thresholds.ftp);
  }
  if (category === 'run' && thresholds.runningFtp) {
    const watts = workoutPower(signals);
    if (watts !== undefined) return runningPowerStress(watts, durationSeconds, thresholds.runningFtp);
  }

  if (category === 'run' && thresholds.thresholdPace) {
    const pace = runningPace(signals);
    if (pace !== undefined) return paceStress(pace, durationSeconds, thresholds.thresholdPace);
  }
  if (category === 'swim' && thresholds.swimThresholdPace) {
    const pace = swimPaceFromDistance(durationSeconds, signals.distanceMeters);
    if (pace !== undefined) return paceStress(pace, durationSeconds, thresholds.swimThresholdPace);
  }

  if (thresholds.thresholdHeartRate) {
    const hr = averageHeartRate(signals);
    if (hr !== undefined) return heartRateStress(hr, durationSeconds, thresholds.thresholdHeartRate);
  }

  const perceived = signals.perceivedIntensity ?? options.perceivedIntensity?.[category] ?? DEFAULT_PERCEIVED_INTENSITY[category];
  return estimateStress(durationSeconds, perceived);
}

// Multiplies by the learned factor when the profile allows it; a result is scaled at most once
export function applyScaling(result: StressResult, profile: ScalingProfile, category?: ActivityCategory, band?: IntensityBand): StressResult {
  if (result.scaling || !canApplyScaling(profile)) return result;
  const factor = selectFactor(profile, category, band);
  return {
    ...result,
    value: result.value * factor,
    scaling: { applied: true, factor, preScalingValue: result.value }
  };
}

export function stressPerHour(intensityFactor: number): number {
  return intensityFactor ** 2 * 100;
}

export function intensityDescription(intensityFactor: number): string {
  if (intensityFactor >= 1.05) return 'All Out';
  if (intensityFactor >= 0.95) return 'Threshold';
  if (intensityFactor >= 0.85) return 'Tempo';
  if (intensityFactor >= 0.75) return 'Endurance';
  if (intensityFactor >= 0.55) return 'Recovery';
  return 'Easy';
}
