import type { ActivityCategory, WorkoutRecord } from '../domain/types.js';
import type { CalibrationDataPoint, PmcObservation } from '../domain/calibration.js';
import { DEFAULT_HALF_LIFE_DAYS, intensityBandFor, invalidate } from '../domain/calibration.js';
import type { ConfidenceLevel, FactorEntry, ScalingProfile } from '../domain/scaling-profile.js';
import { canApplyScaling, confidenceLevel, createDefaultProfile, nextVersion } from '../domain/scaling-profile.js';
import { createDataPoints, recomputeProfile } from '../engine/learning.js';
import type { CalibrationStore } from './calibration-store.js';
import { addDays, fromISO, toISO } from '../utils/dates.js';
import { logInfo, logError } from '../utils/logger.js';
import Bottleneck from 'bottleneck';
import { v4 as uuidv4 } from 'uuid';

export type LearningState = 'idle' | 'profileLoaded' | 'dataPointsCreated' | 'factorsRecomputed' | 'persisted';

export interface LearningEngineOptions {
  halfLifeDays?: number;
  minSamples?: number;
  minConfidence?: number;
  clock?: () => Date;
}

export interface PmcLearningInput {
  observation: PmcObservation;
  calculatedDailyStress: number;
  activityCategory?: ActivityCategory;
  isMultiSport: boolean;
  calibrationRecordId?: string;
}

export interface LearningStatistics {
  factor: number;
  confidence: number;
  sampleCount: number;
  learningEnabled: boolean;
  canApplyScaling: boolean;
  perSport: Partial<Record<ActivityCategory, FactorEntry>>;
  perSportCounts: Partial<Record<ActivityCategory, number>>;
  confidenceLevel: ConfidenceLevel;
  statusText: string;
  canDisableImport: boolean;
  isCalibrationComplete: boolean;
  recentPoints: CalibrationDataPoint[];
}

export interface LearningEngine {
  readonly state: LearningState;
  snapshot(): ScalingProfile;
  init(): Promise<ScalingProfile>;
  processObservation(input: PmcLearningInput): Promise<CalibrationDataPoint[]>;
  recordDirectComparison(workout: WorkoutRecord, groundTruthStress: number, groundTruthIF: number | undefined, matchConfidence: number): Promise<CalibrationDataPoint[]>;
  recordCombinedCalibration(
    workout: WorkoutRecord,
    groundTruthStress: number,
    groundTruthIF: number | undefined,
    pmc: { ctl: number; atl: number; tsb: number },
    matchConfidence: number
  ): Promise<CalibrationDataPoint[]>;
  recompute(): Promise<ScalingProfile>;
  invalidatePoint(id: string, reason: string): Promise<ScalingProfile>;
  setLearningEnabled(enabled: boolean): Promise<ScalingProfile>;
  reset(): Promise<ScalingProfile>;
  statistics(): Promise<LearningStatistics>;
}

export function createLearningEngine(store: CalibrationStore, options: LearningEngineOptions = {}): LearningEngine {
  const halfLifeDays = options.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;
  const clock = options.clock ?? (() => new Date());
  const defaults = { minSamplesForConfidence: options.minSamples, minConfidence: options.minConfidence };
  const writer = new Bottleneck({ maxConcurrent: 1 });

  let current = createDefaultProfile({ ...defaults, now: clock() });
  let currentState: LearningState = 'idle';

  const transition = (to: LearningState, runId?: string) => {
    if (currentState === to) return;
    logInfo('learning state', { from: currentState, to, runId });
    currentState = to;
  };

  const loadProfile = async (): Promise<ScalingProfile> => {
    const stored = await store.loadProfile();
    return stored ?? createDefaultProfile({ ...defaults, now: clock() });
  };

  // load, mutate, persist, swap the snapshot; a null step result persists nothing
  async function run(
    kind: string,
    step: (profile: ScalingProfile) => Promise<ScalingProfile | null>,
    opts: { requireEnabled?: boolean } = {}
  ): Promise<ScalingProfile> {
    const runId = uuidv4();
    try {
      const profile = await loadProfile();
      transition('profileLoaded', runId);

      if (opts.requireEnabled && !profile.learningEnabled) {
        logInfo('learning disabled, skipping', { kind, runId });
        current = profile;
        return profile;
      }

      const next = await step(profile);
      if (!next) {
        current = profile;
        return profile;
      }

      await store.saveProfile(next);
      transition('persisted', runId);
      current = next;
      logInfo('scaling profile updated', {
        kind,
        runId,
        version: next.version,
        factor: next.globalFactor,
        confidence: next.globalConfidence,
        samples: next.globalSampleCount
      });
      return next;
    } catch (err) {
      logError('learning run failed', { kind, runId, err });
      throw err;
    } finally {
      transition('idle', runId);
    }
  }

  const write = (kind: string, step: (profile: ScalingProfile) => Promise<ScalingProfile | null>) =>
    writer.schedule(async () => structuredClone(await run(kind, step)));

  const learn = (kind: string, build: () => Promise<CalibrationDataPoint[]>): Promise<CalibrationDataPoint[]> =>
    writer.schedule(async () => {
      let created: CalibrationDataPoint[] = [];
      await run(
        kind,
        async (profile) => {
          created = await build();
          transition('dataPointsCreated');
          if (!created.length) return null;

          await store.insertPoints(created);
          const next = recomputeProfile(profile, await store.listPoints(), clock(), halfLifeDays);
          transition('factorsRecomputed');
          return next;
        },
        { requireEnabled: true }
      );
      return created;
    });

  const directPoints = (workout: WorkoutRecord, groundTruthStress: number, groundTruthIF: number | undefined, matchConfidence: number) => {
    const intensityFactor = groundTruthIF ?? workout.intensityFactor;
    const calculated = workout.unscaledStress ?? workout.stress;
    const points = createDataPoints({
      effectiveDate: toISO(workout.startTime),
      calculatedDailyStress: calculated,
      sourceConfidence: matchConfidence,
      groundTruthStress,
      activityCategory: workout.activityCategory,
      isMultiSport: false,
      intensityFactor,
      now: clock()
    });
    if (points.length && intensityFactor > 0) {
      logInfo('direct comparison', {
        workoutId: workout.id,
        ratio: groundTruthStress / calculated,
        band: intensityBandFor(intensityFactor)
      });
    }
    return points;
  };

  return {
    get state() {
      return currentState;
    },

    snapshot: () => structuredClone(current),

    init: () =>
      writer.schedule(async () => {
        current = await loadProfile();
        return structuredClone(current);
      }),

    processObservation: (input) =>
      learn('pmc', async () => {
        const now = clock();
        const effectiveDate = input.observation.effectiveDate ?? toISO(now);
        const previous = await store.getKnownLoad(toISO(addDays(fromISO(effectiveDate), -1)));
        return createDataPoints({
          effectiveDate,
          calculatedDailyStress: input.calculatedDailyStress,
          sourceConfidence: input.observation.confidence,
          groundTruthStress: input.observation.dailyStress,
          today: { ctl: input.observation.ctl, atl: input.observation.atl },
          previous,
          activityCategory: input.activityCategory,
          isMultiSport: input.isMultiSport,
          calibrationRecordId: input.calibrationRecordId,
          now
        });
      }),

    recordDirectComparison: (workout, groundTruthStress, groundTruthIF, matchConfidence) =>
      learn('direct', async () => directPoints(workout, groundTruthStress, groundTruthIF, matchConfidence)),

    // The day's ground-truth CTL/ATL is kept as known load for later derivations
    recordCombinedCalibration: (workout, groundTruthStress, groundTruthIF, pmc, matchConfidence) =>
      learn('combined', async () => {
        const points = directPoints(workout, groundTruthStress, groundTruthIF, matchConfidence);
        await store.putKnownLoad(toISO(workout.startTime), { ctl: pmc.ctl, atl: pmc.atl });
        logInfo('known load updated', { date: toISO(workout.startTime), ctl: pmc.ctl, atl: pmc.atl });
        return points;
      }),

    recompute: () =>
      write('recompute', async (profile) => {
        const next = recomputeProfile(profile, await store.listPoints(), clock(), halfLifeDays);
        transition('factorsRecomputed');
        return next;
      }),

    invalidatePoint: (id, reason) =>
      write('invalidate', async (profile) => {
        const points = await store.listPoints();
        const target = points.find((p) => p.id === id);
        if (!target) throw new Error(`Calibration point not found: ${id}`);

        const replaced = invalidate(target, reason);
        await store.replacePoint(replaced);
        const next = recomputeProfile(profile, points.map((p) => (p.id === id ? replaced : p)), clock(), halfLifeDays);
        transition('factorsRecomputed');
        return next;
      }),

    setLearningEnabled: (enabled) => write('toggle', async (profile) => nextVersion(profile, { learningEnabled: enabled }, clock())),

    // Points go and factors return to neutral; the enabled flag and thresholds stay
    reset: () =>
      write('reset', async (profile) => {
        await store.deleteAllPoints();
        return nextVersion(profile, { globalFactor: 1, globalConfidence: 0, globalSampleCount: 0, perSport: {}, perIntensityBand: {} }, clock());
      }),

    async statistics() {
      const profile = structuredClone(current);
      const points = (await store.listPoints()).filter((p) => p.isValid);

      const perSportCounts: Partial<Record<ActivityCategory, number>> = {};
      for (const p of points) {
        if (p.activityCategory) perSportCounts[p.activityCategory] = (perSportCounts[p.activityCategory] ?? 0) + 1;
      }

      const applicable = canApplyScaling(profile);
      let statusText = `Active: adjusting stress by ${Math.round((profile.globalFactor - 1) * 100)}%`;
      if (!profile.learningEnabled) statusText = 'Learning disabled';
      else if (profile.globalSampleCount === 0) statusText = 'No calibration data yet';
      else if (!applicable) statusText = 'Need more data to apply scaling';

      return {
        factor: profile.globalFactor,
        confidence: profile.globalConfidence,
        sampleCount: profile.globalSampleCount,
        learningEnabled: profile.learningEnabled,
        canApplyScaling: applicable,
        perSport: profile.perSport,
        perSportCounts,
        confidenceLevel: confidenceLevel(profile.globalConfidence),
        statusText,
        canDisableImport: profile.globalSampleCount >= 10 && profile.globalConfidence >= 0.9,
        isCalibrationComplete: profile.globalConfidence >= 0.95,
        recentPoints: points.slice(0, 10)
      };
    }
  };
}
