import type { ActivityCategory, IntensityBand } from './types.js';

export interface FactorEntry {
  factor: number;
  sampleCount: number;
}

export interface ScalingProfile {
  version: number;
  globalFactor: number;
  globalConfidence: number;
  globalSampleCount: number;
  perSport: Partial<Record<ActivityCategory, FactorEntry>>;
  perIntensityBand: Partial<Record<IntensityBand, FactorEntry>>;
  learningEnabled: boolean;
  minSamplesForConfidence: number;
  minConfidence: number;
  factorBounds: { min: number; max: number };
  updatedAt: Date;
}

export const FACTOR_BOUNDS = { min: 0.8, max: 1.5 } as const;

export function createDefaultProfile(opts: { minSamplesForConfidence?: number; minConfidence?: number; now?: Date } = {}): ScalingProfile {
  return {
    version: 0,
    globalFactor: 1,
    globalConfidence: 0,
    globalSampleCount: 0,
    perSport: {},
    perIntensityBand: {},
    learningEnabled: true,
    minSamplesForConfidence: opts.minSamplesForConfidence ?? 3,
    minConfidence: opts.minConfidence ?? 0.5,
    factorBounds: { ...FACTOR_BOUNDS },
    updatedAt: opts.now ?? new Date()
  };
}

export function canApplyScaling(profile: ScalingProfile): boolean {
  return (
    profile.learningEnabled &&
    profile.globalSampleCount >= profile.minSamplesForConfidence &&
    profile.globalConfidence >= profile.minConfidence &&
    profile.globalFactor >= profile.factorBounds.min &&
    profile.globalFactor <= profile.factorBounds.max
  );
}

// Sport factor, then intensity band factor, then global; each needs enough samples
export function selectFactor(profile: ScalingProfile, category?: ActivityCategory, band?: IntensityBand): number {
  const min = profile.minSamplesForConfidence;
  const sport = category ? profile.perSport[category] : undefined;
  if (sport && sport.sampleCount >= min) return sport.factor;
  const byBand = band ? profile.perIntensityBand[band] : undefined;
  if (byBand && byBand.sampleCount >= min) return byBand.factor;
  return profile.globalFactor;
}

export function nextVersion(profile: ScalingProfile, patch: Partial<Omit<ScalingProfile, 'version'>>, now = new Date()): ScalingProfile {
  return { ...profile, ...patch, version: profile.version + 1, updatedAt: now };
}

export type ConfidenceLevel = 'Very High' | 'High' | 'Medium' | 'Low' | 'Insufficient';

export function confidenceLevel(confidence: number): ConfidenceLevel {
  if (confidence >= 0.9) return 'Very High';
  if (confidence >= 0.7) return 'High';
  if (confidence >= 0.5) return 'Medium';
  if (confidence >= 0.3) return 'Low';
  return 'Insufficient';
}
