export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/calibration.js';
export * from './domain/scaling-profile.js';
export * from './domain/schemas.js';

export * from './engine/load-model.js';
export * from './engine/intensity.js';
export * from './engine/stress-scorer.js';
export * from './engine/matcher.js';
export * from './engine/fusion.js';
export * from './engine/learning.js';
export * from './engine/pmc-layout.js';

export * from './services/calibration-store.js';
export * from './services/learning-engine.js';
export * from './services/calibration-service.js';
export * from './services/workout-intake.js';
export { SupabaseCalibrationStore, createSupabaseClient } from './services/supabase.js';
export { runNightlyRecompute, startNightlyRecomputeCron } from './jobs/nightly-recompute.js';
export { logInfo, logWarn, logError } from './utils/logger.js';
