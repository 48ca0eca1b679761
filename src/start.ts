import { CONFIG } from './config.js';
import { createSupabaseClient, SupabaseCalibrationStore } from './services/supabase.js';
import { createLearningEngine } from './services/learning-engine.js';
import { startNightlyRecomputeCron } from './jobs/nightly-recompute.js';
import { logInfo } from './utils/logger.js';

const store = new SupabaseCalibrationStore(createSupabaseClient(), CONFIG.athleteId);
const engine = createLearningEngine(store, {
  halfLifeDays: CONFIG.calibration.halfLifeDays,
  minSamples: CONFIG.calibration.minSamples,
  minConfidence: CONFIG.calibration.minConfidence
});

const profile = await engine.init();
startNightlyRecomputeCron(engine);
logInfo('calibration worker started', { athleteId: CONFIG.athleteId, cron: CONFIG.recomputeCron, version: profile.version });
