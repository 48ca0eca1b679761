import cron from 'node-cron';
import { CONFIG } from '../config.js';
import type { LearningEngine } from '../services/learning-engine.js';
import type { ScalingProfile } from '../domain/scaling-profile.js';
import { logInfo, logError } from '../utils/logger.js';

// Time weights decay daily even without new points
export async function runNightlyRecompute(engine: LearningEngine): Promise<ScalingProfile | null> {
  const before = engine.snapshot();
  try {
    const profile = await engine.recompute();
    logInfo('nightly recompute done', {
      version: profile.version,
      factor: profile.globalFactor,
      confidence: profile.globalConfidence,
      previousConfidence: before.globalConfidence
    });
    return profile;
  } catch (err) {
    logError('nightly recompute failed', { err });
    return null;
  }
}

export function startNightlyRecomputeCron(engine: LearningEngine, expression = CONFIG.recomputeCron) {
  return cron.schedule(expression, () => {
    runNightlyRecompute(engine).catch((err) => logError('nightly recompute crashed', { err }));
  }, { timezone: CONFIG.tz });
}
