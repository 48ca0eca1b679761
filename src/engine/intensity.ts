import type { PowerSample, TrackPoint } from '../domain/types.js';
import { InvalidParameterError } from '../domain/errors.js';

export const NP_WINDOW_SECONDS = 30;

// Linear interpolation onto a 1 s grid over [0, totalSeconds)
function resampleToOneSecond(samples: PowerSample[]): number[] {
  const data = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  if (data.length === 0) return [];
  const first = data[0].timestamp;
  const totalSeconds = Math.floor(data[data.length - 1].timestamp - first);
  if (totalSeconds <= 0) return [];

  const res: number[] = [];
  let idx = 0;
  for (let second = 0; second < totalSeconds; second++) {
    const t = first + second;
    while (idx < data.length - 1 && data[idx + 1].timestamp <= t) idx++;

    if (idx < data.length - 1) {
      const before = data[idx];
      const after = data[idx + 1];
      const span = after.timestamp - before.timestamp;
      res.push(span > 0 ? before.watts + ((after.watts - before.watts) * (t - before.timestamp)) / span : before.watts);
    } else {
      res.push(data[idx].watts);
    }
  }
  return res;
}

export function normalizedPowerFromSeries(values: number[], windowSeconds = NP_WINDOW_SECONDS): number | undefined {
  if (!Number.isInteger(windowSeconds) || windowSeconds <= 0) {
    throw new InvalidParameterError('windowSeconds', windowSeconds);
  }
  if (values.length <= windowSeconds) return undefined;

  let windowSum = values.slice(0, windowSeconds - 1).reduce((s, v) => s + v, 0);
  let fourthSum = 0;
  let count = 0;
  for (let i = windowSeconds - 1; i < values.length; i++) {
    windowSum += values[i];
    if (i >= windowSeconds) windowSum -= values[i - windowSeconds];
    fourthSum += (windowSum / windowSeconds) ** 4;
    count++;
  }
  return Math.pow(fourthSum / count, 0.25);
}

// Fourth-root mean of the fourth power of the rolling average
export function normalizedPower(samples: PowerSample[], windowSeconds = NP_WINDOW_SECONDS): number | undefined {
  if (samples.length <= windowSeconds) return undefined;
  return normalizedPowerFromSeries(resampleToOneSecond(samples), windowSeconds);
}

export function variabilityIndex(np: number, averagePower: number): number {
  if (averagePower <= 0) return 1;
  return np / averagePower;
}

// Relative metabolic cost of running on a grade (in %) vs flat ground
export function gradeAdjustmentFactor(gradePercent: number): number {
  const g = gradePercent / 100;
  const cost = 155.4 * g ** 5 - 30.4 * g ** 4 - 43.3 * g ** 3 + 46.3 * g ** 2 + 19.5 * g + 3.6;
  return Math.max(0.7, Math.min(2.0, cost / 3.6));
}

export function normalizedGradedPace(points: TrackPoint[]): number | undefined {
  if (points.length < 2) return undefined;

  const adjusted: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const cur = points[i];
    const prev = points[i - 1];
    const dt = cur.timestamp - prev.timestamp;
    if (dt <= 0 || cur.pace <= 0) continue;

    const distance = (dt / cur.pace) * 1000;
    if (distance <= 0) continue;

    const grade = ((cur.elevation - prev.elevation) / distance) * 100;
    adjusted.push(cur.pace / gradeAdjustmentFactor(grade));
  }

  if (!adjusted.length) return undefined;
  return adjusted.reduce((s, v) => s + v, 0) / adjusted.length;
}

export function normalizedGradedPaceFromTotals(
  pace: number,
  durationSeconds: number,
  ascentMeters: number,
  descentMeters: number,
  distanceMeters: number
): number | undefined {
  if (distanceMeters <= 0 || durationSeconds <= 0) return undefined;
  const netGrade = ((ascentMeters - descentMeters) / distanceMeters) * 100;
  const climbing = ((ascentMeters + descentMeters) / distanceMeters) * 50;
  return pace / gradeAdjustmentFactor(netGrade + climbing);
}
