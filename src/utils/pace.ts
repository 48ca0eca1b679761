// Seconds per km from distance and duration; undefined without distance
export function paceFromDistance(durationSeconds: number, distanceMeters?: number): number | undefined {
  if (!distanceMeters || distanceMeters <= 0 || durationSeconds <= 0) return undefined;
  return durationSeconds / (distanceMeters / 1000);
}

// Seconds per 100 m, the unit swim thresholds are given in
export function swimPaceFromDistance(durationSeconds: number, distanceMeters?: number): number | undefined {
  if (!distanceMeters || distanceMeters <= 0 || durationSeconds <= 0) return undefined;
  return durationSeconds / (distanceMeters / 100);
}
