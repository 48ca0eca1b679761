export type ActivityCategory = 'run' | 'bike' | 'swim' | 'strength' | 'other';

export type StressMethod = 'power' | 'runningPower' | 'pace' | 'heartRate' | 'estimated';

export type IntensityBand = 'recovery' | 'endurance' | 'tempo' | 'highIntensity';

export interface DailyLoadPoint {
  date: string;
  dailyStress: number;
  ctl: number;
  atl: number;
  tsb: number;
}

export interface LoadState {
  ctl: number;
  atl: number;
  tsb: number;
}

export interface StressScaling {
  applied: true;
  factor: number;
  preScalingValue: number;
}

export interface StressResult {
  value: number;
  method: StressMethod;
  intensityFactor: number;
  normalizedPower?: number;
  normalizedPace?: number;
  averageHeartRate?: number;
  scaling?: StressScaling;
}

export interface WorkoutObservation {
  sourceId: string;
  source: string;
  startTime: Date;
  durationSeconds: number;
  distanceMeters?: number;
  activityCategory: ActivityCategory;
  averageHeartRate?: number;
  maxHeartRate?: number;
  averagePower?: number;
  normalizedPower?: number;
  totalAscentMeters?: number;
  title?: string;
  route?: string;
}

export interface WorkoutRecord {
  id: string;
  startTime: Date;
  durationSeconds: number;
  activityCategory: ActivityCategory;
  distanceMeters?: number;
  averageHeartRate?: number;
  maxHeartRate?: number;
  averagePower?: number;
  normalizedPower?: number;
  totalAscentMeters?: number;
  title?: string;
  route?: string;
  stress: number;
  // calculated value before the learned factor; learning compares against this
  unscaledStress?: number;
  stressMethod: StressMethod;
  intensityFactor: number;
  linkedSources: Record<string, string>;
}

export interface PowerSample {
  timestamp: number; // seconds
  watts: number;
}

export interface TrackPoint {
  timestamp: number; // seconds
  elevation: number; // meters
  pace: number; // seconds per km
}

export interface AthleteThresholds {
  ftp?: number;
  runningFtp?: number;
  thresholdPace?: number; // s/km
  swimThresholdPace?: number; // s/100m
  thresholdHeartRate?: number;
}

export interface WorkoutSignals {
  activityCategory: ActivityCategory;
  durationSeconds: number;
  distanceMeters?: number;
  averagePower?: number;
  powerSamples?: PowerSample[];
  averageHeartRate?: number;
  heartRateSamples?: number[];
  trackPoints?: TrackPoint[];
  totalAscentMeters?: number;
  totalDescentMeters?: number;
  perceivedIntensity?: number;
}
