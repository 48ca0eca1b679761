import type { ActivityCategory } from '../domain/types.js';
import { addDays, isLocalMidnight, isSameDay, startOfDay, wholeDaysBetween } from '../utils/dates.js';

export interface Matchable {
  startTime: Date;
  durationSeconds: number;
  activityCategory: ActivityCategory;
  distanceMeters?: number;
}

export interface MatchDetails {
  timeDifferenceSeconds: number;
  durationDifference: number;
  activityMatched: boolean;
  distanceDifference?: number;
  impreciseTime: boolean;
}

export interface MatchResult<T> {
  candidate: T;
  score: number;
  confidence: number;
  details: MatchDetails;
}

export const MIN_MATCH_SCORE = 50;
export const MAX_MATCH_SCORE = 120;
// findBestMatch normalizes against the score without distance
export const BEST_MATCH_NORMALIZER = 105;
export const DEFAULT_WINDOW_DAYS = 2;

// Date-only entries land on local midnight; entries stamped "now" carry no real time either
export function hasImpreciseTime(startTime: Date, now: Date): boolean {
  return isLocalMidnight(startTime) || Math.abs(now.getTime() - startTime.getTime()) < 300_000;
}

function timeScore(observation: Matchable, candidate: Matchable, imprecise: boolean): number | null {
  const sameDay = isSameDay(candidate.startTime, observation.startTime);
  if (imprecise) {
    if (sameDay) return 40;
    if (wholeDaysBetween(observation.startTime, candidate.startTime) <= 1) return 20;
    return null;
  }

  const diff = Math.abs(candidate.startTime.getTime() - observation.startTime.getTime()) / 1000;
  if (diff < 60) return 50;
  if (diff < 120) return 35;
  if (diff < 300) return 20;
  if (sameDay) return 10;
  return null;
}

function durationScore(diff: number): number {
  if (diff < 0.02) return 30;
  if (diff < 0.05) return 25;
  if (diff < 0.1) return 15;
  if (diff < 0.2) return 5;
  return 0;
}

function distanceScore(diff: number): number {
  if (diff < 0.02) return 15;
  if (diff < 0.05) return 10;
  if (diff < 0.1) return 5;
  return 0;
}

export function scoreCandidate(observation: Matchable, candidate: Matchable, now = new Date()): { score: number; details: MatchDetails } | null {
  const imprecise = hasImpreciseTime(observation.startTime, now);
  const time = timeScore(observation, candidate, imprecise);
  if (time === null) return null;

  const durationDifference = Math.abs(candidate.durationSeconds - observation.durationSeconds) / Math.max(1, observation.durationSeconds);
  const activityMatched = candidate.activityCategory === observation.activityCategory;

  let distanceDifference: number | undefined;
  if (observation.distanceMeters !== undefined && candidate.distanceMeters !== undefined && observation.distanceMeters > 0) {
    distanceDifference = Math.abs(candidate.distanceMeters - observation.distanceMeters) / observation.distanceMeters;
  }

  const score =
    time +
    durationScore(durationDifference) +
    (activityMatched ? 25 : 0) +
    (distanceDifference !== undefined ? distanceScore(distanceDifference) : 0);

  if (score < MIN_MATCH_SCORE) return null;
  return {
    score,
    details: {
      timeDifferenceSeconds: Math.abs(candidate.startTime.getTime() - observation.startTime.getTime()) / 1000,
      durationDifference,
      activityMatched,
      distanceDifference,
      impreciseTime: imprecise
    }
  };
}

export function confidenceFromScore(score: number, normalizer = MAX_MATCH_SCORE): number {
  return Math.min(1, score / normalizer);
}

export function candidatesInWindow<T extends Matchable>(pool: T[], around: Date, windowDays = DEFAULT_WINDOW_DAYS): T[] {
  const day = startOfDay(around);
  const from = addDays(day, -windowDays).getTime();
  const to = addDays(day, windowDays + 1).getTime();
  return pool.filter((c) => c.startTime.getTime() >= from && c.startTime.getTime() < to);
}

export interface MatchOptions {
  now?: Date;
  windowDays?: number;
}

// Highest score wins; on a tie the earlier candidate in the pool is kept
export function findBestMatch<T extends Matchable>(observation: Matchable, pool: T[], options: MatchOptions = {}): MatchResult<T> | null {
  const now = options.now ?? new Date();
  const candidates = candidatesInWindow(pool, observation.startTime, options.windowDays ?? DEFAULT_WINDOW_DAYS);

  let best: MatchResult<T> | null = null;
  for (const candidate of candidates) {
    const scored = scoreCandidate(observation, candidate, now);
    if (!scored) continue;
    if (!best || scored.score > best.score) {
      best = { candidate, score: scored.score, confidence: confidenceFromScore(scored.score, BEST_MATCH_NORMALIZER), details: scored.details };
    }
  }
  return best;
}

export function findAllMatches<T extends Matchable>(observation: Matchable, pool: T[], options: MatchOptions = {}): Array<MatchResult<T>> {
  const now = options.now ?? new Date();
  const candidates = candidatesInWindow(pool, observation.startTime, options.windowDays ?? 3);

  const res: Array<MatchResult<T>> = [];
  for (const candidate of candidates) {
    const scored = scoreCandidate(observation, candidate, now);
    if (scored) res.push({ candidate, score: scored.score, confidence: confidenceFromScore(scored.score), details: scored.details });
  }
  return res.sort((a, b) => b.confidence - a.confidence);
}

export function isHighConfidence(match: { confidence: number }): boolean {
  return match.confidence >= 0.7;
}

export function describeMatchQuality(confidence: number): string {
  if (confidence >= 0.9) return 'Excellent match';
  if (confidence >= 0.7) return 'Good match';
  if (confidence >= 0.5) return 'Possible match';
  return 'Low confidence';
}
