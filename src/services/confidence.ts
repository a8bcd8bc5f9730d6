//confidence math: knowledge tiers, conflict resolution and routing bands
//given how confident the system is, what is it allowed to do?
import { CONFIDENCE_LEVELS, DEFAULT_THRESHOLDS } from '../models/index.js';
import type { ConfidenceBand, ConfidenceLevel, ConflictAction, ThresholdConfig } from '../models/index.js';

//experimental=1 ... high=4
export function tierOf(level: ConfidenceLevel): number {
  return CONFIDENCE_LEVELS.indexOf(level) + 1;
}

export function strongerLevel(a: ConfidenceLevel, b: ConfidenceLevel): ConfidenceLevel {
  return tierOf(a) >= tierOf(b) ? a : b;
}

//a candidate replaces existing knowledge only when it is clearly stronger;
//an existing fact that is stronger keeps its place; anything in between goes to a human
export function resolveConflictAction(existing: ConfidenceLevel, candidate: ConfidenceLevel, margin = 1): ConflictAction {
  const e = tierOf(existing), c = tierOf(candidate);
  if (c > e + margin) return 'update';
  if (e > c) return 'reject';
  return 'human_review';
}

//map a routing confidence to its band, every boundary is inclusive
export function bandOf(confidence: number, thresholds: ThresholdConfig = DEFAULT_THRESHOLDS): ConfidenceBand {
  if (confidence >= thresholds.high) return 'HIGH';
  if (confidence >= thresholds.medium) return 'MEDIUM';
  if (confidence >= thresholds.low) return 'LOW';
  return 'VERY_LOW';
}

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

//scores are reported with four decimals so sums like 0.85 + 0.1 stay comparable
export function roundScore(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}
