/**
 * Solar Flare Risk Scorer
 *
 * Blends recent flare activity with the volume of solar wind and X-ray data
 * into a base score, then derives per-class likelihoods and a risk level.
 *
 * Class probabilities are independent likelihoods, each capped on its own.
 * They are not a distribution and do not sum to 1.
 */

import { readString } from '../fields';
import type { FlarePrediction, FlareRiskLevel, RawEvent, TimeSeriesRow } from '../types';
import { round, type FlareScorer, type FlareScorerInput } from './types';

export const FLARE_MODEL_VERSION = '1.0.0';
export const FLARE_CONFIDENCE = 0.78;

// Blend weights for the base score
const ACTIVITY_WEIGHT = 0.5;
const SOLAR_WIND_WEIGHT = 0.3;
const XRAY_WEIGHT = 0.2;

// Class weights for the activity score
const CLASS_WEIGHTS = { X: 0.9, M: 0.6, C: 0.3 } as const;

const ACTIVITY_FLOOR = 0.2;
const ACTIVITY_CAP = 0.9;
const NEUTRAL_SCORE = 0.5;
const MIN_SERIES_POINTS = 5;

const RECOMMENDATIONS: Record<FlareRiskLevel, string[]> = {
  HIGH: [
    'Satellite operators should prepare for possible disruptions',
    'Monitor communication systems closely',
    'GPS accuracy may be affected',
    'Power grid operators should be on alert',
    'Consider postponing sensitive space operations',
  ],
  MODERATE: [
    'Maintain awareness of space weather conditions',
    'Monitor alerts for any rapid changes',
    'Satellite operators should review contingency plans',
    'Aviation routes over polar regions may be affected',
  ],
  LOW: [
    'Normal operations expected',
    'Continue routine space weather monitoring',
    'Low risk of significant impacts',
  ],
  MINIMAL: [
    'Minimal solar activity expected',
    'Excellent conditions for space operations',
    'Low probability of disturbances',
  ],
};

export interface FlareClassCounts {
  X: number;
  M: number;
  C: number;
}

export function countFlareClasses(flares: RawEvent[]): FlareClassCounts {
  const counts: FlareClassCounts = { X: 0, M: 0, C: 0 };
  for (const flare of flares) {
    const classType = readString(flare, 'classType');
    if (!classType) continue;
    const firstChar = classType[0].toUpperCase();
    if (firstChar === 'X' || firstChar === 'M' || firstChar === 'C') {
      counts[firstChar] += 1;
    }
  }
  return counts;
}

export function activityScore(flares: RawEvent[]): number {
  if (flares.length === 0) return ACTIVITY_FLOOR;

  const counts = countFlareClasses(flares);
  const weighted = (
    counts.X * CLASS_WEIGHTS.X +
    counts.M * CLASS_WEIGHTS.M +
    counts.C * CLASS_WEIGHTS.C
  ) / 10;

  return Math.min(weighted + ACTIVITY_FLOOR, ACTIVITY_CAP);
}

/** Scored on data volume only; the physical magnitudes are not inspected. */
export function solarWindScore(solarWind: TimeSeriesRow[]): number {
  if (solarWind.length < MIN_SERIES_POINTS) return NEUTRAL_SCORE;
  const dataQuality = solarWind.length / 100;
  return Math.min(0.3 + dataQuality * 0.4, 0.8);
}

export function xrayScore(xrayFlux: TimeSeriesRow[]): number {
  if (xrayFlux.length < MIN_SERIES_POINTS) return NEUTRAL_SCORE;
  const recent = xrayFlux.slice(-10);
  return Math.min(0.5 + recent.length / 100, 0.8);
}

export function baseFlareScore(input: FlareScorerInput): number {
  return (
    activityScore(input.recentFlares) * ACTIVITY_WEIGHT +
    solarWindScore(input.solarWind) * SOLAR_WIND_WEIGHT +
    xrayScore(input.xrayFlux) * XRAY_WEIGHT
  );
}

function flareRiskLevel(score: number): FlareRiskLevel {
  if (score >= 0.7) return 'HIGH';
  if (score >= 0.5) return 'MODERATE';
  if (score >= 0.3) return 'LOW';
  return 'MINIMAL';
}

export function classProbabilities(base: number): { C: number; M: number; X: number } {
  return {
    C: Math.min(base * 1.2, 0.95),
    M: Math.min(base * 0.6, 0.75),
    X: Math.min(base * 0.3, 0.45),
  };
}

export function predictFlareProbability(input: FlareScorerInput, now: Date = new Date()): FlarePrediction {
  const base = baseFlareScore(input);
  const probabilities = classProbabilities(base);
  const riskLevel = flareRiskLevel(base);

  return {
    timestamp: now.toISOString(),
    forecast_period: '24-48 hours',
    model_version: FLARE_MODEL_VERSION,
    confidence: FLARE_CONFIDENCE,
    predictions: {
      C_class: {
        probability: probabilities.C,
        description: 'Minor flares, little impact',
        severity: 'low',
      },
      M_class: {
        probability: probabilities.M,
        description: 'Moderate flares, possible radio blackouts',
        severity: 'moderate',
      },
      X_class: {
        probability: probabilities.X,
        description: 'Major flares, significant impacts possible',
        severity: 'high',
      },
    },
    risk_level: riskLevel,
    overall_risk_score: round(base, 2),
    recommendations: [...RECOMMENDATIONS[riskLevel]],
  };
}

export const heuristicFlareScorer: FlareScorer = {
  id: 'heuristic-flare',
  version: FLARE_MODEL_VERSION,
  description: 'Weighted flare activity, solar wind and X-ray data volume',
  score: predictFlareProbability,
};
