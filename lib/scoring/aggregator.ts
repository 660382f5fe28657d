/**
 * Overall Risk Aggregator
 *
 * Weighted blend of the flare, geomagnetic and radiation outlooks.
 * The flare outlook contributes through its risk level, the other two
 * through their probabilities.
 */

import type {
  FlarePrediction,
  GeomagneticStormPrediction,
  OverallRiskAssessment,
  OverallRiskLevel,
  RadiationStormPrediction,
  RiskColor,
} from '../types';
import { round } from './types';

const FLARE_WEIGHT = 0.4;
const GEOMAGNETIC_WEIGHT = 0.35;
const RADIATION_WEIGHT = 0.25;

const FLARE_LEVEL_SCORES: Record<string, number> = {
  HIGH: 0.85,
  MODERATE: 0.6,
  LOW: 0.3,
  MINIMAL: 0.1,
};
const DEFAULT_FLARE_SCORE = 0.3;

export const NO_CONCERNS = 'No significant concerns';

const RISK_BANDS: Array<{ min: number; level: OverallRiskLevel; color: RiskColor; message: string }> = [
  { min: 0.7, level: 'HIGH', color: 'red', message: 'Significant space weather activity expected' },
  { min: 0.5, level: 'ELEVATED', color: 'orange', message: 'Moderate space weather activity possible' },
  { min: 0.3, level: 'MODERATE', color: 'yellow', message: 'Minor space weather activity possible' },
];

const QUIET_BAND = { level: 'LOW', color: 'green', message: 'Quiet space weather conditions expected' } as const;

export type FlareOutlook = Pick<FlarePrediction, 'risk_level'>;
export type GeomagneticOutlook = Pick<GeomagneticStormPrediction, 'storm_probability'>;
export type RadiationOutlook = Pick<RadiationStormPrediction, 'radiation_storm_probability'>;

export function flareLevelToScore(level: string): number {
  return FLARE_LEVEL_SCORES[level] ?? DEFAULT_FLARE_SCORE;
}

function overallRiskScore(
  flare: FlareOutlook,
  geomagnetic: GeomagneticOutlook,
  radiation: RadiationOutlook
): number {
  return (
    flareLevelToScore(flare.risk_level) * FLARE_WEIGHT +
    geomagnetic.storm_probability * GEOMAGNETIC_WEIGHT +
    radiation.radiation_storm_probability * RADIATION_WEIGHT
  );
}

/** Fixed order: flare, geomagnetic, radiation, then the fallback. */
export function primaryConcerns(
  flare: FlareOutlook,
  geomagnetic: GeomagneticOutlook,
  radiation: RadiationOutlook
): string[] {
  const concerns: string[] = [];

  if (flare.risk_level === 'HIGH' || flare.risk_level === 'MODERATE') {
    concerns.push('Solar flare activity');
  }
  if (geomagnetic.storm_probability > 0.5) {
    concerns.push('Geomagnetic disturbances');
  }
  if (radiation.radiation_storm_probability > 0.5) {
    concerns.push('Radiation hazards');
  }
  if (concerns.length === 0) {
    concerns.push(NO_CONCERNS);
  }

  return concerns;
}

export function assessOverallRisk(
  flare: FlareOutlook,
  geomagnetic: GeomagneticOutlook,
  radiation: RadiationOutlook
): OverallRiskAssessment {
  const score = overallRiskScore(flare, geomagnetic, radiation);
  const band = RISK_BANDS.find((b) => score >= b.min) ?? QUIET_BAND;

  return {
    risk_level: band.level,
    risk_score: round(score, 2),
    color: band.color,
    message: band.message,
    primary_concerns: primaryConcerns(flare, geomagnetic, radiation),
  };
}
