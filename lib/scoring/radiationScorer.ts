/**
 * Radiation Storm Scorer
 *
 * Solar energetic particle events follow major (M/X) flares, so the S-scale
 * outlook is driven by how many of those occurred in the lookback window.
 */

import { readString } from '../fields';
import type {
  ProtonAlertLevel,
  ProtonFluxPrediction,
  ProtonTrend,
  RadiationScale,
  RadiationSeverity,
  RadiationStormPrediction,
  RawEvent,
} from '../types';
import { round, type RadiationScorer, type RadiationScorerInput } from './types';

export const RADIATION_MODEL_VERSION = '1.0.0';
export const RADIATION_CONFIDENCE = 0.72;
const QUIET_PROBABILITY = 0.15;

interface ScaleProfile {
  impacts: string[];
  affectedRegions: string[];
  recommendations: string[];
}

const SCALE_PROFILES: Record<RadiationScale, ScaleProfile> = {
  'S3-S4': {
    impacts: [
      'Radiation hazard to astronauts on EVA',
      'Satellite operations degraded',
      'HF radio blackouts on sunlit side',
      'Navigation system errors',
      'Increased radiation dose to airline passengers',
    ],
    affectedRegions: ['Polar regions', 'High-latitude areas', 'Global HF communications'],
    recommendations: [
      'Postpone spacewalks if possible',
      'Satellite operators: implement mitigation procedures',
      'Airlines: consider re-routing polar flights',
      'Increased monitoring of radiation levels',
    ],
  },
  'S1-S2': {
    impacts: [
      'Minor impacts to satellite operations',
      'Small effects on HF radio in polar regions',
      'Elevated radiation levels for astronauts',
      'Minimal impact to aviation',
    ],
    affectedRegions: ['Polar regions', 'High-latitude areas'],
    recommendations: [
      'Monitor radiation levels',
      'Limit EVA duration if possible',
      'Standard satellite protection adequate',
    ],
  },
  'Below S1': {
    impacts: ['Normal background radiation levels', 'No significant impacts expected'],
    affectedRegions: ['None'],
    recommendations: ['Normal operations', 'Standard radiation monitoring'],
  },
};

/** Flares whose class begins with an upper-case X or M. */
export function countHighEnergyFlares(flares: RawEvent[]): number {
  return flares.filter((flare) => {
    const classType = readString(flare, 'classType') ?? '';
    return classType.startsWith('X') || classType.startsWith('M');
  }).length;
}

function radiationOutlook(highEnergyFlares: number): {
  scale: RadiationScale;
  severity: RadiationSeverity;
  probability: number;
} {
  const baseProb = Math.min(highEnergyFlares * 0.2, 0.9);

  if (highEnergyFlares >= 3) {
    return { scale: 'S3-S4', severity: 'Strong', probability: Math.min(baseProb * 1.2, 0.85) };
  }
  if (highEnergyFlares >= 1) {
    return { scale: 'S1-S2', severity: 'Moderate', probability: baseProb };
  }
  return { scale: 'Below S1', severity: 'Minor', probability: QUIET_PROBABILITY };
}

export function predictRadiationStorm(
  input: RadiationScorerInput,
  now: Date = new Date()
): RadiationStormPrediction {
  const outlook = radiationOutlook(countHighEnergyFlares(input.recentFlares));
  const profile = SCALE_PROFILES[outlook.scale];

  return {
    timestamp: now.toISOString(),
    forecast_period: '24-72 hours',
    radiation_storm_probability: round(outlook.probability, 2),
    predicted_scale: outlook.scale,
    severity: outlook.severity,
    confidence: RADIATION_CONFIDENCE,
    impacts: [...profile.impacts],
    affected_regions: [...profile.affectedRegions],
    recommendations: [...profile.recommendations],
  };
}

// ============================================================================
// Proton flux outlook
// ============================================================================

export function protonAlertLevel(flux: number): ProtonAlertLevel {
  if (flux >= 10000) return 'S3 - Strong';
  if (flux >= 1000) return 'S2 - Moderate';
  if (flux >= 10) return 'S1 - Minor';
  return 'Normal';
}

/** Scientific notation with a two-digit exponent, e.g. 1.20e+03. */
export function formatFlux(flux: number): string {
  const [mantissa, exponent] = flux.toExponential(2).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  return `${mantissa}e${sign}${digits}`;
}

export function predictProtonFlux(currentFlux = 1.0, now: Date = new Date()): ProtonFluxPrediction {
  let predictedFlux: number;
  let trend: ProtonTrend;

  if (currentFlux > 1000) {
    predictedFlux = currentFlux * 1.2;
    trend = 'increasing';
  } else if (currentFlux > 100) {
    predictedFlux = currentFlux * 1.1;
    trend = 'stable';
  } else {
    predictedFlux = currentFlux * 0.9;
    trend = 'decreasing';
  }

  return {
    timestamp: now.toISOString(),
    current_flux: formatFlux(currentFlux),
    predicted_flux_6h: formatFlux(predictedFlux),
    trend,
    alert_level: protonAlertLevel(predictedFlux),
  };
}

export const heuristicRadiationScorer: RadiationScorer = {
  id: 'heuristic-radiation',
  version: RADIATION_MODEL_VERSION,
  description: 'S-scale outlook from recent M/X flare count',
  score: predictRadiationStorm,
};
