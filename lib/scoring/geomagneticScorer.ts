/**
 * Geomagnetic Storm Scorer
 *
 * Projects the next 24h Kp maximum from the recent planetary Kp average,
 * bumped hard when a fast CME is on its way.
 */

import { readCmeSpeed, readSeriesNumber } from '../fields';
import type { GeomagneticStormPrediction, RawEvent, StormLevel, TimeSeriesRow } from '../types';
import { round, type GeomagneticScorer, type GeomagneticScorerInput } from './types';

export const GEOMAGNETIC_MODEL_VERSION = '1.0.0';

const KP_WINDOW = 5;
const FAST_CME_SPEED = 1000; // km/s

const STORM_IMPACTS: Record<Exclude<StormLevel, 'None'>, string[]> = {
  'Severe (G4-G5)': [
    'Widespread power grid problems possible',
    'Spacecraft operations significantly affected',
    'HF radio blackouts in many areas',
    'GPS navigation errors likely',
  ],
  'Moderate (G2-G3)': [
    'Power systems may experience voltage alarms',
    'Spacecraft may need corrective actions',
    'HF radio propagation affected',
    'GPS accuracy reduced',
  ],
  'Minor (G1) or None': [
    'Minimal impact expected',
    'Possible minor fluctuations in power grids',
    'Aurora visible at high latitudes',
  ],
};

/** True when any CME in the window is faster than 1000 km/s. */
export function hasIncomingCme(cmes: RawEvent[]): boolean {
  return cmes.some((cme) => {
    const speed = readCmeSpeed(cme);
    return speed !== null && speed > FAST_CME_SPEED;
  });
}

export function averageRecentKp(kpHistory: TimeSeriesRow[]): number {
  const recent = kpHistory.slice(-KP_WINDOW).map((row) => readSeriesNumber(row, 1, 0));
  if (recent.length === 0) return 0;
  return recent.reduce((sum, kp) => sum + kp, 0) / recent.length;
}

function stormLevelForKp(predictedKp: number): Exclude<StormLevel, 'None'> {
  if (predictedKp >= 7) return 'Severe (G4-G5)';
  if (predictedKp >= 5) return 'Moderate (G2-G3)';
  return 'Minor (G1) or None';
}

export function predictGeomagneticStorm(
  input: GeomagneticScorerInput,
  now: Date = new Date()
): GeomagneticStormPrediction {
  const timestamp = now.toISOString();

  if (input.kpHistory.length === 0) {
    return {
      timestamp,
      current_kp: 0,
      predicted_max_kp: 2,
      storm_probability: 0.1,
      storm_level: 'None',
      forecast_period: '24 hours',
      impacts: [],
    };
  }

  const avgKp = averageRecentKp(input.kpHistory);

  let predictedKp: number;
  let stormProb: number;
  if (input.cmeIncoming) {
    predictedKp = Math.min(avgKp + 3, 9);
    stormProb = 0.85;
  } else {
    predictedKp = Math.min(avgKp + 1, 7);
    stormProb = avgKp > 4 ? 0.3 : 0.1;
  }

  const stormLevel = stormLevelForKp(predictedKp);

  return {
    timestamp,
    current_kp: round(avgKp, 1),
    predicted_max_kp: round(predictedKp, 1),
    storm_probability: round(stormProb, 2),
    storm_level: stormLevel,
    forecast_period: '24 hours',
    impacts: [...STORM_IMPACTS[stormLevel]],
  };
}

export const heuristicGeomagneticScorer: GeomagneticScorer = {
  id: 'heuristic-geomagnetic',
  version: GEOMAGNETIC_MODEL_VERSION,
  description: 'Recent Kp average with fast-CME uplift',
  score: predictGeomagneticStorm,
};
