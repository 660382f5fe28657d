/**
 * Scorer contracts
 *
 * Each risk concern is served by a stateless scorer held in the service
 * container. Swapping an implementation (for example a trained model)
 * means providing another object with the same shape.
 */

import type {
  CmeArrivalPrediction,
  FlarePrediction,
  GeomagneticStormPrediction,
  RadiationStormPrediction,
  RawEvent,
  TimeSeriesRow,
} from '../types';

export interface RiskScorer<TInput, TOutput> {
  readonly id: string;
  readonly version: string;
  readonly description: string;
  score(input: TInput, now?: Date): TOutput;
}

export interface FlareScorerInput {
  recentFlares: RawEvent[];
  solarWind: TimeSeriesRow[];
  xrayFlux: TimeSeriesRow[];
}

export interface GeomagneticScorerInput {
  kpHistory: TimeSeriesRow[];
  cmeIncoming: boolean;
}

export interface RadiationScorerInput {
  recentFlares: RawEvent[];
}

export interface CmeArrivalInput {
  speed: number | null;
  detectionTime: string;
}

export type FlareScorer = RiskScorer<FlareScorerInput, FlarePrediction>;
export type GeomagneticScorer = RiskScorer<GeomagneticScorerInput, GeomagneticStormPrediction>;
export type RadiationScorer = RiskScorer<RadiationScorerInput, RadiationStormPrediction>;
export type CmeArrivalScorer = RiskScorer<CmeArrivalInput, CmeArrivalPrediction>;

export interface ScorerSet {
  flare: FlareScorer;
  geomagnetic: GeomagneticScorer;
  radiation: RadiationScorer;
  cmeArrival: CmeArrivalScorer;
}

export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
