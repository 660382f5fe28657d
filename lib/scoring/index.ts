/**
 * Space Weather Risk Scoring
 *
 * Single entry point for the classifiers, scorers and the aggregator.
 */

export type {
  RiskScorer,
  ScorerSet,
  FlareScorer,
  GeomagneticScorer,
  RadiationScorer,
  CmeArrivalScorer,
  FlareScorerInput,
  GeomagneticScorerInput,
  RadiationScorerInput,
  CmeArrivalInput,
} from './types';

export { round } from './types';

export {
  classifyFlareSeverity,
  classifyCmeSeverity,
  classifyStormSeverity,
  isAlertWorthy,
} from './severity';

export {
  predictFlareProbability,
  heuristicFlareScorer,
} from './flareScorer';

export {
  predictRadiationStorm,
  predictProtonFlux,
  heuristicRadiationScorer,
} from './radiationScorer';

export {
  predictGeomagneticStorm,
  hasIncomingCme,
  heuristicGeomagneticScorer,
} from './geomagneticScorer';

export {
  predictCmeArrival,
  selectFastCmes,
  arrivalInputFor,
  isEarthDirected,
  constantSpeedCmeScorer,
} from './cmeArrival';

export {
  assessOverallRisk,
  primaryConcerns,
  NO_CONCERNS,
} from './aggregator';

export { assessDataQuality } from './dataQuality';

import type { ScorerSet } from './types';
import { heuristicFlareScorer } from './flareScorer';
import { heuristicRadiationScorer } from './radiationScorer';
import { heuristicGeomagneticScorer } from './geomagneticScorer';
import { constantSpeedCmeScorer } from './cmeArrival';

export const defaultScorers: ScorerSet = {
  flare: heuristicFlareScorer,
  geomagnetic: heuristicGeomagneticScorer,
  radiation: heuristicRadiationScorer,
  cmeArrival: constantSpeedCmeScorer,
};
