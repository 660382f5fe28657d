/**
 * Prediction Service
 *
 * Fans out the upstream fetches, runs every scorer on the joined results
 * and merges them into one comprehensive assessment.
 */

import { errorMessage } from './errors';
import {
  arrivalInputFor,
  assessDataQuality,
  assessOverallRisk,
  hasIncomingCme,
  selectFastCmes,
} from './scoring';
import type { Services } from './services';
import type { CmeArrivalPrediction, ComprehensivePredictions, RawEvent } from './types';

export const LOOKBACK_DAYS = 7;
export const CME_ARRIVAL_LOOKBACK_DAYS = 3;
const MAX_ARRIVAL_PREDICTIONS = 3;

export async function getComprehensivePredictions(services: Services): Promise<ComprehensivePredictions> {
  const { donki, swpc, scorers, enhancer } = services;

  const [recentFlares, cmeEvents, solarWind, xrayFlux, kpIndex] = await Promise.all([
    donki.getSolarFlares(LOOKBACK_DAYS),
    donki.getCmeEvents(LOOKBACK_DAYS),
    swpc.getSolarWind(),
    swpc.getXrayFlux(),
    swpc.getKpIndex(),
  ]);

  const now = services.now();
  const cmeIncoming = hasIncomingCme(cmeEvents);

  const solarFlares = scorers.flare.score({ recentFlares, solarWind, xrayFlux }, now);
  const geomagneticStorm = scorers.geomagnetic.score({ kpHistory: kpIndex, cmeIncoming }, now);
  const radiationStorm = scorers.radiation.score({ recentFlares }, now);

  // Arrival of the most recent fast CME only
  const fastCmes = selectFastCmes(cmeEvents);
  const latestFastCme = fastCmes.length > 0 ? fastCmes[fastCmes.length - 1] : null;
  const cmeArrival = latestFastCme ? scorers.cmeArrival.score(arrivalInputFor(latestFastCme), now) : null;

  const assessment = assessOverallRisk(solarFlares, geomagneticStorm, radiationStorm);

  const result: ComprehensivePredictions = {
    status: 'success',
    generated_at: solarFlares.timestamp,
    predictions: {
      solar_flares: solarFlares,
      geomagnetic_storm: geomagneticStorm,
      radiation_storm: radiationStorm,
      cme_arrival: cmeArrival,
      cme_incoming: cmeIncoming,
    },
    overall_risk_assessment: assessment,
    data_quality: assessDataQuality(recentFlares, solarWind, xrayFlux),
  };

  const insights = await enhancer
    .enhance({
      flare: solarFlares,
      assessment,
      flareCount: recentFlares.length,
      cmeCount: cmeEvents.length,
    })
    .catch((err: unknown) => {
      console.warn(`[Predictions] Enhancer ${enhancer.name} failed: ${errorMessage(err)}`);
      return null;
    });

  if (insights) result.ai_insights = insights;
  return result;
}

/** Arrival estimates for the last three fast CMEs in the window. */
export function predictRecentCmeArrivals(
  services: Services,
  cmeEvents: RawEvent[]
): CmeArrivalPrediction[] {
  const now = services.now();
  return selectFastCmes(cmeEvents)
    .slice(-MAX_ARRIVAL_PREDICTIONS)
    .map((cme) => services.scorers.cmeArrival.score(arrivalInputFor(cme), now));
}
