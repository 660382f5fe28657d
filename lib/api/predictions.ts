import { readSeriesNumber } from '../fields';
import { success, withErrorHandling } from '../http';
import {
  CME_ARRIVAL_LOOKBACK_DAYS,
  LOOKBACK_DAYS,
  getComprehensivePredictions,
  predictRecentCmeArrivals,
} from '../predictionService';
import { hasIncomingCme, predictProtonFlux, type RiskScorer } from '../scoring';
import type { Services } from '../services';

const TAG = 'Predictions API';
const DEFAULT_PROTON_FLUX = 1.0;

/** GET /api/predictions/comprehensive */
export function createComprehensiveHandler(services: Services) {
  return withErrorHandling(TAG, async () => {
    const predictions = await getComprehensivePredictions(services);
    return success(predictions);
  });
}

export function createSolarFlareHandler(services: Services) {
  const { donki, swpc, scorers } = services;
  return withErrorHandling(TAG, async () => {
    const [recentFlares, solarWind, xrayFlux] = await Promise.all([
      donki.getSolarFlares(LOOKBACK_DAYS),
      swpc.getSolarWind(),
      swpc.getXrayFlux(),
    ]);
    return success({ data: scorers.flare.score({ recentFlares, solarWind, xrayFlux }, services.now()) });
  });
}

export function createGeomagneticStormHandler(services: Services) {
  const { donki, swpc, scorers } = services;
  return withErrorHandling(TAG, async () => {
    const [kpHistory, cmeEvents] = await Promise.all([
      swpc.getKpIndex(),
      donki.getCmeEvents(CME_ARRIVAL_LOOKBACK_DAYS),
    ]);
    const cmeIncoming = hasIncomingCme(cmeEvents);
    return success({ data: scorers.geomagnetic.score({ kpHistory, cmeIncoming }, services.now()) });
  });
}

export function createRadiationStormHandler(services: Services) {
  const { donki, scorers } = services;
  return withErrorHandling(TAG, async () => {
    const recentFlares = await donki.getSolarFlares(LOOKBACK_DAYS);
    return success({ data: scorers.radiation.score({ recentFlares }, services.now()) });
  });
}

export function createCmeArrivalHandler(services: Services) {
  return withErrorHandling(TAG, async () => {
    const cmeEvents = await services.donki.getCmeEvents(CME_ARRIVAL_LOOKBACK_DAYS);
    const predictions = predictRecentCmeArrivals(services, cmeEvents);

    if (predictions.length === 0) {
      return success({
        data: { message: 'No Earth-directed CMEs detected recently', predictions },
      });
    }
    return success({ data: { count: predictions.length, predictions } });
  });
}

/** GET /api/predictions/proton-flux: 6 hour outlook from the latest GOES reading. */
export function createProtonFluxHandler(services: Services) {
  return withErrorHandling(TAG, async () => {
    const rows = await services.swpc.getProtonFlux();
    const latest = rows[rows.length - 1];
    const currentFlux = latest ? readSeriesNumber(latest, 1, DEFAULT_PROTON_FLUX) : DEFAULT_PROTON_FLUX;
    return success({ data: predictProtonFlux(currentFlux, services.now()) });
  });
}

function describeScorer<I, O>(scorer: RiskScorer<I, O>) {
  return { id: scorer.id, version: scorer.version, description: scorer.description };
}

export function createModelInfoHandler(services: Services) {
  const { scorers, capabilities, enhancer } = services;
  return withErrorHandling(TAG, async () =>
    success({
      data: {
        scorers: {
          solar_flares: describeScorer(scorers.flare),
          geomagnetic_storm: describeScorer(scorers.geomagnetic),
          radiation_storm: describeScorer(scorers.radiation),
          cme_arrival: describeScorer(scorers.cmeArrival),
        },
        capabilities,
        enhancer: enhancer.name,
      },
    })
  );
}
