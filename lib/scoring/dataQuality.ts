import type { DataQualityAssessment, RawEvent, TimeSeriesRow } from '../types';
import { round } from './types';

/**
 * How much upstream data backed a prediction run.
 * Flares count for up to 0.4, solar wind and X-ray flux for up to 0.3 each.
 */
export function assessDataQuality(
  flares: RawEvent[],
  solarWind: TimeSeriesRow[],
  xrayFlux: TimeSeriesRow[]
): DataQualityAssessment {
  let score = 0;

  if (flares.length >= 5) score += 0.4;
  else if (flares.length >= 2) score += 0.2;

  if (solarWind.length >= 10) score += 0.3;
  else if (solarWind.length >= 5) score += 0.15;

  if (xrayFlux.length >= 10) score += 0.3;
  else if (xrayFlux.length >= 5) score += 0.15;

  // Bands compare against the rounded score
  const rounded = round(score, 2);
  let rating: DataQualityAssessment['rating'];
  if (rounded >= 0.8) rating = 'Excellent';
  else if (rounded >= 0.6) rating = 'Good';
  else if (rounded >= 0.4) rating = 'Fair';
  else rating = 'Limited';

  return {
    score: rounded,
    rating,
    data_points: {
      flares: flares.length,
      solar_wind: solarWind.length,
      xray_flux: xrayFlux.length,
    },
  };
}
