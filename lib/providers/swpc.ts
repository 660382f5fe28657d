/**
 * SWPC Time-Series Provider
 *
 * Real-time solar wind, planetary Kp, GOES X-ray and proton flux products.
 * Every product starts with a header row, which is stripped here.
 */

import { SWPC_BASE_URL } from '../config';
import { errorMessage } from '../errors';
import { toSeriesRows } from '../fields';
import type { CurrentConditions, TimeSeriesRow } from '../types';
import { fetchJson, type FetchLike } from './fetchJson';

const SWPC_PRODUCTS = {
  solarWind: '/products/solar-wind/mag-7-day.json',
  kpIndex: '/products/noaa-planetary-k-index.json',
  xrayFlux: '/products/goes-xray-flux-primary.json',
  protonFlux: '/products/goes-proton-flux-primary.json',
} as const;

type SwpcProduct = keyof typeof SWPC_PRODUCTS;

const PRODUCT_LABELS: Record<SwpcProduct, string> = {
  solarWind: 'solar wind',
  kpIndex: 'Kp index',
  xrayFlux: 'X-ray flux',
  protonFlux: 'proton flux',
};

export interface SwpcProvider {
  getSolarWind(): Promise<TimeSeriesRow[]>;
  getKpIndex(): Promise<TimeSeriesRow[]>;
  getXrayFlux(): Promise<TimeSeriesRow[]>;
  getProtonFlux(): Promise<TimeSeriesRow[]>;
  getCurrentConditions(): Promise<CurrentConditions>;
}

export interface SwpcProviderOptions {
  fetch: FetchLike;
  timeoutMs?: number;
  now?: () => Date;
}

export function createSwpcProvider(options: SwpcProviderOptions): SwpcProvider {
  const now = options.now ?? (() => new Date());

  async function fetchSeries(product: SwpcProduct): Promise<TimeSeriesRow[]> {
    const url = `${SWPC_BASE_URL}${SWPC_PRODUCTS[product]}`;
    try {
      const payload = await fetchJson(url, options);
      return toSeriesRows(payload);
    } catch (err) {
      console.warn(`[SWPC] Error fetching ${PRODUCT_LABELS[product]}: ${errorMessage(err)}`);
      return [];
    }
  }

  const provider: SwpcProvider = {
    getSolarWind: () => fetchSeries('solarWind'),
    getKpIndex: () => fetchSeries('kpIndex'),
    getXrayFlux: () => fetchSeries('xrayFlux'),
    getProtonFlux: () => fetchSeries('protonFlux'),

    async getCurrentConditions() {
      const [solarWind, kpIndex, xrayFlux] = await Promise.all([
        provider.getSolarWind(),
        provider.getKpIndex(),
        provider.getXrayFlux(),
      ]);

      return {
        timestamp: now().toISOString(),
        solar_wind: solarWind.slice(-10),
        kp_index: kpIndex.slice(-10),
        xray_flux: xrayFlux.slice(-10),
      };
    },
  };

  return provider;
}
