/**
 * DONKI Event Provider
 *
 * Fetches discrete space-weather events (flares, CMEs, geomagnetic storms,
 * radiation belt enhancements) and the NEO feed from the NASA API.
 * A failed call is logged and degrades to an empty collection.
 */

import { subHours } from 'date-fns';
import { DONKI_BASE_URL, NASA_BASE_URL } from '../config';
import { errorMessage } from '../errors';
import { isRecord, toRawEvents } from '../fields';
import type { NeoFeed, RawEvent } from '../types';
import { fetchJson, redactUrl, type FetchLike } from './fetchJson';

export interface DonkiProvider {
  getSolarFlares(days?: number): Promise<RawEvent[]>;
  getCmeEvents(days?: number): Promise<RawEvent[]>;
  getGeomagneticStorms(days?: number): Promise<RawEvent[]>;
  getRadiationBeltEnhancements(days?: number): Promise<RawEvent[]>;
  getNearEarthObjects(days?: number): Promise<NeoFeed>;
}

export interface DonkiProviderOptions {
  apiKey: string;
  fetch: FetchLike;
  timeoutMs?: number;
  now?: () => Date;
}

type DonkiEndpoint = 'FLR' | 'CME' | 'GST' | 'RBE';

const ENDPOINT_LABELS: Record<DonkiEndpoint, string> = {
  FLR: 'solar flares',
  CME: 'CME events',
  GST: 'geomagnetic storms',
  RBE: 'radiation events',
};

function emptyNeoFeed(): NeoFeed {
  return { near_earth_objects: {} };
}

// DONKI and NEO windows are UTC calendar dates
function utcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function dateRange(now: Date, days: number): { start: string; end: string } {
  return {
    start: utcDate(subHours(now, days * 24)),
    end: utcDate(now),
  };
}

export function createDonkiProvider(options: DonkiProviderOptions): DonkiProvider {
  const now = options.now ?? (() => new Date());

  async function fetchEvents(endpoint: DonkiEndpoint, days: number): Promise<RawEvent[]> {
    const range = dateRange(now(), days);
    const url = new URL(`${DONKI_BASE_URL}/${endpoint}`);
    url.searchParams.set('startDate', range.start);
    url.searchParams.set('endDate', range.end);
    url.searchParams.set('api_key', options.apiKey);

    try {
      const payload = await fetchJson(url.toString(), options);
      return toRawEvents(payload);
    } catch (err) {
      console.warn(`[DONKI] Error fetching ${ENDPOINT_LABELS[endpoint]} from ${redactUrl(url.toString())}: ${errorMessage(err)}`);
      return [];
    }
  }

  return {
    getSolarFlares: (days = 7) => fetchEvents('FLR', days),
    getCmeEvents: (days = 7) => fetchEvents('CME', days),
    getGeomagneticStorms: (days = 7) => fetchEvents('GST', days),
    getRadiationBeltEnhancements: (days = 7) => fetchEvents('RBE', days),

    async getNearEarthObjects(days = 7) {
      const range = dateRange(now(), days);
      const url = new URL(`${NASA_BASE_URL}/neo/rest/v1/feed`);
      url.searchParams.set('start_date', range.start);
      url.searchParams.set('end_date', range.end);
      url.searchParams.set('api_key', options.apiKey);

      try {
        const payload = await fetchJson(url.toString(), options);
        if (!isRecord(payload)) return emptyNeoFeed();
        const objects = payload.near_earth_objects;
        return { ...payload, near_earth_objects: isRecord(objects) ? objects : {} };
      } catch (err) {
        console.warn(`[DONKI] Error fetching NEOs from ${redactUrl(url.toString())}: ${errorMessage(err)}`);
        return emptyNeoFeed();
      }
    },
  };
}
