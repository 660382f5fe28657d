import type { NextRequest, NextResponse } from 'next/server';
import { parseDaysParam, success, withErrorHandling } from '../http';
import type { Services } from '../services';
import type { RawEvent } from '../types';

const TAG = 'Weather API';

export const EVENT_DAYS = { min: 1, max: 30, fallback: 7 };
export const ASTEROID_DAYS = { min: 1, max: 7, fallback: 7 };
export const SOLAR_WIND_ROWS = 50;

type RouteHandler = (request: NextRequest) => Promise<NextResponse>;

function eventListHandler(fetchEvents: (days: number) => Promise<RawEvent[]>): RouteHandler {
  return withErrorHandling(TAG, async (request: NextRequest) => {
    const days = parseDaysParam(request, EVENT_DAYS);
    const events = await fetchEvents(days);
    return success({ count: events.length, data: events });
  });
}

/** GET /api/weather/current */
export function createCurrentConditionsHandler({ swpc }: Services) {
  return withErrorHandling(TAG, async () => success({ data: await swpc.getCurrentConditions() }));
}

export function createSolarFlaresHandler({ donki }: Services): RouteHandler {
  return eventListHandler((days) => donki.getSolarFlares(days));
}

export function createCmeEventsHandler({ donki }: Services): RouteHandler {
  return eventListHandler((days) => donki.getCmeEvents(days));
}

export function createGeomagneticStormsHandler({ donki }: Services): RouteHandler {
  return eventListHandler((days) => donki.getGeomagneticStorms(days));
}

export function createRadiationEventsHandler({ donki }: Services): RouteHandler {
  return eventListHandler((days) => donki.getRadiationBeltEnhancements(days));
}

// NEO feed is capped at a week upstream, and has no count of its own here
export function createAsteroidsHandler({ donki }: Services): RouteHandler {
  return withErrorHandling(TAG, async (request: NextRequest) => {
    const days = parseDaysParam(request, ASTEROID_DAYS);
    return success({ data: await donki.getNearEarthObjects(days) });
  });
}

export function createSolarWindHandler({ swpc }: Services) {
  return withErrorHandling(TAG, async () => {
    const rows = await swpc.getSolarWind();
    return success({ data: rows.slice(-SOLAR_WIND_ROWS) });
  });
}

export function createKpIndexHandler({ swpc }: Services) {
  return withErrorHandling(TAG, async () => success({ data: await swpc.getKpIndex() }));
}
