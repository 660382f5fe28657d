import type { RawEvent, TimeSeriesRow } from './types';

/**
 * Readers for loosely typed upstream records.
 * Every reader returns a fallback instead of throwing on a malformed field.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readString(event: RawEvent, key: string): string | null {
  const value = event[key];
  return typeof value === 'string' ? value : null;
}

function readNumber(event: RawEvent, key: string): number | null {
  return toNumber(event[key]);
}

/**
 * CME speed in km/s. DONKI puts it on the event itself in older payloads and
 * under cmeAnalyses (preferring the most accurate analysis) in current ones.
 */
export function readCmeSpeed(cme: RawEvent): number | null {
  const direct = readNumber(cme, 'speed');
  if (direct !== null) return direct;

  const analyses = cme.cmeAnalyses;
  if (!Array.isArray(analyses)) return null;

  const records = analyses.filter(isRecord);
  const preferred = records.find((a) => a.isMostAccurate === true && toNumber(a.speed) !== null);
  if (preferred) return toNumber(preferred.speed);

  for (const analysis of records) {
    const speed = toNumber(analysis.speed);
    if (speed !== null) return speed;
  }
  return null;
}

/** First Kp reading of a geomagnetic storm event, 0 when absent. */
export function readStormKp(storm: RawEvent): number {
  const readings = storm.allKpIndex;
  if (!Array.isArray(readings) || readings.length === 0) return 0;
  const first: unknown = readings[0];
  if (!isRecord(first)) return 0;
  return toNumber(first.kpIndex) ?? 0;
}

export function readSeriesNumber(row: TimeSeriesRow, index: number, fallback: number): number {
  if (row.length <= index) return fallback;
  return toNumber(row[index]) ?? fallback;
}

export function toRawEvents(payload: unknown): RawEvent[] {
  if (!Array.isArray(payload)) return [];
  return payload.filter(isRecord);
}

/** Drops the header row SWPC products start with, and any non-tuple rows. */
export function toSeriesRows(payload: unknown): TimeSeriesRow[] {
  if (!Array.isArray(payload) || payload.length === 0) return [];
  return payload.slice(1).filter((row): row is unknown[] => Array.isArray(row));
}
