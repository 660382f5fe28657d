/**
 * CME Arrival Estimator
 *
 * Constant-speed transit over one astronomical unit. No drag model: the
 * window is a flat +/- 6 hours around the point estimate.
 */

import { addMilliseconds, isValid, parseISO } from 'date-fns';
import { readCmeSpeed, readString } from '../fields';
import type { CmeArrivalEstimate, CmeArrivalPrediction, CmeNotEarthDirected, RawEvent } from '../types';
import { round, type CmeArrivalInput, type CmeArrivalScorer } from './types';

export const CME_MODEL_VERSION = '1.0.0';

const SUN_EARTH_DISTANCE_KM = 150_000_000;
const MIN_EARTH_DIRECTED_SPEED = 200; // km/s
const FAST_CME_SPEED = 500; // km/s
const WINDOW_HALF_WIDTH_HOURS = 6;
const MS_PER_HOUR = 60 * 60 * 1000;

const HIGH_SEVERITY_WARNINGS = [
  'Geomagnetic storm expected',
  'Satellite operations may be affected',
  'Aurora visible at lower latitudes',
];

const MODERATE_SEVERITY_WARNINGS = [
  'Minor geomagnetic activity possible',
  'Aurora may be visible at high latitudes',
];

function travelTimeHours(speed: number): number {
  return SUN_EARTH_DISTANCE_KM / (speed * 3600);
}

/** Parses a DONKI timestamp; a trailing Z is read as a +00:00 offset. */
export function parseDetectionTime(detectionTime: string): Date | null {
  if (!detectionTime) return null;
  const parsed = parseISO(detectionTime.replace(/Z$/, '+00:00'));
  return isValid(parsed) ? parsed : null;
}

export function isEarthDirected(
  prediction: CmeArrivalPrediction
): prediction is CmeArrivalEstimate {
  return 'estimated_arrival' in prediction;
}

export function predictCmeArrival(input: CmeArrivalInput): CmeArrivalPrediction {
  const { speed, detectionTime } = input;

  if (!speed || speed < MIN_EARTH_DIRECTED_SPEED) {
    const sentinel: CmeNotEarthDirected = {
      arrival_time: null,
      impact_probability: 0,
      message: 'CME not Earth-directed or too slow',
    };
    return sentinel;
  }

  const travelHours = travelTimeHours(speed);
  const earliestHours = travelHours - WINDOW_HALF_WIDTH_HOURS;
  const latestHours = travelHours + WINDOW_HALF_WIDTH_HOURS;
  const isFast = speed >= 1000;

  // An unreadable detection time still yields the transit estimate, just without wall-clock times
  const detection = parseDetectionTime(detectionTime);
  const arrival = detection ? addMilliseconds(detection, Math.round(travelHours * MS_PER_HOUR)) : null;

  return {
    detection_time: detectionTime,
    cme_speed: `${speed} km/s`,
    estimated_arrival: arrival ? arrival.toISOString() : null,
    arrival_window: `${earliestHours.toFixed(1)} to ${latestHours.toFixed(1)} hours`,
    arrival_window_hours: {
      earliest: round(earliestHours, 2),
      latest: round(latestHours, 2),
    },
    arrival_window_utc: arrival
      ? {
          earliest: addMilliseconds(arrival, -WINDOW_HALF_WIDTH_HOURS * MS_PER_HOUR).toISOString(),
          latest: addMilliseconds(arrival, WINDOW_HALF_WIDTH_HOURS * MS_PER_HOUR).toISOString(),
        }
      : null,
    impact_probability: round(Math.min((speed / 2000) * 0.8, 0.95), 2),
    severity: isFast ? 'high' : 'moderate',
    warnings: isFast ? [...HIGH_SEVERITY_WARNINGS] : [...MODERATE_SEVERITY_WARNINGS],
  };
}

/** CMEs faster than 500 km/s, in feed order. */
export function selectFastCmes(cmes: RawEvent[]): RawEvent[] {
  return cmes.filter((cme) => {
    const speed = readCmeSpeed(cme);
    return speed !== null && speed > FAST_CME_SPEED;
  });
}

export function arrivalInputFor(cme: RawEvent): CmeArrivalInput {
  return {
    speed: readCmeSpeed(cme),
    detectionTime: readString(cme, 'startTime') ?? '',
  };
}

export const constantSpeedCmeScorer: CmeArrivalScorer = {
  id: 'constant-speed-cme',
  version: CME_MODEL_VERSION,
  description: 'Constant-speed Sun-Earth transit with a 12 hour window',
  score: (input) => predictCmeArrival(input),
};
