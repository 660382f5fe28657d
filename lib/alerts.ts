/**
 * Alert Synthesizer
 *
 * Flattens raw DONKI events into one alert list. Independent of the risk
 * scorers, with its own thresholds and severity vocabulary.
 */

import { readCmeSpeed, readStormKp, readString } from './fields';
import {
  classifyCmeSeverity,
  classifyFlareSeverity,
  classifyStormSeverity,
  isAlertWorthy,
} from './scoring/severity';
import type { Alert, AlertSummary, RawEvent } from './types';

export const ALERT_SOURCE = 'NASA DONKI';
export const ALERT_WINDOW_DAYS = 2;

export interface AlertInputs {
  flares: RawEvent[];
  cmes: RawEvent[];
  storms: RawEvent[];
  radiation: RawEvent[];
}

function flareAlert(flare: RawEvent): Alert | null {
  const classType = readString(flare, 'classType');
  const severity = classifyFlareSeverity(classType);
  if (!isAlertWorthy(severity)) return null;

  return {
    id: readString(flare, 'flrID'),
    type: 'solar_flare',
    severity,
    title: `Solar Flare ${classType ?? 'Unknown'} detected`,
    description: `Peak time: ${readString(flare, 'peakTime') ?? 'N/A'}`,
    timestamp: readString(flare, 'beginTime'),
    source: ALERT_SOURCE,
  };
}

function cmeAlert(cme: RawEvent): Alert | null {
  const speed = readCmeSpeed(cme) ?? 0;
  const severity = classifyCmeSeverity(speed);
  if (!isAlertWorthy(severity)) return null;

  return {
    id: readString(cme, 'activityID'),
    type: 'cme',
    severity,
    title: 'Coronal Mass Ejection detected',
    description: `Speed: ${speed} km/s`,
    timestamp: readString(cme, 'startTime'),
    source: ALERT_SOURCE,
  };
}

function stormAlert(storm: RawEvent): Alert | null {
  const kp = readStormKp(storm);
  const severity = classifyStormSeverity(kp);
  if (!isAlertWorthy(severity)) return null;

  return {
    id: readString(storm, 'gstID'),
    type: 'geomagnetic_storm',
    severity,
    title: `Geomagnetic Storm (Kp ${kp})`,
    description: `Start time: ${readString(storm, 'startTime') ?? 'N/A'}`,
    timestamp: readString(storm, 'startTime'),
    source: ALERT_SOURCE,
  };
}

// Radiation belt enhancements are always reported, at a fixed severity
function radiationAlert(event: RawEvent): Alert {
  return {
    id: readString(event, 'rbeID'),
    type: 'radiation',
    severity: 'moderate',
    title: 'Radiation Belt Enhancement',
    description: `Event time: ${readString(event, 'eventTime') ?? 'N/A'}`,
    timestamp: readString(event, 'eventTime'),
    source: ALERT_SOURCE,
  };
}

/**
 * Newest first, comparing the raw timestamp strings. Correct only while every
 * feed uses the same ISO-8601 layout and offset. Ties keep input order.
 */
export function compareAlertsByTimestamp(a: Alert, b: Alert): number {
  const left = a.timestamp ?? '';
  const right = b.timestamp ?? '';
  if (left === right) return 0;
  return left < right ? 1 : -1;
}

export function synthesizeAlerts(inputs: AlertInputs): Alert[] {
  const alerts: Alert[] = [];

  for (const flare of inputs.flares) {
    const alert = flareAlert(flare);
    if (alert) alerts.push(alert);
  }
  for (const cme of inputs.cmes) {
    const alert = cmeAlert(cme);
    if (alert) alerts.push(alert);
  }
  for (const storm of inputs.storms) {
    const alert = stormAlert(storm);
    if (alert) alerts.push(alert);
  }
  for (const event of inputs.radiation) {
    alerts.push(radiationAlert(event));
  }

  return alerts.sort(compareAlertsByTimestamp);
}

export function summarizeAlerts(alerts: Alert[]): AlertSummary {
  const count = (severity: Alert['severity']) => alerts.filter((a) => a.severity === severity).length;

  return {
    total: alerts.length,
    extreme: count('extreme'),
    high: count('high'),
    moderate: count('moderate'),
    low: count('low'),
  };
}
