import type { SeverityTier } from '../types';

/**
 * Flare severity from its GOES class string ("X2.1", "m5.0", ...).
 * Only the first character matters. A missing class is 'unknown', not 'low'.
 */
export function classifyFlareSeverity(classType: string | null | undefined): SeverityTier {
  if (!classType) return 'unknown';

  const firstChar = classType[0].toUpperCase();
  if (firstChar === 'X') return 'extreme';
  if (firstChar === 'M') return 'high';
  if (firstChar === 'C') return 'moderate';
  return 'low';
}

/** CME severity from its speed in km/s. */
export function classifyCmeSeverity(speed: number): SeverityTier {
  if (speed >= 2000) return 'extreme';
  if (speed >= 1000) return 'high';
  if (speed >= 500) return 'moderate';
  return 'low';
}

/** Geomagnetic storm severity used by the alert feed (never 'extreme'). */
export function classifyStormSeverity(kp: number): SeverityTier {
  if (kp >= 7) return 'high';
  if (kp >= 5) return 'moderate';
  return 'low';
}

export function isAlertWorthy(severity: SeverityTier): boolean {
  return severity === 'high' || severity === 'extreme';
}
