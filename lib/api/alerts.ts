import { ALERT_WINDOW_DAYS, summarizeAlerts, synthesizeAlerts } from '../alerts';
import { success, withErrorHandling } from '../http';
import type { Services } from '../services';
import type { Alert } from '../types';

const TAG = 'Alerts API';

export async function collectActiveAlerts({ donki }: Services): Promise<Alert[]> {
  const [flares, cmes, storms, radiation] = await Promise.all([
    donki.getSolarFlares(ALERT_WINDOW_DAYS),
    donki.getCmeEvents(ALERT_WINDOW_DAYS),
    donki.getGeomagneticStorms(ALERT_WINDOW_DAYS),
    donki.getRadiationBeltEnhancements(ALERT_WINDOW_DAYS),
  ]);

  return synthesizeAlerts({ flares, cmes, storms, radiation });
}

/** GET /api/alerts/active */
export function createActiveAlertsHandler(services: Services) {
  return withErrorHandling(TAG, async () => {
    const alerts = await collectActiveAlerts(services);
    return success({ count: alerts.length, alerts });
  });
}

/** GET /api/alerts/summary */
export function createAlertSummaryHandler(services: Services) {
  return withErrorHandling(TAG, async () => {
    const alerts = await collectActiveAlerts(services);
    return success({ summary: summarizeAlerts(alerts) });
  });
}
