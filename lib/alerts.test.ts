import { describe, expect, it } from 'vitest';
import { compareAlertsByTimestamp, summarizeAlerts, synthesizeAlerts } from './alerts';
import type { Alert } from './types';

const empty = { flares: [], cmes: [], storms: [], radiation: [] };

describe('synthesizeAlerts', () => {
  it('always includes radiation belt enhancements as moderate', () => {
    const alerts = synthesizeAlerts({
      ...empty,
      radiation: [{ rbeID: '2024-05-10T03:00:00-RBE-001', eventTime: '2024-05-10T03:00Z' }],
    });

    expect(alerts).toEqual([
      {
        id: '2024-05-10T03:00:00-RBE-001',
        type: 'radiation',
        severity: 'moderate',
        title: 'Radiation Belt Enhancement',
        description: 'Event time: 2024-05-10T03:00Z',
        timestamp: '2024-05-10T03:00Z',
        source: 'NASA DONKI',
      },
    ]);
  });

  it('drops C-class flares and keeps M and X', () => {
    const alerts = synthesizeAlerts({
      ...empty,
      flares: [
        { flrID: 'c', classType: 'C1.0', beginTime: '2024-05-10T01:00Z', peakTime: '2024-05-10T01:10Z' },
        { flrID: 'm', classType: 'M2.4', beginTime: '2024-05-10T02:00Z', peakTime: '2024-05-10T02:10Z' },
        { flrID: 'x', classType: 'X1.1', beginTime: '2024-05-10T03:00Z' },
      ],
    });

    expect(alerts.map((a) => [a.id, a.severity])).toEqual([
      ['x', 'extreme'],
      ['m', 'high'],
    ]);
    expect(alerts[0].description).toBe('Peak time: N/A');
    expect(alerts[1].title).toBe('Solar Flare M2.4 detected');
  });

  it('alerts on CMEs of 1000 km/s and above', () => {
    const alerts = synthesizeAlerts({
      ...empty,
      cmes: [
        { activityID: 'slow', speed: 900, startTime: '2024-05-10T01:00Z' },
        { activityID: 'fast', speed: 1500, startTime: '2024-05-10T02:00Z' },
        {
          activityID: 'nested',
          startTime: '2024-05-10T03:00Z',
          cmeAnalyses: [{ speed: 2100, isMostAccurate: true }],
        },
      ],
    });

    expect(alerts).toHaveLength(2);
    expect(alerts[0]).toMatchObject({ id: 'nested', severity: 'extreme', description: 'Speed: 2100 km/s' });
    expect(alerts[1]).toMatchObject({
      id: 'fast',
      type: 'cme',
      severity: 'high',
      title: 'Coronal Mass Ejection detected',
    });
  });

  it('alerts on storms of Kp 7 and above', () => {
    const alerts = synthesizeAlerts({
      ...empty,
      storms: [
        { gstID: 'g2', startTime: '2024-05-10T01:00Z', allKpIndex: [{ kpIndex: 6 }] },
        { gstID: 'g4', startTime: '2024-05-10T02:00Z', allKpIndex: [{ kpIndex: 8.33 }] },
        { gstID: 'none', startTime: '2024-05-10T03:00Z' },
      ],
    });

    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      id: 'g4',
      type: 'geomagnetic_storm',
      severity: 'high',
      title: 'Geomagnetic Storm (Kp 8.33)',
      description: 'Start time: 2024-05-10T02:00Z',
    });
  });

  it('orders alerts newest first across kinds', () => {
    const alerts = synthesizeAlerts({
      flares: [{ flrID: 'f', classType: 'X1.0', beginTime: '2024-05-09T10:00Z' }],
      cmes: [{ activityID: 'c', speed: 1200, startTime: '2024-05-10T08:00Z' }],
      storms: [],
      radiation: [{ rbeID: 'r', eventTime: '2024-05-09T22:00Z' }],
    });
    expect(alerts.map((a) => a.id)).toEqual(['c', 'r', 'f']);
  });
});

describe('compareAlertsByTimestamp', () => {
  const alert = (timestamp: string | null): Alert => ({
    id: null,
    type: 'radiation',
    severity: 'moderate',
    title: '',
    description: '',
    timestamp,
    source: 'NASA DONKI',
  });

  it('sorts missing timestamps last', () => {
    const sorted = [alert(null), alert('2024-05-10T00:00Z'), alert('2024-05-11T00:00Z')].sort(
      compareAlertsByTimestamp
    );
    expect(sorted.map((a) => a.timestamp)).toEqual(['2024-05-11T00:00Z', '2024-05-10T00:00Z', null]);
  });
});

describe('summarizeAlerts', () => {
  it('counts alerts per severity', () => {
    const alerts = synthesizeAlerts({
      flares: [
        { flrID: 'x', classType: 'X1.0', beginTime: '2024-05-10T03:00Z' },
        { flrID: 'm', classType: 'M1.0', beginTime: '2024-05-10T02:00Z' },
      ],
      cmes: [{ activityID: 'c', speed: 2500, startTime: '2024-05-10T01:00Z' }],
      storms: [],
      radiation: [{ rbeID: 'r', eventTime: '2024-05-10T00:00Z' }],
    });

    expect(summarizeAlerts(alerts)).toEqual({ total: 4, extreme: 2, high: 1, moderate: 1, low: 0 });
  });
});
