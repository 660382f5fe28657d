import { afterEach, describe, expect, it, vi } from 'vitest';
import type { PredictionEnhancer } from '../enhancers';
import { swpcProduct, type FakeReply } from '../testing/fakeFetch';
import { createTestServices } from '../testing/services';
import {
  createCmeArrivalHandler,
  createComprehensiveHandler,
  createGeomagneticStormHandler,
  createModelInfoHandler,
  createProtonFluxHandler,
  createRadiationStormHandler,
  createSolarFlareHandler,
} from './predictions';

const FLARES: FakeReply = {
  json: [
    { flrID: 'f1', classType: 'M1.0', beginTime: '2024-05-08T04:00Z' },
    { flrID: 'f2', classType: 'X2.0', beginTime: '2024-05-09T10:00Z' },
  ],
};

const SOLAR_WIND: FakeReply = {
  json: swpcProduct(
    ['time_tag', 'bx_gsm', 'by_gsm', 'bz_gsm'],
    [
      ['2024-05-10 11:57:00.000', '1.0', '2.0', '-3.0'],
      ['2024-05-10 11:58:00.000', '1.1', '2.1', '-3.1'],
      ['2024-05-10 11:59:00.000', '1.2', '2.2', '-3.2'],
    ]
  ),
};

const KP: FakeReply = {
  json: swpcProduct(
    ['time_tag', 'Kp', 'a_running', 'station_count'],
    [
      ['2024-05-10 03:00:00.000', '3', '15', '8'],
      ['2024-05-10 06:00:00.000', '4', '27', '8'],
      ['2024-05-10 09:00:00.000', '5', '48', '8'],
    ]
  ),
};

describe('comprehensive predictions', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('survives a CME feed timeout', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { services } = createTestServices([
      ['/DONKI/FLR', FLARES],
      ['/DONKI/CME', { error: new Error('The operation was aborted due to timeout') }],
      ['mag-7-day', SOLAR_WIND],
    ]);

    const response = await createComprehensiveHandler(services)();
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.status).toBe('success');
    expect(body.predictions.cme_arrival).toBeNull();
    expect(body.predictions.cme_incoming).toBe(false);
    expect(body.predictions.solar_flares.risk_level).toBe('LOW');
    expect(body.predictions.radiation_storm.radiation_storm_probability).toBe(0.4);
    expect(body.predictions.geomagnetic_storm.storm_level).toBe('None');
    expect(body).not.toHaveProperty('ai_insights');
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('[DONKI] Error fetching CME events'));
  });

  it('combines every outlook when all feeds answer', async () => {
    const { services } = createTestServices([
      ['/DONKI/FLR', FLARES],
      [
        '/DONKI/CME',
        {
          json: [
            { activityID: 'c1', startTime: '2024-05-08T00:00Z', speed: 600 },
            { activityID: 'c2', startTime: '2024-05-09T00:00Z', cmeAnalyses: [{ speed: 2000, isMostAccurate: true }] },
          ],
        },
      ],
      ['mag-7-day', SOLAR_WIND],
      ['noaa-planetary-k-index', KP],
      ['goes-xray-flux', { json: [] }],
    ]);

    const body = await (await createComprehensiveHandler(services)()).json();

    expect(body.generated_at).toBe('2024-05-10T12:00:00.000Z');
    expect(body.predictions.cme_incoming).toBe(true);
    expect(body.predictions.cme_arrival).toMatchObject({
      detection_time: '2024-05-09T00:00Z',
      cme_speed: '2000 km/s',
      estimated_arrival: '2024-05-09T20:50:00.000Z',
      severity: 'high',
    });
    // avg Kp 4 with an incoming CME
    expect(body.predictions.geomagnetic_storm).toMatchObject({
      current_kp: 4,
      predicted_max_kp: 7,
      storm_probability: 0.85,
      storm_level: 'Severe (G4-G5)',
    });
    expect(body.overall_risk_assessment.primary_concerns).toEqual(['Geomagnetic disturbances']);
    expect(body.data_quality).toEqual({
      score: 0.2,
      rating: 'Limited',
      data_points: { flares: 2, solar_wind: 3, xray_flux: 0 },
    });
  });

  it('attaches enhancer insights', async () => {
    const enhancer: PredictionEnhancer = { name: 'fixed', enhance: async () => 'Quiet sun for now.' };
    const { services } = createTestServices([], { enhancer });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const body = await (await createComprehensiveHandler(services)()).json();
    expect(body.ai_insights).toBe('Quiet sun for now.');
  });

  it('drops insights from a failing enhancer', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const enhancer: PredictionEnhancer = {
      name: 'broken',
      enhance: async () => {
        throw new Error('model unavailable');
      },
    };
    const { services } = createTestServices([], { enhancer });

    const response = await createComprehensiveHandler(services)();
    expect(response.status).toBe(200);
    expect(await response.json()).not.toHaveProperty('ai_insights');
    expect(warn).toHaveBeenCalledWith('[Predictions] Enhancer broken failed: model unavailable');
  });
});

describe('single outlook endpoints', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('scores solar flares', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { services } = createTestServices([['/DONKI/FLR', FLARES], ['mag-7-day', SOLAR_WIND]]);

    const body = await (await createSolarFlareHandler(services)()).json();
    expect(body.status).toBe('success');
    // 0.35 activity with neutral series scores gives a base of 0.425
    expect(body.data.predictions.C_class.probability).toBeCloseTo(0.51, 10);
    expect(body.data.risk_level).toBe('LOW');
  });

  it('uses a three day CME window for the storm outlook', async () => {
    const { services, upstream } = createTestServices([
      ['noaa-planetary-k-index', KP],
      ['/DONKI/CME', { json: [{ activityID: 'c1', speed: 900 }] }],
    ]);

    const body = await (await createGeomagneticStormHandler(services)()).json();
    expect(body.data).toMatchObject({
      predicted_max_kp: 5,
      storm_probability: 0.1,
      storm_level: 'Moderate (G2-G3)',
    });
    expect(upstream.calls).toContain(
      'https://api.nasa.gov/DONKI/CME?startDate=2024-05-07&endDate=2024-05-10&api_key=test-key'
    );
  });

  it('scores radiation storms', async () => {
    const { services } = createTestServices([['/DONKI/FLR', FLARES]]);
    const body = await (await createRadiationStormHandler(services)()).json();
    expect(body.data).toMatchObject({ radiation_storm_probability: 0.4, predicted_scale: 'S1-S2' });
  });

  it('reports when no fast CMEs are in the window', async () => {
    const { services } = createTestServices([['/DONKI/CME', { json: [{ activityID: 'slow', speed: 450 }] }]]);
    const body = await (await createCmeArrivalHandler(services)()).json();
    expect(body).toEqual({
      status: 'success',
      data: { message: 'No Earth-directed CMEs detected recently', predictions: [] },
    });
  });

  it('estimates arrival for the last three fast CMEs', async () => {
    const cmes = [800, 900, 1000, 1100].map((speed, i) => ({
      activityID: `c${i}`,
      speed,
      startTime: `2024-05-0${7 + (i % 3)}T00:00Z`,
    }));
    const { services } = createTestServices([['/DONKI/CME', { json: cmes }]]);

    const body = await (await createCmeArrivalHandler(services)()).json();
    expect(body.data.count).toBe(3);
    expect(body.data.predictions.map((p: { cme_speed: string }) => p.cme_speed)).toEqual([
      '900 km/s',
      '1000 km/s',
      '1100 km/s',
    ]);
  });

  it('projects proton flux from the latest reading', async () => {
    const { services } = createTestServices([
      [
        'goes-proton-flux',
        {
          json: swpcProduct(
            ['time_tag', 'flux', 'energy'],
            [
              ['2024-05-10 11:50:00.000', 20, '>=10 MeV'],
              ['2024-05-10 11:55:00.000', 1500, '>=10 MeV'],
            ]
          ),
        },
      ],
    ]);

    const body = await (await createProtonFluxHandler(services)()).json();
    expect(body.data).toEqual({
      timestamp: '2024-05-10T12:00:00.000Z',
      current_flux: '1.50e+03',
      predicted_flux_6h: '1.80e+03',
      trend: 'increasing',
      alert_level: 'S2 - Moderate',
    });
  });

  it('falls back to a flux of 1.0 without data', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { services } = createTestServices([]);
    const body = await (await createProtonFluxHandler(services)()).json();
    expect(body.data.current_flux).toBe('1.00e+00');
  });

  it('describes the active scorers and capabilities', async () => {
    const { services } = createTestServices([]);
    const body = await (await createModelInfoHandler(services)()).json();
    expect(body.data.scorers.solar_flares).toEqual({
      id: 'heuristic-flare',
      version: '1.0.0',
      description: 'Weighted flare activity, solar wind and X-ray data volume',
    });
    expect(body.data.capabilities).toEqual({ heuristic_scoring: true, llm_insights: false });
    expect(body.data.enhancer).toBe('none');
  });
});
