import { describe, expect, it } from 'vitest';
import type { RawEvent } from '../types';
import {
  countHighEnergyFlares,
  formatFlux,
  predictProtonFlux,
  predictRadiationStorm,
  protonAlertLevel,
} from './radiationScorer';

const NOW = new Date('2024-05-10T12:00:00.000Z');

function flares(...classes: string[]): RawEvent[] {
  return classes.map((classType) => ({ classType }));
}

describe('predictRadiationStorm', () => {
  it('stays at 0.15 without M or X flares', () => {
    const prediction = predictRadiationStorm({ recentFlares: flares('C1.0', 'C9.9', 'B2.0') }, NOW);
    expect(prediction.radiation_storm_probability).toBe(0.15);
    expect(prediction.predicted_scale).toBe('Below S1');
    expect(prediction.severity).toBe('Minor');
    expect(prediction.affected_regions).toEqual(['None']);
  });

  it('scales with one or two major flares', () => {
    expect(predictRadiationStorm({ recentFlares: flares('M1.0') }, NOW)).toMatchObject({
      radiation_storm_probability: 0.2,
      predicted_scale: 'S1-S2',
      severity: 'Moderate',
    });
    expect(predictRadiationStorm({ recentFlares: flares('M1.0', 'X1.2') }, NOW).radiation_storm_probability).toBe(0.4);
  });

  it('boosts three or more major flares, capped at 0.85', () => {
    const three = predictRadiationStorm({ recentFlares: flares('M1.0', 'M2.0', 'X1.0') }, NOW);
    expect(three.radiation_storm_probability).toBe(0.72);
    expect(three.predicted_scale).toBe('S3-S4');
    expect(three.severity).toBe('Strong');

    const many = predictRadiationStorm({ recentFlares: flares(...Array<string>(10).fill('X5.0')) }, NOW);
    expect(many.radiation_storm_probability).toBe(0.85);
  });

  it('fills the model metadata', () => {
    const prediction = predictRadiationStorm({ recentFlares: [] }, NOW);
    expect(prediction.timestamp).toBe('2024-05-10T12:00:00.000Z');
    expect(prediction.forecast_period).toBe('24-72 hours');
    expect(prediction.confidence).toBe(0.72);
    expect(prediction.recommendations).toEqual(['Normal operations', 'Standard radiation monitoring']);
  });
});

describe('countHighEnergyFlares', () => {
  it('matches upper-case M and X prefixes only', () => {
    expect(countHighEnergyFlares(flares('M1.0', 'X2.0', 'm1.0', 'x3.0', 'C5.0'))).toBe(2);
    expect(countHighEnergyFlares([{}, { classType: null }])).toBe(0);
  });
});

describe('predictProtonFlux', () => {
  it('defaults to a flux of 1.0 and decays', () => {
    expect(predictProtonFlux(undefined, NOW)).toEqual({
      timestamp: '2024-05-10T12:00:00.000Z',
      current_flux: '1.00e+00',
      predicted_flux_6h: '9.00e-01',
      trend: 'decreasing',
      alert_level: 'Normal',
    });
  });

  it('holds steady between 100 and 1000', () => {
    const prediction = predictProtonFlux(500, NOW);
    expect(prediction.predicted_flux_6h).toBe('5.50e+02');
    expect(prediction.trend).toBe('stable');
    expect(prediction.alert_level).toBe('S1 - Minor');
  });

  it('grows above 1000', () => {
    const prediction = predictProtonFlux(1200, NOW);
    expect(prediction.current_flux).toBe('1.20e+03');
    expect(prediction.predicted_flux_6h).toBe('1.44e+03');
    expect(prediction.trend).toBe('increasing');
    expect(prediction.alert_level).toBe('S2 - Moderate');
  });
});

describe('protonAlertLevel', () => {
  it('maps flux onto the S-scale', () => {
    expect(protonAlertLevel(10000)).toBe('S3 - Strong');
    expect(protonAlertLevel(1000)).toBe('S2 - Moderate');
    expect(protonAlertLevel(10)).toBe('S1 - Minor');
    expect(protonAlertLevel(9.9)).toBe('Normal');
  });
});

describe('formatFlux', () => {
  it('pads the exponent to two digits', () => {
    expect(formatFlux(0.00012)).toBe('1.20e-04');
    expect(formatFlux(12345)).toBe('1.23e+04');
  });
});
