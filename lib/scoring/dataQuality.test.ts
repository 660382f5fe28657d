import { describe, expect, it } from 'vitest';
import type { RawEvent, TimeSeriesRow } from '../types';
import { assessDataQuality } from './dataQuality';

const events = (n: number): RawEvent[] => Array.from({ length: n }, () => ({ classType: 'C1.0' }));
const series = (n: number): TimeSeriesRow[] => Array.from({ length: n }, () => ['2024-05-10 00:00:00.000', 1]);

describe('assessDataQuality', () => {
  it('rates missing data as Limited', () => {
    expect(assessDataQuality([], [], [])).toEqual({
      score: 0,
      rating: 'Limited',
      data_points: { flares: 0, solar_wind: 0, xray_flux: 0 },
    });
  });

  it('awards full marks for plenty of data', () => {
    const quality = assessDataQuality(events(5), series(10), series(10));
    expect(quality.score).toBe(1);
    expect(quality.rating).toBe('Excellent');
  });

  it('uses partial credit tiers', () => {
    expect(assessDataQuality(events(2), series(5), series(5))).toMatchObject({ score: 0.5, rating: 'Fair' });
    expect(assessDataQuality(events(0), series(10), series(10))).toMatchObject({ score: 0.6, rating: 'Good' });
    expect(assessDataQuality(events(2), series(10), series(10))).toMatchObject({ score: 0.8, rating: 'Excellent' });
    expect(assessDataQuality(events(1), series(4), series(9))).toMatchObject({ score: 0.15, rating: 'Limited' });
  });
});
