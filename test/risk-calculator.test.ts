import {
  calculateSafeExposureMinutes,
  calculateUvIndex,
  classifyRisk,
  compareRiskLevels,
  generateSummary,
} from '@/utils/risk-calculator';
import { DEFAULT_MODEL_CONFIG, getSkinType } from '@/config/model';
import { DomainError } from '@/utils/errors';

describe('calculateUvIndex', () => {
  test('clear sky at sea level scales with 300 DU baseline', () => {
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 0, altitudeKm: 0 })).toBe(8);
    expect(calculateUvIndex({ ozoneDu: 150, cloudCoverPct: 0, altitudeKm: 0 })).toBe(16);
    expect(calculateUvIndex({ ozoneDu: 240, cloudCoverPct: 0, altitudeKm: 0 })).toBe(10);
    expect(calculateUvIndex({ ozoneDu: 275, cloudCoverPct: 0, altitudeKm: 0 })).toBeCloseTo(
      (8 * 300) / 275,
      12,
    );
  });

  test('full cloud cover removes 75% of UV', () => {
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 100, altitudeKm: 0 })).toBe(2);
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 20, altitudeKm: 0 })).toBeCloseTo(6.8, 10);
  });

  test('altitude adds 10% per km', () => {
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 0, altitudeKm: 5 })).toBeCloseTo(12, 10);
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 0, altitudeKm: 2.5 })).toBeCloseTo(10, 10);
  });

  test('is decreasing in ozone and cloud cover, increasing in altitude', () => {
    const base = { ozoneDu: 300, cloudCoverPct: 40, altitudeKm: 1 };
    const uv = calculateUvIndex(base);
    expect(calculateUvIndex({ ...base, ozoneDu: 301 })).toBeLessThan(uv);
    expect(calculateUvIndex({ ...base, cloudCoverPct: 41 })).toBeLessThan(uv);
    expect(calculateUvIndex({ ...base, altitudeKm: 1.1 })).toBeGreaterThan(uv);
  });

  test('uses the supplied model configuration', () => {
    const config = { ...DEFAULT_MODEL_CONFIG, baseUvIndex: 10 };
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 0, altitudeKm: 0 }, config)).toBe(10);
  });

  test('rejects a zero or negative ozone column', () => {
    expect(() => calculateUvIndex({ ozoneDu: 0, cloudCoverPct: 0, altitudeKm: 0 })).toThrow(
      DomainError,
    );
    expect(() => calculateUvIndex({ ozoneDu: -10, cloudCoverPct: 0, altitudeKm: 0 })).toThrow(
      'Ozone thickness must be a positive number of Dobson Units, got -10',
    );
  });

  test('does not clamp cloud cover beyond 100%', () => {
    expect(calculateUvIndex({ ozoneDu: 300, cloudCoverPct: 200, altitudeKm: 0 })).toBe(-4);
  });
});

describe('calculateSafeExposureMinutes', () => {
  test('SPF 30 with a 10 minute burn time at UV 8 gives 37.5 minutes', () => {
    expect(calculateSafeExposureMinutes(30, 8, 10)).toBe(37.5);
  });

  test('scales with SPF and inversely with UV', () => {
    expect(calculateSafeExposureMinutes(15, 8, 10)).toBe(18.75);
    expect(calculateSafeExposureMinutes(30, 4, 10)).toBe(75);
  });

  test('rejects a zero or negative UV index', () => {
    expect(() => calculateSafeExposureMinutes(30, 0, 10)).toThrow(DomainError);
    expect(() => calculateSafeExposureMinutes(30, -4, 10)).toThrow(
      'UV index must be positive to estimate a safe exposure time, got -4',
    );
  });
});

describe('classifyRisk', () => {
  test.each([
    [0, 'Low'],
    [2.99, 'Low'],
    [3.0, 'Moderate'],
    [5.99, 'Moderate'],
    [6.0, 'High'],
    [7.99, 'High'],
    [8.0, 'Very High'],
    [10.99, 'Very High'],
    [11.0, 'Extreme'],
    [20, 'Extreme'],
  ])('UV %p is %p', (uv, level) => {
    expect(classifyRisk(uv)).toBe(level);
  });

  test('levels are ordered by severity', () => {
    expect(compareRiskLevels('Low', 'Moderate')).toBeLessThan(0);
    expect(compareRiskLevels('Extreme', 'Very High')).toBeGreaterThan(0);
    expect(compareRiskLevels('High', 'High')).toBe(0);
  });
});

test('generateSummary formats the headline numbers', () => {
  expect(generateSummary(8, 'Very High', getSkinType('II'), 30, 37.5)).toEqual([
    'Estimated UV Index: 8.00 (Very High Risk)',
    'Skin Type: Type II (Fair) (burns in ~10 min)',
    'Sunscreen SPF: 30',
    'Estimated Safe Exposure Time: 37.5 minutes',
  ]);
});
