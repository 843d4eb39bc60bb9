import { OzoneReading } from '@/types';
import { DEFAULT_MODEL_CONFIG } from '@/config/model';

// µg/m³ to Dobson Units, two decimals
export function toDobsonUnits(
  microgramsPerCubicMeter: number,
  conversionFactor: number = DEFAULT_MODEL_CONFIG.ozoneConversionFactor,
): number {
  return Math.round((microgramsPerCubicMeter / conversionFactor) * 100) / 100;
}

export function toOzoneReading(provider: string, microgramsPerCubicMeter: unknown): OzoneReading {
  if (typeof microgramsPerCubicMeter !== 'number' || !Number.isFinite(microgramsPerCubicMeter)) {
    return { kind: 'unavailable', reason: `${provider}: ozone value missing from response` };
  }
  const dobsonUnits = toDobsonUnits(microgramsPerCubicMeter);
  if (dobsonUnits <= 0) {
    return { kind: 'unavailable', reason: `${provider}: non-positive ozone value ${dobsonUnits}` };
  }
  return { kind: 'measurement', dobsonUnits, provider };
}

export const describeFailure = (provider: string, error: unknown): OzoneReading => ({
  kind: 'unavailable',
  reason: `${provider}: ${error instanceof Error ? error.message : String(error)}`,
});
