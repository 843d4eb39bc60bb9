import {
  IEnvironmentalReading,
  ISkinType,
  RiskLevel,
} from '@/types';
import { DEFAULT_MODEL_CONFIG, ISunburnModelConfig } from '@/config/model';
import { DomainError } from '@/utils/errors';

// UV index from ozone column, cloud cover and altitude. Linear model, no clamping.
export function calculateUvIndex(
  reading: IEnvironmentalReading,
  config: ISunburnModelConfig = DEFAULT_MODEL_CONFIG,
): number {
  const { ozoneDu, cloudCoverPct, altitudeKm } = reading;
  if (!Number.isFinite(ozoneDu) || ozoneDu <= 0) {
    throw new DomainError(
      `Ozone thickness must be a positive number of Dobson Units, got ${ozoneDu}`,
    );
  }
  const ozoneFactor = config.ozoneBaselineDu / ozoneDu;
  const cloudFactor = 1 - config.maxCloudAttenuation * (cloudCoverPct / 100);
  const altitudeFactor = 1 + config.altitudeBoostPerKm * altitudeKm;
  return config.baseUvIndex * ozoneFactor * cloudFactor * altitudeFactor;
}

export function calculateSafeExposureMinutes(
  spf: number,
  uvIndex: number,
  baseBurnMinutes: number,
): number {
  if (!Number.isFinite(uvIndex) || uvIndex <= 0) {
    throw new DomainError(
      `UV index must be positive to estimate a safe exposure time, got ${uvIndex}`,
    );
  }
  return (spf * baseBurnMinutes) / uvIndex;
}

export function classifyRisk(uvIndex: number): RiskLevel {
  if (uvIndex < 3) return 'Low';
  if (uvIndex < 6) return 'Moderate';
  if (uvIndex < 8) return 'High';
  if (uvIndex < 11) return 'Very High';
  return 'Extreme';
}

export const RISK_LEVELS: readonly RiskLevel[] = [
  'Low',
  'Moderate',
  'High',
  'Very High',
  'Extreme',
];

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

// Human-readable summary lines
export function generateSummary(
  uvIndex: number,
  riskLevel: RiskLevel,
  skinType: ISkinType,
  spf: number,
  safeMinutes: number,
): string[] {
  return [
    `Estimated UV Index: ${uvIndex.toFixed(2)} (${riskLevel} Risk)`,
    `Skin Type: ${skinType.label} (burns in ~${skinType.baseBurnMinutes} min)`,
    `Sunscreen SPF: ${spf}`,
    `Estimated Safe Exposure Time: ${safeMinutes.toFixed(1)} minutes`,
  ];
}
