import { IRiskPoint, RiskCurve } from '@/types';
import { DEFAULT_MODEL_CONFIG, IRiskCurveDomain } from '@/config/model';

// Logistic burn risk centred on the safe exposure time.
export function burnRisk(
  minute: number,
  safeMinutes: number,
  transitionWidthMinutes: number = DEFAULT_MODEL_CONFIG.curve.transitionWidthMinutes,
): number {
  return 1 / (1 + Math.exp(-(minute - safeMinutes) / transitionWidthMinutes));
}

// Evenly spaced minutes, both ends included.
export function sampleDomain(domain: IRiskCurveDomain = DEFAULT_MODEL_CONFIG.curve): number[] {
  const { startMinute, endMinute, sampleCount } = domain;
  if (sampleCount <= 0) return [];
  if (sampleCount === 1) return [startMinute];
  const step = (endMinute - startMinute) / (sampleCount - 1);
  return Array.from({ length: sampleCount }, (_, i) =>
    i === sampleCount - 1 ? endMinute : startMinute + i * step,
  );
}

export function generateRiskCurve(
  safeMinutes: number,
  domain: IRiskCurveDomain = DEFAULT_MODEL_CONFIG.curve,
): RiskCurve {
  return sampleDomain(domain).map(
    (minute): IRiskPoint => ({
      minute,
      risk: burnRisk(minute, safeMinutes, domain.transitionWidthMinutes),
    }),
  );
}
