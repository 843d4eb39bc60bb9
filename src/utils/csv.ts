import { RiskCurve } from '@/types';

export const RISK_CSV_FILENAME = 'uv_risk_data.csv';
export const RISK_CSV_HEADER = ['Minute', 'Burn Risk'] as const;

export function toRiskCurveCsv(curve: RiskCurve): string {
  const rows = curve.map(({ minute, risk }) => `${String(minute)},${String(risk)}`);
  return [RISK_CSV_HEADER.join(','), ...rows].join('\n') + '\n';
}
