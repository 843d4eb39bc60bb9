import { IRiskChart, RiskCurve } from '@/types';

export function buildRiskChart(
  curve: RiskCurve,
  safeMinutes: number,
  exposureMinutes: number,
): IRiskChart {
  return {
    title: 'UV Exposure vs Protection Time',
    xAxisLabel: 'Minutes in Sun',
    yAxisLabel: 'Burn Risk',
    series: { label: 'Burn Risk', points: curve },
    markers: [
      { label: 'Safe Limit', minute: safeMinutes },
      { label: 'Your Exposure', minute: exposureMinutes },
    ],
  };
}
