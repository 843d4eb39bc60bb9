import {
  IExposureAlert,
  IOzoneSummary,
  ISunburnRequest,
  ISunburnResponse,
} from '@/types';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';
import {
  DEFAULT_MANUAL_OZONE_DU,
  DEFAULT_MODEL_CONFIG,
  ISunburnModelConfig,
  getSkinType,
} from '@/config/model';
import {
  calculateSafeExposureMinutes,
  calculateUvIndex,
  classifyRisk,
  generateSummary,
} from '@/utils/risk-calculator';
import { generateRiskCurve } from '@/utils/risk-curve';
import { buildRiskChart } from '@/utils/chart';
import { toRiskCurveCsv } from '@/utils/csv';

export const OZONE_FALLBACK_WARNING = 'Failed to fetch live ozone. Using manual value.';

export class SunburnService {
  constructor(
    private ozoneProvider: IOzoneProvider,
    private model: ISunburnModelConfig = DEFAULT_MODEL_CONFIG,
  ) {}

  async assess(request: ISunburnRequest): Promise<ISunburnResponse> {
    const ozone = await this.resolveOzone(request);
    const skinType = getSkinType(request.skinType);

    const uvIndex = calculateUvIndex(
      {
        ozoneDu: ozone.dobsonUnits,
        cloudCoverPct: request.cloudCoverPct,
        altitudeKm: request.altitudeKm,
      },
      this.model,
    );
    const riskLevel = classifyRisk(uvIndex);
    const safeMinutes = calculateSafeExposureMinutes(
      request.spf,
      uvIndex,
      skinType.baseBurnMinutes,
    );
    const curve = generateRiskCurve(safeMinutes, this.model.curve);

    return {
      ozone,
      uv_index: uvIndex,
      risk_level: riskLevel,
      skin_type: skinType,
      spf: request.spf,
      safe_exposure_minutes: safeMinutes,
      exposure_minutes: request.exposureMinutes,
      alert: this.buildAlert(request.exposureMinutes, safeMinutes),
      summary: generateSummary(uvIndex, riskLevel, skinType, request.spf, safeMinutes),
      chart: buildRiskChart(curve, safeMinutes, request.exposureMinutes),
    };
  }

  async exportCsv(request: ISunburnRequest): Promise<string> {
    const { chart } = await this.assess(request);
    return toRiskCurveCsv(chart.series.points);
  }

  private async resolveOzone(request: ISunburnRequest): Promise<IOzoneSummary> {
    const manualOzoneDu = request.manualOzoneDu ?? DEFAULT_MANUAL_OZONE_DU;

    if (!request.useLiveOzone || !request.location) {
      return { dobsonUnits: manualOzoneDu, source: 'manual' };
    }

    const reading = await this.ozoneProvider.getOzone(request.location);
    if (reading.kind === 'measurement') {
      return {
        dobsonUnits: reading.dobsonUnits,
        source: 'live',
        provider: reading.provider,
      };
    }

    console.warn(`Live ozone unavailable (${reading.reason}); using ${manualOzoneDu} DU`);
    return {
      dobsonUnits: manualOzoneDu,
      source: 'manual',
      warning: OZONE_FALLBACK_WARNING,
    };
  }

  private buildAlert(exposureMinutes: number, safeMinutes: number): IExposureAlert {
    const exceedsSafeTime = exposureMinutes > safeMinutes;
    return {
      exceedsSafeTime,
      message: exceedsSafeTime
        ? 'Sun exposure exceeds protection time. HIGH sunburn risk!'
        : "You're within safe exposure time.",
    };
  }
}
