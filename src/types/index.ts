export interface ILocation {
  latitude: number;
  longitude: number;
}

export type SkinTypeId = 'I' | 'II' | 'III' | 'IV' | 'V' | 'VI';

export interface ISkinType {
  id: SkinTypeId;
  label: string;
  baseBurnMinutes: number;
}

export type RiskLevel = 'Low' | 'Moderate' | 'High' | 'Very High' | 'Extreme';

export interface IEnvironmentalReading {
  ozoneDu: number;
  cloudCoverPct: number; // 0-100
  altitudeKm: number; // 0-5
}

export interface IPersonProfile {
  skinType: SkinTypeId;
  spf: number;
  exposureMinutes: number;
}

export interface ISunburnRequest extends IPersonProfile {
  useLiveOzone?: boolean; // default false
  location?: ILocation; // required when useLiveOzone is set
  manualOzoneDu?: number; // default 300
  cloudCoverPct: number;
  altitudeKm: number;
}

export type OzoneReading =
  | { kind: 'measurement'; dobsonUnits: number; provider: string }
  | { kind: 'unavailable'; reason: string };

export interface IRiskPoint {
  minute: number;
  risk: number; // 0-1
}

export type RiskCurve = readonly IRiskPoint[];

export interface IChartMarker {
  label: string;
  minute: number;
}

export interface IRiskChart {
  title: string;
  xAxisLabel: string;
  yAxisLabel: string;
  series: {
    label: string;
    points: RiskCurve;
  };
  markers: IChartMarker[];
}

export interface IOzoneSummary {
  dobsonUnits: number;
  source: 'live' | 'manual';
  provider?: string;
  warning?: string;
}

export interface IExposureAlert {
  exceedsSafeTime: boolean;
  message: string;
}

export interface ISunburnResponse {
  ozone: IOzoneSummary;
  uv_index: number;
  risk_level: RiskLevel;
  skin_type: ISkinType;
  spf: number;
  safe_exposure_minutes: number;
  exposure_minutes: number;
  alert: IExposureAlert;
  summary: string[];
  chart: IRiskChart;
}
