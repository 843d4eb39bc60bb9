import dotenv from 'dotenv';

dotenv.config();

export type OzoneProviderName = 'openweathermap' | 'openmeteo' | 'manual';

export interface IRuntimeConfig {
  port: number;
  ozoneProvider: OzoneProviderName;
  openWeatherMapApiKey: string;
  openWeatherMapBaseUrl: string;
  openMeteoAirQualityUrl: string;
  ozoneRequestTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseProviderName = (rawValue: string | undefined): OzoneProviderName => {
  const value = (rawValue || '').trim().toLowerCase();
  if (value === 'openmeteo' || value === 'manual') return value;
  return 'openweathermap';
};

export const loadRuntimeConfig = (env: Env = process.env): Readonly<IRuntimeConfig> =>
  Object.freeze({
    port: parsePositiveInt(env.PORT, 3000),
    ozoneProvider: parseProviderName(env.OZONE_PROVIDER),
    openWeatherMapApiKey: (env.OPENWEATHERMAP_API_KEY || '').trim(),
    openWeatherMapBaseUrl:
      env.OPENWEATHERMAP_BASE_URL || 'https://api.openweathermap.org/data/2.5/air_pollution',
    openMeteoAirQualityUrl:
      env.OPENMETEO_AIR_QUALITY_URL || 'https://air-quality-api.open-meteo.com/v1/air-quality',
    ozoneRequestTimeoutMs: parsePositiveInt(env.OZONE_REQUEST_TIMEOUT_MS, 5000),
  });
