import { IRuntimeConfig } from '@/config/runtime';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';
import { OpenWeatherMapProvider } from '@/services/providers/openweathermap.provider';
import { OpenMeteoProvider } from '@/services/providers/openmeteo.provider';
import { ManualOzoneProvider } from '@/services/providers/manual.provider';
import { createFetchWithTimeout } from '@/utils/http-client';

export const createOzoneProvider = (config: IRuntimeConfig): IOzoneProvider => {
  switch (config.ozoneProvider) {
    case 'openmeteo':
      return new OpenMeteoProvider(config.ozoneRequestTimeoutMs, config.openMeteoAirQualityUrl);
    case 'manual':
      return new ManualOzoneProvider();
    case 'openweathermap':
      if (!config.openWeatherMapApiKey) {
        console.warn('OPENWEATHERMAP_API_KEY is not set; live ozone lookups will fall back to manual values');
      }
      return new OpenWeatherMapProvider(
        config.openWeatherMapApiKey,
        createFetchWithTimeout(config.ozoneRequestTimeoutMs),
        config.openWeatherMapBaseUrl,
      );
  }
};
