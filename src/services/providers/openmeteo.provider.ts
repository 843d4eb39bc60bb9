import { fetchWeatherApi } from 'openmeteo';
import { ILocation, OzoneReading } from '@/types';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';
import { withTimeout } from '@/utils/http-client';
import { describeFailure, toOzoneReading } from '@/services/providers/ozone-units';

// The slice of the flatbuffer response this provider reads
export interface IAirQualityResponse {
  current(): {
    variables(index: number): { value(): number } | null;
  } | null;
}

export type AirQualityFetcher = (
  url: string,
  params: Record<string, unknown>,
) => Promise<IAirQualityResponse[]>;

// Single attempt: the client retries 5xx responses unless told otherwise
const fetchOnce: AirQualityFetcher = (url, params) => fetchWeatherApi(url, params, 0);

export class OpenMeteoProvider implements IOzoneProvider {
  readonly name = 'openmeteo';

  constructor(
    private timeoutMs = 5000,
    private url = 'https://air-quality-api.open-meteo.com/v1/air-quality',
    private fetcher: AirQualityFetcher = fetchOnce,
  ) {}

  async getOzone(location: ILocation): Promise<OzoneReading> {
    const params = {
      latitude: location.latitude,
      longitude: location.longitude,
      current: 'ozone', // µg/m³
      timezone: 'GMT',
    };

    try {
      const [response] = await withTimeout(this.fetcher(this.url, params), this.timeoutMs);
      const ozone = response?.current()?.variables(0)?.value();
      return toOzoneReading(this.name, ozone);
    } catch (error) {
      return describeFailure(this.name, error);
    }
  }
}
