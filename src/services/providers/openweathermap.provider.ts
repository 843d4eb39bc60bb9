import { ILocation, OzoneReading } from '@/types';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';
import { DEFAULT_FETCH_HEADERS, HttpGet } from '@/utils/http-client';
import { describeFailure, toOzoneReading } from '@/services/providers/ozone-units';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

// Pulls list[0].components.o3 out of an air_pollution payload
export function extractOzone(body: unknown): unknown {
  if (!isRecord(body) || !Array.isArray(body.list)) return undefined;
  const [first] = body.list;
  if (!isRecord(first) || !isRecord(first.components)) return undefined;
  return first.components.o3;
}

export class OpenWeatherMapProvider implements IOzoneProvider {
  readonly name = 'openweathermap';

  constructor(
    private apiKey: string,
    private httpGet: HttpGet,
    private baseUrl = 'https://api.openweathermap.org/data/2.5/air_pollution',
  ) {}

  async getOzone(location: ILocation): Promise<OzoneReading> {
    if (!this.apiKey) {
      return { kind: 'unavailable', reason: `${this.name}: no API key configured` };
    }

    const url =
      `${this.baseUrl}?lat=${encodeURIComponent(location.latitude)}` +
      `&lon=${encodeURIComponent(location.longitude)}` +
      `&appid=${encodeURIComponent(this.apiKey)}`;

    try {
      const response = await this.httpGet(url, { headers: DEFAULT_FETCH_HEADERS });
      if (!response.ok) {
        return { kind: 'unavailable', reason: `${this.name}: HTTP ${response.status}` };
      }
      const body = await response.json();
      return toOzoneReading(this.name, extractOzone(body));
    } catch (error) {
      return describeFailure(this.name, error);
    }
  }
}
