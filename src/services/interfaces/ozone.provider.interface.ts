import { ILocation, OzoneReading } from '@/types';

// Implementations resolve to 'unavailable' on any failure and never reject.
export interface IOzoneProvider {
  readonly name: string;
  getOzone(location: ILocation): Promise<OzoneReading>;
}
