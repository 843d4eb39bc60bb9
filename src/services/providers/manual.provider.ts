import { OzoneReading } from '@/types';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';

// Live lookup switched off by configuration
export class ManualOzoneProvider implements IOzoneProvider {
  readonly name = 'manual';

  async getOzone(): Promise<OzoneReading> {
    return { kind: 'unavailable', reason: 'live ozone lookup is disabled' };
  }
}
