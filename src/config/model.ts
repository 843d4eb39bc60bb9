import { ISkinType, SkinTypeId } from '@/types';

export interface IRiskCurveDomain {
  startMinute: number;
  endMinute: number;
  sampleCount: number;
  transitionWidthMinutes: number;
}

export interface ISunburnModelConfig {
  baseUvIndex: number;
  ozoneBaselineDu: number;
  altitudeBoostPerKm: number; // UV gain per km of altitude
  maxCloudAttenuation: number; // share of UV removed by full overcast
  ozoneConversionFactor: number; // µg/m³ per Dobson Unit
  curve: IRiskCurveDomain;
}

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  Object.values(value).forEach((child) => {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  });
  return Object.freeze(value);
};

export const DEFAULT_MODEL_CONFIG: Readonly<ISunburnModelConfig> = deepFreeze<ISunburnModelConfig>({
  baseUvIndex: 8,
  ozoneBaselineDu: 300,
  altitudeBoostPerKm: 0.1,
  maxCloudAttenuation: 0.75,
  ozoneConversionFactor: 2.1415,
  curve: {
    startMinute: 0,
    endMinute: 180,
    sampleCount: 500,
    transitionWidthMinutes: 10,
  },
});

export const DEFAULT_MANUAL_OZONE_DU = 300;

export const SKIN_TYPES: readonly ISkinType[] = deepFreeze<ISkinType[]>([
  { id: 'I', label: 'Type I (Very fair)', baseBurnMinutes: 5 },
  { id: 'II', label: 'Type II (Fair)', baseBurnMinutes: 10 },
  { id: 'III', label: 'Type III (Medium)', baseBurnMinutes: 15 },
  { id: 'IV', label: 'Type IV (Olive)', baseBurnMinutes: 20 },
  { id: 'V', label: 'Type V (Brown)', baseBurnMinutes: 25 },
  { id: 'VI', label: 'Type VI (Dark brown)', baseBurnMinutes: 30 },
]);

export const isSkinTypeId = (value: unknown): value is SkinTypeId =>
  SKIN_TYPES.some((skinType) => skinType.id === value);

export function getSkinType(id: SkinTypeId): ISkinType {
  const skinType = SKIN_TYPES.find((s) => s.id === id);
  if (!skinType) throw new Error(`Unknown skin type: ${id}`);
  return skinType;
}
