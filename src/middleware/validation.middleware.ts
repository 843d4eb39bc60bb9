import { Request, Response, NextFunction } from 'express';
import { ILocation, ISunburnRequest } from '@/types';
import { DEFAULT_MANUAL_OZONE_DU, isSkinTypeId, SKIN_TYPES } from '@/config/model';
import { ValidationError } from '@/utils/errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (
  body: Record<string, unknown>,
  field: string,
  min: number,
  max: number,
): number => {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Missing or non-numeric field: ${field}`);
  }
  if (value < min || value > max) {
    throw new ValidationError(`Invalid ${field}. Must be between ${min} and ${max}.`);
  }
  return value;
};

const readLocation = (value: unknown): ILocation => {
  if (!isRecord(value)) {
    throw new ValidationError('location is required when useLiveOzone is true.');
  }
  return {
    latitude: readNumber(value, 'latitude', -90, 90),
    longitude: readNumber(value, 'longitude', -180, 180),
  };
};

export function parseSunburnRequest(body: unknown): ISunburnRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  if (body.useLiveOzone !== undefined && typeof body.useLiveOzone !== 'boolean') {
    throw new ValidationError('Invalid useLiveOzone. Must be a boolean.');
  }
  const useLiveOzone = body.useLiveOzone === true;

  const skinType = body.skinType;
  if (!isSkinTypeId(skinType)) {
    throw new ValidationError(
      `Invalid skinType. Must be one of: ${SKIN_TYPES.map((s) => s.id).join(', ')}`,
    );
  }

  const spf = readNumber(body, 'spf', 1, 100);
  if (!Number.isInteger(spf)) {
    throw new ValidationError('Invalid spf. Must be a whole number.');
  }

  return {
    useLiveOzone,
    location: useLiveOzone ? readLocation(body.location) : undefined,
    manualOzoneDu:
      body.manualOzoneDu === undefined
        ? DEFAULT_MANUAL_OZONE_DU
        : readNumber(body, 'manualOzoneDu', 100, 400),
    cloudCoverPct: readNumber(body, 'cloudCoverPct', 0, 100),
    altitudeKm: readNumber(body, 'altitudeKm', 0, 5),
    spf,
    exposureMinutes: readNumber(body, 'exposureMinutes', 0, 180),
    skinType,
  };
}

export const validateSunburnRequest = (req: Request, res: Response, next: NextFunction) => {
  try {
    req.body = parseSunburnRequest(req.body);
  } catch (error) {
    if (error instanceof ValidationError) {
      return res.status(400).json({ error: error.message });
    }
    return next(error);
  }
  next();
};
