import { InvalidArgumentError } from 'commander';
import { parseLogLevel, type LogLevel } from '../lib/logger';
import type { DetectionMode, DistanceModel } from '../store/types';

// Option parsers for commander. Each throws InvalidArgumentError so commander
// reports the bad value and exits.

export const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

export const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
};

export const parseLevel = (value: string): LogLevel => {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError('Expected silent, error, warn, info or debug.');
  }
  return level;
};

export const parseDetectionMode = (value: string): DetectionMode => {
  const upper = value.toUpperCase();
  if (upper === 'DETERMINISTIC' || upper === 'PROBABILISTIC') return upper;
  throw new InvalidArgumentError('Expected deterministic or probabilistic.');
};

export const parseDistanceModel = (value: string): DistanceModel => {
  const upper = value.toUpperCase().replace('-', '_');
  if (upper === 'PLANAR' || upper === 'GREAT_CIRCLE' || upper === 'VINCENTY') return upper;
  throw new InvalidArgumentError('Expected planar, great-circle or vincenty.');
};
