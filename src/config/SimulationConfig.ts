/**
 * Simulation Configuration
 * Defaults and bounds for the tick loop and the rules applied on each tick.
 */

import { InvalidOperationError } from '../lib/errors';
import type { DetectionMode, DistanceModel } from '../store/types';

export interface SimulationConfig {
  // Time
  startTime: number;            // epoch ms of tick 0
  timeRateSeconds: number;      // game seconds advanced per tick
  endTime: number | null;       // epoch ms; advancing past it ends the game

  // Units
  sinkingGraceTicks: number;    // ticks spent SINKING before removal (0 = same tick)
  arrivalEpsilonNm: number;     // how close counts as "at the destination"

  // Rules
  distanceModel: DistanceModel;
  detectionMode: DetectionMode;
  seed: number;                 // drives every probabilistic roll

  // Telemetry
  maxEventHistory: number;      // events kept in the snapshot store
}

export const TIME_RATE = {
  DEFAULT: 60,  // 1 game minute per tick
  MIN: 1,       // 1 second
  MAX: 3600     // 1 hour
} as const;

// 7 Dec 1941 00:00Z
const DEFAULT_START_TIME = Date.UTC(1941, 11, 7, 0, 0, 0);

export const DEFAULT_CONFIG: SimulationConfig = {
  startTime: DEFAULT_START_TIME,
  timeRateSeconds: TIME_RATE.DEFAULT,
  endTime: null,
  sinkingGraceTicks: 3,
  arrivalEpsilonNm: 0.001,
  distanceModel: 'PLANAR',
  detectionMode: 'DETERMINISTIC',
  seed: 1,
  maxEventHistory: 200
};

export const assertTimeRate = (seconds: number): void => {
  if (!Number.isFinite(seconds) || seconds < TIME_RATE.MIN || seconds > TIME_RATE.MAX) {
    throw new InvalidOperationError(
      `Time rate must be between ${TIME_RATE.MIN} and ${TIME_RATE.MAX} seconds per tick, got ${seconds}`
    );
  }
};

/**
 * Merges overrides onto the defaults and rejects values the tick loop cannot honor.
 */
export const resolveConfig = (overrides: Partial<SimulationConfig> = {}): SimulationConfig => {
  const config: SimulationConfig = { ...DEFAULT_CONFIG, ...overrides };

  assertTimeRate(config.timeRateSeconds);

  if (!Number.isInteger(config.sinkingGraceTicks) || config.sinkingGraceTicks < 0) {
    throw new InvalidOperationError(
      `sinkingGraceTicks must be a non-negative integer, got ${config.sinkingGraceTicks}`
    );
  }
  if (!(config.arrivalEpsilonNm >= 0)) {
    throw new InvalidOperationError(`arrivalEpsilonNm must be >= 0, got ${config.arrivalEpsilonNm}`);
  }
  if (config.endTime !== null && config.endTime <= config.startTime) {
    throw new InvalidOperationError('endTime must be after startTime');
  }
  if (!Number.isInteger(config.maxEventHistory) || config.maxEventHistory < 0) {
    throw new InvalidOperationError(
      `maxEventHistory must be a non-negative integer, got ${config.maxEventHistory}`
    );
  }

  return config;
};
