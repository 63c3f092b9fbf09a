/**
 * MovementEngine - Dead reckoning toward an ordered destination
 * - Planar bearing toward the destination, recomputed every step
 * - Each step leaves exactly the remaining planar distance minus the distance steamed
 * - Arrival clamp within the arrival epsilon
 * - Fuel-limited steaming
 */

import {
  advanceAlongTrack,
  calculateBearing,
  knotsToNauticalMiles,
  planarDistanceNm
} from '../lib/math';
import type { FuelState, Position } from '../store/types';

// Fuel below this counts as empty
const FUEL_EMPTY_THRESHOLD = 1e-9;

// ============================================================================
// MOVEMENT STEP
// ============================================================================

export interface MovementInput {
  position: Position;
  destination: Position;
  speed: number;            // knots
  elapsedSeconds: number;   // game seconds covered by this step
  arrivalEpsilonNm: number;
  fuel: FuelState | null;
}

export interface MovementStep {
  position: Position;
  heading: number;
  distanceNm: number;       // distance actually steamed
  arrived: boolean;
  fuelRemaining: number | null;
  fuelExhausted: boolean;
}

/**
 * Maximum distance the fuel aboard allows. Unlimited without a fuel state
 * or with zero consumption.
 */
export const fuelRangeNm = (fuel: FuelState | null): number => {
  if (!fuel || fuel.perNm <= 0) return Infinity;
  return Math.max(0, fuel.current) / fuel.perNm;
};

/**
 * Computes one step of travel. Returns null when there is nothing to do
 * (no elapsed time or no speed).
 */
export const computeMovementStep = (input: MovementInput): MovementStep | null => {
  const { position, destination, speed, elapsedSeconds, arrivalEpsilonNm, fuel } = input;
  if (elapsedSeconds <= 0 || speed <= 0) return null;

  const remaining = planarDistanceNm(position, destination);
  const heading = calculateBearing(position, destination);
  const nominal = knotsToNauticalMiles(speed, elapsedSeconds);
  const travel = Math.min(nominal, fuelRangeNm(fuel));

  const arrived = remaining <= travel + arrivalEpsilonNm;
  const distance = arrived ? remaining : travel;
  const nextPosition = arrived ? { ...destination } : advanceAlongTrack(position, destination, travel);

  let fuelRemaining: number | null = null;
  let fuelExhausted = false;
  if (fuel) {
    fuelRemaining = Math.max(0, fuel.current - distance * fuel.perNm);
    fuelExhausted = fuel.perNm > 0 && fuelRemaining <= FUEL_EMPTY_THRESHOLD;
    if (fuelExhausted) fuelRemaining = 0;
  }

  return {
    position: nextPosition,
    heading,
    distanceNm: distance,
    arrived,
    fuelRemaining,
    fuelExhausted
  };
};
