/**
 * DetectionEngine - Range-based sensor sweeps
 * - Deterministic: every operational unit inside detection range
 * - Probabilistic: in-range candidates rolled against the observer's
 *   detection probability with the seeded RNG
 */

import { distanceNm } from '../lib/math';
import type { RNG } from '../lib/rng';
import type { DetectionMode, DistanceModel } from '../store/types';
import type { ReadonlyUnit } from '../units/Unit';

export interface DetectionOptions {
  distanceModel: DistanceModel;
  mode: DetectionMode;
  rng: RNG;
}

/** A SINKING/REMOVED unit, or one with no health left, is invisible */
export const isDetectable = (unit: ReadonlyUnit): boolean => unit.isOperational;

export const isWithinDetectionRange = (
  observer: ReadonlyUnit,
  candidate: ReadonlyUnit,
  model: DistanceModel
): boolean => distanceNm(observer.position, candidate.position, model) <= observer.detectionRange;

/**
 * Sweeps the candidates from the observer's position. Candidates are
 * examined in the order given, which fixes the order of probabilistic rolls.
 */
export const detectUnits = (
  observer: ReadonlyUnit,
  candidates: Iterable<ReadonlyUnit>,
  options: DetectionOptions
): Set<string> => {
  const detected = new Set<string>();
  if (!observer.isOperational) return detected;

  for (const candidate of candidates) {
    if (candidate.id === observer.id || !isDetectable(candidate)) continue;
    if (!isWithinDetectionRange(observer, candidate, options.distanceModel)) continue;

    if (options.mode === 'PROBABILISTIC' && !options.rng.chance(observer.detectionProbability)) {
      continue;
    }
    detected.add(candidate.id);
  }

  return detected;
};
