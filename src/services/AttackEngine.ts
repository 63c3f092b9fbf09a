/**
 * AttackEngine - Gunnery resolution and target selection
 * - Legitimate targets are drawn only from the tick's detection results
 * - Damage = max(0, base - armor) x (1 - resistance)
 * - Hit rolls use the seeded RNG; a hit chance of 1 never rolls
 */

import { InvalidOperationError } from '../lib/errors';
import { distanceNm } from '../lib/math';
import type { RNG } from '../lib/rng';
import type { DistanceModel, WeaponSpec } from '../store/types';
import type { ReadonlyUnit, Unit } from '../units/Unit';

export interface AttackOptions {
  distanceModel: DistanceModel;
  rng: RNG;
}

export interface AttackOutcome {
  attackerId: string;
  targetId: string;
  hit: boolean;
  damage: number;
  remainingHealth: number;
}

// ============================================================================
// DAMAGE
// ============================================================================

export const calculateDamage = (baseDamage: number, armor: number, resistance: number): number => {
  const penetrating = Math.max(0, baseDamage - armor);
  const clampedResistance = Math.max(0, Math.min(1, resistance));
  return penetrating * (1 - clampedResistance);
};

// ============================================================================
// TARGETING
// ============================================================================

export const isHostile = (a: ReadonlyUnit, b: ReadonlyUnit): boolean => a.faction !== b.faction;

export const isInWeaponRange = (attacker: ReadonlyUnit, target: ReadonlyUnit, model: DistanceModel): boolean => {
  if (!attacker.weapon) return false;
  return distanceNm(attacker.position, target.position, model) <= attacker.weapon.range;
};

/**
 * Filters the attacker's detections down to units it may fire on.
 * Anything not in `detectedIds` is never considered.
 */
export const findLegitimateTargets = <T extends ReadonlyUnit>(
  attacker: ReadonlyUnit,
  detectedIds: Iterable<string>,
  lookup: (id: string) => T | undefined,
  model: DistanceModel
): T[] => {
  if (!attacker.isOperational || !attacker.weapon) return [];

  const targets: T[] = [];
  for (const id of detectedIds) {
    const candidate = lookup(id);
    if (!candidate || candidate.id === attacker.id) continue;
    if (!candidate.isOperational || !isHostile(attacker, candidate)) continue;
    if (!isInWeaponRange(attacker, candidate, model)) continue;
    targets.push(candidate);
  }
  return targets;
};

/**
 * Nearest target first; equal ranges fall back to id order.
 */
export const chooseTarget = <T extends ReadonlyUnit>(
  attacker: ReadonlyUnit,
  targets: readonly T[],
  model: DistanceModel
): T | null => {
  let best: T | null = null;
  let bestRange = Infinity;
  for (const target of targets) {
    const range = distanceNm(attacker.position, target.position, model);
    if (range < bestRange || (range === bestRange && best !== null && target.id < best.id)) {
      best = target;
      bestRange = range;
    }
  }
  return best;
};

// ============================================================================
// RESOLUTION
// ============================================================================

const assertCanEngage = (attacker: ReadonlyUnit, target: ReadonlyUnit, model: DistanceModel): WeaponSpec => {
  if (!attacker.isOperational) {
    throw new InvalidOperationError(`Attacker ${attacker.id} cannot attack while ${attacker.state} (health ${attacker.health})`);
  }
  if (!target.isOperational) {
    throw new InvalidOperationError(`Target ${target.id} cannot be attacked while ${target.state} (health ${target.health})`);
  }
  if (attacker.id === target.id) {
    throw new InvalidOperationError(`Unit ${attacker.id} cannot attack itself`);
  }
  const weapon = attacker.weapon;
  if (!weapon) {
    throw new InvalidOperationError(`Attacker ${attacker.id} has no weapon`);
  }
  const range = distanceNm(attacker.position, target.position, model);
  if (range > weapon.range) {
    throw new InvalidOperationError(
      `Target ${target.id} is out of weapon range (${range.toFixed(2)} NM > ${weapon.range} NM)`
    );
  }
  return weapon;
};

/**
 * Fires the attacker's weapon at the target and applies the damage.
 * Throws InvalidOperationError when either side is gated or the target is out of range.
 */
export const resolveAttack = (attacker: ReadonlyUnit, target: Unit, options: AttackOptions): AttackOutcome => {
  const weapon = assertCanEngage(attacker, target, options.distanceModel);
  const hit = options.rng.chance(weapon.hitChance);
  const damage = hit ? calculateDamage(weapon.damage, target.armor, target.resistance) : 0;
  const remainingHealth = target.applyDamage(damage);

  return {
    attackerId: attacker.id,
    targetId: target.id,
    hit,
    damage,
    remainingHealth
  };
};
