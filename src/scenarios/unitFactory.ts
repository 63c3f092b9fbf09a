import { UNIT_CLASSES } from '../data/ShipClasses';
import { InvalidScenarioError } from '../lib/errors';
import { offsetPosition } from '../lib/math';
import type { Position, UnitClass } from '../store/types';
import { Unit, type UnitInit } from '../units/Unit';
import type { ResolvedScenarioUnit } from './types';

export type UnitOverrides = Partial<Omit<UnitInit, 'id' | 'unitClass' | 'position' | 'faction'>>;

export interface CreateUnitOptions extends UnitOverrides {
  id: string;
  faction: string;
  position: Position;
}

/**
 * Builds a unit from its class template. Anything in the options wins over
 * the template. Without a name the unit is called after its hull number,
 * e.g. "DD-445".
 */
export const createUnit = (unitClass: UnitClass, options: CreateUnitOptions): Unit => {
  const template = UNIT_CLASSES[unitClass];
  const hullNumber = options.hullNumber;
  const name = options.name ?? (hullNumber ? `${template.hullPrefix}-${hullNumber}` : template.hullPrefix);

  return new Unit({
    maxSpeed: template.maxSpeed,
    maxHealth: template.maxHealth,
    armor: template.armor,
    resistance: template.resistance,
    detectionRange: template.detectionRange,
    detectionProbability: template.detectionProbability,
    weapon: template.weapon ? { ...template.weapon } : null,
    fuel:
      template.fuelPerNm > 0
        ? { current: template.maxFuel, max: template.maxFuel, perNm: template.fuelPerNm }
        : null,
    ...options,
    unitClass,
    name
  });
};

export const resolveScenarioPosition = (entry: ResolvedScenarioUnit, center: Position | undefined): Position => {
  if (entry.position) return entry.position;
  if (entry.placement && center) {
    return offsetPosition(center, entry.placement.bearing, entry.placement.rangeNm);
  }
  throw new InvalidScenarioError([
    { path: entry.id, message: 'needs a position, or a placement and a scenario center' }
  ]);
};

/**
 * Turns a validated scenario entry into a unit.
 */
export const createScenarioUnit = (entry: ResolvedScenarioUnit, center?: Position): Unit => {
  const template = UNIT_CLASSES[entry.unitClass];
  const overrides: UnitOverrides = {};

  if (entry.maxSpeed !== undefined) overrides.maxSpeed = entry.maxSpeed;
  if (entry.maxHealth !== undefined) overrides.maxHealth = entry.maxHealth;
  if (entry.health !== undefined) overrides.health = entry.health;
  if (entry.armor !== undefined) overrides.armor = entry.armor;
  if (entry.resistance !== undefined) overrides.resistance = entry.resistance;
  if (entry.detectionRange !== undefined) overrides.detectionRange = entry.detectionRange;
  if (entry.detectionProbability !== undefined) overrides.detectionProbability = entry.detectionProbability;
  if (entry.weapon !== undefined) overrides.weapon = entry.weapon;
  if (entry.fuel !== undefined) {
    overrides.fuel = entry.fuel && {
      max: entry.fuel.max,
      current: entry.fuel.current ?? entry.fuel.max,
      perNm: entry.fuel.perNm ?? template.fuelPerNm
    };
  }

  return createUnit(entry.unitClass, {
    ...overrides,
    id: entry.id,
    name: entry.name,
    faction: entry.faction,
    shipClass: entry.shipClass,
    hullNumber: entry.hullNumber,
    taskForce: entry.taskForce ?? null,
    position: resolveScenarioPosition(entry, center),
    destination: entry.destination ?? null,
    speed: entry.speed,
    heading: entry.heading
  });
};
