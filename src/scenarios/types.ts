import type { ModuleSlot, Position, UnitClass, WeaponSpec } from '../store/types';

/** Position given relative to the scenario center */
export interface ScenarioPlacement {
  bearing: number;   // degrees true from the center
  rangeNm: number;
}

export interface ScenarioFuel {
  max: number;
  current?: number;   // defaults to max
  perNm?: number;     // defaults to the class rate
}

export interface ScenarioUnitDefinition {
  id?: string;
  name: string;
  unitClass: UnitClass;
  faction: string;
  shipClass?: string;
  hullNumber?: string;
  taskForce?: string;

  position?: Position;
  placement?: ScenarioPlacement;
  destination?: Position;
  speed?: number;
  heading?: number;

  // Class template overrides
  maxSpeed?: number;
  maxHealth?: number;
  health?: number;
  armor?: number;
  resistance?: number;
  detectionRange?: number;
  detectionProbability?: number;
  weapon?: WeaponSpec | null;
  fuel?: ScenarioFuel | null;

  modules?: ModuleSlot[];
}

export interface ScenarioDefinition {
  name: string;
  description?: string;
  startTime?: string;        // ISO 8601
  timeRateSeconds?: number;
  center?: Position;
  units: ScenarioUnitDefinition[];
}

/** A unit entry after validation: every unit has an id */
export type ResolvedScenarioUnit = ScenarioUnitDefinition & { id: string };

export interface ResolvedScenario extends ScenarioDefinition {
  units: ResolvedScenarioUnit[];
}
