import { resolveConfig, type SimulationConfig } from '../config/SimulationConfig';
import { GameClock } from '../lib/GameClock';
import { RNG } from '../lib/rng';
import { UnitManager } from '../services/UnitManager';
import type { Position } from '../store/types';
import { Unit, type UnitInit } from '../units/Unit';

/**
 * Position on the equator, `eastNm` east and `northNm` north of 0N 0E.
 * At the equator one NM is exactly 1/60 of a degree in both axes.
 */
export const equator = (eastNm: number, northNm = 0): Position => ({
  lat: northNm / 60,
  lon: eastNm / 60
});

export const makeUnit = (init: Partial<UnitInit> & { id: string }): Unit =>
  new Unit({
    name: init.id,
    unitClass: 'DESTROYER',
    faction: 'BLUE',
    position: equator(0),
    maxSpeed: 30,
    maxHealth: 100,
    detectionRange: 10,
    weapon: { range: 5, damage: 25, hitChance: 1 },
    ...init
  });

export interface Harness {
  clock: GameClock;
  config: SimulationConfig;
  rng: RNG;
  manager: UnitManager;
}

/** A unit manager wired to its own clock, for driving passes by hand */
export const makeHarness = (overrides: Partial<SimulationConfig> = {}): Harness => {
  const config = resolveConfig(overrides);
  const clock = new GameClock({ startTime: config.startTime, timeRateSeconds: config.timeRateSeconds });
  const rng = new RNG(config.seed);
  const manager = new UnitManager({ clock: clock.view(), config, rng });
  return { clock, config, rng, manager };
};

/** Adds units to a harness with all three modules */
export const deploy = (harness: Harness, ...units: Unit[]): void => {
  units.forEach((unit) => {
    harness.manager.add(unit);
    harness.manager.equip(unit);
  });
};
