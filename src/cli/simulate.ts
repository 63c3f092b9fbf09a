import { join } from 'node:path';
import type { SimulationConfig } from '../config/SimulationConfig';
import { SimulationError, TimeLimitReachedError } from '../lib/errors';
import { setLogLevel, type LogLevel } from '../lib/logger';
import { BUNDLED_SCENARIO_DIR, loadScenarioFile } from '../scenarios/ScenarioLoader';
import type { DetectionMode, DistanceModel, UnitSummary } from '../store/types';
import { formatEvent, formatPosition, formatTick } from './formatEvent';

export interface SimulateOptions {
  ticks: number;
  timeRate?: number;
  seed?: number;
  grace?: number;
  detection?: DetectionMode;
  distance?: DistanceModel;
  logLevel?: LogLevel;
}

export type Output = (line: string) => void;

/**
 * Bare names ("wake-island") refer to the scenarios shipped in scenarios/data.
 */
export const resolveScenarioPath = (arg: string): string =>
  arg.endsWith('.json') || arg.includes('/') || arg.includes('\\')
    ? arg
    : join(BUNDLED_SCENARIO_DIR, `${arg}.json`);

export const toConfigOverrides = (options: SimulateOptions): Partial<SimulationConfig> => {
  const overrides: Partial<SimulationConfig> = {};
  if (options.timeRate !== undefined) overrides.timeRateSeconds = options.timeRate;
  if (options.seed !== undefined) overrides.seed = options.seed;
  if (options.grace !== undefined) overrides.sinkingGraceTicks = options.grace;
  if (options.detection !== undefined) overrides.detectionMode = options.detection;
  if (options.distance !== undefined) overrides.distanceModel = options.distance;
  return overrides;
};

export const formatUnitSummary = (unit: UnitSummary): string =>
  `  ${unit.name} [${unit.faction}] ${unit.state} ${unit.health.toFixed(1)}/${unit.maxHealth} at ${formatPosition(unit.position)}`;

/**
 * Runs a scenario headless and prints its events. Resolves to the process
 * exit code.
 */
export const simulateCommand = async (
  file: string,
  options: SimulateOptions,
  out: Output = console.log
): Promise<number> => {
  if (options.logLevel) setLogLevel(options.logLevel);

  const loaded = await loadScenarioFile(resolveScenarioPath(file), toConfigOverrides(options)).catch(
    (error: unknown) => {
      // Bad scenario files and rejected overrides are user errors, not crashes
      if (error instanceof SimulationError) {
        out(error.message);
        return null;
      }
      throw error;
    }
  );
  if (!loaded) return 1;

  const { orchestrator, scenario } = loaded;
  const names = new Map(scenario.units.map((unit) => [unit.id, unit.name]));
  const nameOf = (id: string) => names.get(id) ?? id;

  out(`${scenario.name}: ${scenario.units.length} units, ${orchestrator.time.timeRateSeconds}s per tick`);
  orchestrator.onEvents((events) => {
    events.forEach((event) => out(formatEvent(event, nameOf)));
  });

  orchestrator.start();
  for (let i = 0; i < options.ticks && orchestrator.gameState === 'RUNNING'; i++) {
    try {
      orchestrator.tick();
    } catch (error) {
      if (error instanceof TimeLimitReachedError) {
        out(error.message);
        break;
      }
      throw error;
    }
  }

  const snapshot = orchestrator.getSnapshot();
  out(`[${formatTick(snapshot.tick)}] ${snapshot.gameTime} ${snapshot.gameState}`);
  snapshot.units.forEach((unit) => out(formatUnitSummary(unit)));
  return 0;
};
