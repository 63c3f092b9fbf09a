/**
 * ScenarioLoader - Validates scenario documents and registers their units
 *
 * Loading is all-or-nothing: every violation is collected first and reported
 * as one InvalidScenarioError, and no unit is registered unless the whole
 * document is valid.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { SimulationConfig } from '../config/SimulationConfig';
import { InvalidScenarioError, type ScenarioViolation } from '../lib/errors';
import { logger } from '../lib/logger';
import { SimulationOrchestrator } from '../services/SimulationOrchestrator';
import type { ModuleSlot } from '../store/types';
import type { Unit } from '../units/Unit';
import type { ResolvedScenario } from './types';
import { createScenarioUnit } from './unitFactory';
import { validateScenario } from './validateScenario';

/** Directory holding the scenarios that ship with the simulator */
export const BUNDLED_SCENARIO_DIR = fileURLToPath(new URL('./data/', import.meta.url));

export interface ScenarioUnitEntry {
  unit: Unit;
  modules?: readonly ModuleSlot[];
}

/**
 * Validates a parsed document. Throws InvalidScenarioError listing every violation.
 */
export const parseScenario = (input: unknown): ResolvedScenario => {
  const result = validateScenario(input);
  if (!result.valid) {
    throw new InvalidScenarioError(result.violations);
  }
  return result.scenario;
};

export const buildScenarioUnits = (scenario: ResolvedScenario): ScenarioUnitEntry[] =>
  scenario.units.map((entry) => ({
    unit: createScenarioUnit(entry, scenario.center),
    modules: entry.modules
  }));

/**
 * Config overrides a scenario carries (start time and time rate)
 */
export const scenarioConfig = (scenario: ResolvedScenario): Partial<SimulationConfig> => {
  const overrides: Partial<SimulationConfig> = {};
  if (scenario.startTime !== undefined) overrides.startTime = Date.parse(scenario.startTime);
  if (scenario.timeRateSeconds !== undefined) overrides.timeRateSeconds = scenario.timeRateSeconds;
  return overrides;
};

/**
 * Loads a scenario into an existing simulation. Ids that clash with units
 * already registered count as violations.
 */
export const loadScenario = (orchestrator: SimulationOrchestrator, input: unknown): ResolvedScenario => {
  const scenario = parseScenario(input);

  const clashes: ScenarioViolation[] = [];
  scenario.units.forEach((entry, index) => {
    if (orchestrator.units.get(entry.id)) {
      clashes.push({ path: `units[${index}].id`, message: `unit "${entry.id}" is already registered` });
    }
  });
  if (clashes.length > 0) {
    throw new InvalidScenarioError(clashes);
  }

  orchestrator.addUnits(buildScenarioUnits(scenario));
  logger.info(`[ScenarioLoader] Loaded "${scenario.name}" (${scenario.units.length} units)`);
  return scenario;
};

/**
 * Builds a fresh simulation from a scenario. Explicit overrides win over the
 * scenario's own start time and time rate.
 */
export const createSimulationFromScenario = (
  input: unknown,
  overrides: Partial<SimulationConfig> = {}
): { orchestrator: SimulationOrchestrator; scenario: ResolvedScenario } => {
  const scenario = parseScenario(input);
  const orchestrator = new SimulationOrchestrator({ ...scenarioConfig(scenario), ...overrides });
  loadScenario(orchestrator, scenario);
  return { orchestrator, scenario };
};

/**
 * Reads and parses a scenario file. Unreadable files and malformed JSON are
 * reported as InvalidScenarioError.
 */
export const readScenarioFile = async (path: string): Promise<unknown> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidScenarioError([{ path: '$', message: `cannot read ${path}: ${message}` }]);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidScenarioError([{ path: '$', message: `invalid JSON in ${path}: ${message}` }]);
  }
};

export const loadScenarioFile = async (
  path: string,
  overrides: Partial<SimulationConfig> = {}
): Promise<{ orchestrator: SimulationOrchestrator; scenario: ResolvedScenario }> =>
  createSimulationFromScenario(await readScenarioFile(path), overrides);
