/**
 * Scenario Validation
 *
 * Checks a parsed scenario document and collects every violation instead of
 * stopping at the first one. Returns the typed scenario only when nothing
 * was found.
 */

import { TIME_RATE } from '../config/SimulationConfig';
import { isUnitClass, UNIT_CLASSES, UNIT_CLASS_IDS } from '../data/ShipClasses';
import type { ScenarioViolation } from '../lib/errors';
import type { ModuleSlot, Position, WeaponSpec } from '../store/types';
import type {
  ResolvedScenario,
  ResolvedScenarioUnit,
  ScenarioFuel,
  ScenarioPlacement
} from './types';

export type ScenarioValidationResult =
  | { valid: true; scenario: ResolvedScenario; violations: [] }
  | { valid: false; scenario: null; violations: ScenarioViolation[] };

type Doc = Record<string, unknown>;

const MODULE_SLOT_NAMES: readonly ModuleSlot[] = ['movement', 'detection', 'attack'];

const isRecord = (value: unknown): value is Doc =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isModuleSlot = (value: unknown): value is ModuleSlot =>
  MODULE_SLOT_NAMES.some((slot) => slot === value);

interface NumberRule {
  required?: boolean;
  min?: number;
  max?: number;
  /** Upper bound is exclusive */
  maxExclusive?: boolean;
  integer?: boolean;
}

/**
 * Small cursor over one object of the document. Each read records a
 * violation under the field's path when the value is missing or malformed.
 */
class FieldReader {
  constructor(
    private readonly doc: Doc,
    private readonly path: string,
    private readonly violations: ScenarioViolation[]
  ) {}

  at(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  has(key: string): boolean {
    return this.doc[key] !== undefined;
  }

  raw(key: string): unknown {
    return this.doc[key];
  }

  fail(key: string, message: string): void {
    this.violations.push({ path: this.at(key), message });
  }

  string(key: string, required = false): string | undefined {
    const value = this.doc[key];
    if (value === undefined) {
      if (required) this.fail(key, 'is required');
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(key, 'must be a non-empty string');
      return undefined;
    }
    return value;
  }

  number(key: string, rule: NumberRule = {}): number | undefined {
    const value = this.doc[key];
    if (value === undefined) {
      if (rule.required) this.fail(key, 'is required');
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail(key, 'must be a finite number');
      return undefined;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.fail(key, `must be an integer, got ${value}`);
      return undefined;
    }
    if (rule.min !== undefined && value < rule.min) {
      this.fail(key, `must be >= ${rule.min}, got ${value}`);
      return undefined;
    }
    if (rule.max !== undefined && (rule.maxExclusive ? value >= rule.max : value > rule.max)) {
      this.fail(key, `must be ${rule.maxExclusive ? '<' : '<='} ${rule.max}, got ${value}`);
      return undefined;
    }
    return value;
  }

  object(key: string, required = false): FieldReader | undefined {
    const value = this.doc[key];
    if (value === undefined) {
      if (required) this.fail(key, 'is required');
      return undefined;
    }
    if (!isRecord(value)) {
      this.fail(key, 'must be an object');
      return undefined;
    }
    return new FieldReader(value, this.at(key), this.violations);
  }
}

// ============================================================================
// FIELD GROUPS
// ============================================================================

const readPosition = (reader: FieldReader, key: string, required = false): Position | undefined => {
  const nested = reader.object(key, required);
  if (!nested) return undefined;
  const lat = nested.number('lat', { required: true, min: -90, max: 90 });
  const lon = nested.number('lon', { required: true, min: -180, max: 180, maxExclusive: true });
  return lat !== undefined && lon !== undefined ? { lat, lon } : undefined;
};

const readPlacement = (reader: FieldReader): ScenarioPlacement | undefined => {
  const nested = reader.object('placement');
  if (!nested) return undefined;
  const bearing = nested.number('bearing', { required: true, min: 0, max: 360, maxExclusive: true });
  const rangeNm = nested.number('rangeNm', { required: true, min: 0 });
  return bearing !== undefined && rangeNm !== undefined ? { bearing, rangeNm } : undefined;
};

const readWeapon = (reader: FieldReader): WeaponSpec | null | undefined => {
  if (reader.raw('weapon') === null) return null;
  const nested = reader.object('weapon');
  if (!nested) return undefined;
  const range = nested.number('range', { required: true, min: 0 });
  const damage = nested.number('damage', { required: true, min: 0 });
  const hitChance = nested.number('hitChance', { min: 0, max: 1 }) ?? 1;
  return range !== undefined && damage !== undefined ? { range, damage, hitChance } : undefined;
};

const readFuel = (reader: FieldReader): ScenarioFuel | null | undefined => {
  if (reader.raw('fuel') === null) return null;
  const nested = reader.object('fuel');
  if (!nested) return undefined;
  const max = nested.number('max', { required: true, min: 0 });
  const current = nested.number('current', { min: 0 });
  const perNm = nested.number('perNm', { min: 0 });
  if (max === undefined) return undefined;
  if (current !== undefined && current > max) {
    nested.fail('current', `must not exceed max fuel (${max})`);
    return undefined;
  }
  return { max, current, perNm };
};

const readModules = (reader: FieldReader): ModuleSlot[] | undefined => {
  const value = reader.raw('modules');
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    reader.fail('modules', 'must be an array');
    return undefined;
  }
  const slots: ModuleSlot[] = [];
  value.forEach((entry: unknown, i) => {
    if (!isModuleSlot(entry)) {
      reader.fail(`modules[${i}]`, `must be one of ${MODULE_SLOT_NAMES.join(', ')}`);
    } else if (slots.includes(entry)) {
      reader.fail(`modules[${i}]`, `duplicate module "${entry}"`);
    } else {
      slots.push(entry);
    }
  });
  return slots;
};

// ============================================================================
// UNIT ENTRIES
// ============================================================================

const validateUnit = (
  doc: Doc,
  index: number,
  hasCenter: boolean,
  violations: ScenarioViolation[]
): ResolvedScenarioUnit | null => {
  const before = violations.length;
  const reader = new FieldReader(doc, `units[${index}]`, violations);

  const id = reader.string('id') ?? `unit-${index + 1}`;
  const name = reader.string('name', true);
  const faction = reader.string('faction', true);
  const shipClass = reader.string('shipClass');
  const hullNumber = reader.string('hullNumber');
  const taskForce = reader.string('taskForce');

  const unitClassName = reader.string('unitClass', true);
  const unitClass = unitClassName !== undefined && isUnitClass(unitClassName) ? unitClassName : undefined;
  if (unitClassName !== undefined && !unitClass) {
    reader.fail('unitClass', `unknown unit class "${unitClassName}" (expected one of ${UNIT_CLASS_IDS.join(', ')})`);
  }

  // Exactly one of position / placement
  const position = readPosition(reader, 'position');
  const placement = readPlacement(reader);
  if (!reader.has('position') && !reader.has('placement')) {
    reader.fail('position', 'either position or placement is required');
  } else if (reader.has('position') && reader.has('placement')) {
    reader.fail('placement', 'cannot be combined with position');
  } else if (reader.has('placement') && !hasCenter) {
    reader.fail('placement', 'requires a scenario center');
  }

  const destination = readPosition(reader, 'destination');
  const heading = reader.number('heading', { min: 0, max: 360, maxExclusive: true });

  const template = unitClass ? UNIT_CLASSES[unitClass] : undefined;
  const maxSpeed = reader.number('maxSpeed', { min: 0 });
  const speedLimit = maxSpeed ?? template?.maxSpeed;
  const speed = reader.number('speed', { min: 0, max: speedLimit });

  const maxHealth = reader.number('maxHealth', { min: 0 });
  if (maxHealth === 0) reader.fail('maxHealth', 'must be > 0');
  const health = reader.number('health', { min: 0, max: maxHealth ?? template?.maxHealth });
  const armor = reader.number('armor', { min: 0 });
  const resistance = reader.number('resistance', { min: 0, max: 1, maxExclusive: true });
  const detectionRange = reader.number('detectionRange', { min: 0 });
  const detectionProbability = reader.number('detectionProbability', { min: 0, max: 1 });
  const weapon = readWeapon(reader);
  const fuel = readFuel(reader);
  const modules = readModules(reader);

  if (violations.length > before || !name || !faction || !unitClass) return null;

  return {
    id,
    name,
    unitClass,
    faction,
    shipClass,
    hullNumber,
    taskForce,
    position,
    placement,
    destination,
    speed,
    heading,
    maxSpeed,
    maxHealth,
    health,
    armor,
    resistance,
    detectionRange,
    detectionProbability,
    weapon,
    fuel,
    modules
  };
};

// ============================================================================
// DOCUMENT
// ============================================================================

/**
 * Validates a parsed scenario document.
 *
 * Checks:
 * 1. Required fields and their types/ranges
 * 2. Unit classes and module names are known
 * 3. Each unit has exactly one of position / placement (placement needs a center)
 * 4. Unit ids (explicit or generated) are unique
 */
export const validateScenario = (input: unknown): ScenarioValidationResult => {
  const violations: ScenarioViolation[] = [];

  if (!isRecord(input)) {
    return { valid: false, scenario: null, violations: [{ path: '$', message: 'scenario must be an object' }] };
  }

  const root = new FieldReader(input, '', violations);
  const name = root.string('name', true);
  const description = root.string('description');

  const startTime = root.string('startTime');
  if (startTime !== undefined && Number.isNaN(Date.parse(startTime))) {
    root.fail('startTime', `is not a valid ISO 8601 timestamp: "${startTime}"`);
  }
  const timeRateSeconds = root.number('timeRateSeconds', { min: TIME_RATE.MIN, max: TIME_RATE.MAX });
  const center = readPosition(root, 'center');

  const units: ResolvedScenarioUnit[] = [];
  const rawUnits = input.units;
  if (rawUnits === undefined) {
    root.fail('units', 'is required');
  } else if (!Array.isArray(rawUnits)) {
    root.fail('units', 'must be an array');
  } else if (rawUnits.length === 0) {
    root.fail('units', 'must list at least one unit');
  } else {
    const seenIds = new Map<string, number>();
    rawUnits.forEach((entry: unknown, index) => {
      if (!isRecord(entry)) {
        violations.push({ path: `units[${index}]`, message: 'must be an object' });
        return;
      }
      const unit = validateUnit(entry, index, root.has('center'), violations);
      if (!unit) return;

      const firstIndex = seenIds.get(unit.id);
      if (firstIndex !== undefined) {
        violations.push({ path: `units[${index}].id`, message: `duplicate id "${unit.id}" (also units[${firstIndex}])` });
        return;
      }
      seenIds.set(unit.id, index);
      units.push(unit);
    });
  }

  if (violations.length > 0 || name === undefined) {
    return { valid: false, scenario: null, violations };
  }

  return {
    valid: true,
    scenario: { name, description, startTime, timeRateSeconds, center, units },
    violations: []
  };
};
