import { describe, it, expect } from 'vitest';
import { validateScenario } from './validateScenario';

const destroyer = (extra: Record<string, unknown> = {}) => ({
  name: 'USS Test',
  unitClass: 'DESTROYER',
  faction: 'USN',
  position: { lat: 0, lon: 0 },
  ...extra
});

const pathsOf = (input: unknown): string[] => validateScenario(input).violations.map((v) => v.path);

describe('validateScenario', () => {
  it('accepts a minimal scenario and generates missing ids', () => {
    const result = validateScenario({ name: 'Minimal', units: [destroyer()] });
    expect(result.valid).toBe(true);
    expect(result.scenario?.units[0].id).toBe('unit-1');
    expect(result.scenario?.units[0].unitClass).toBe('DESTROYER');
  });

  it('collects every violation in one pass', () => {
    const paths = pathsOf({
      timeRateSeconds: 0,
      units: [
        destroyer({ unitClass: 'FRIGATE' }),
        destroyer({ position: { lat: 95, lon: 0 } }),
        { name: 'C', unitClass: 'DESTROYER', faction: 'IJN', placement: { bearing: 90, rangeNm: 5 } },
        destroyer({ speed: 40 }),
        'junk'
      ]
    });

    expect(paths).toEqual([
      'name',
      'timeRateSeconds',
      'units[0].unitClass',
      'units[1].position.lat',
      'units[2].placement',
      'units[3].speed',
      'units[4]'
    ]);
  });

  it('rejects a document that is not an object', () => {
    expect(pathsOf([1, 2, 3])).toEqual(['$']);
    expect(pathsOf(null)).toEqual(['$']);
  });

  it('requires at least one unit', () => {
    expect(pathsOf({ name: 'Empty', units: [] })).toEqual(['units']);
    expect(pathsOf({ name: 'Missing' })).toEqual(['units']);
  });

  it('rejects an unparseable start time', () => {
    expect(pathsOf({ name: 'X', startTime: 'dawn', units: [destroyer()] })).toEqual(['startTime']);
  });

  it('requires exactly one of position and placement', () => {
    const center = { lat: 0, lon: 0 };
    const neither = { name: 'A', unitClass: 'DESTROYER', faction: 'USN' };
    expect(pathsOf({ name: 'X', center, units: [neither] })).toEqual(['units[0].position']);

    const both = destroyer({ placement: { bearing: 0, rangeNm: 1 } });
    const result = validateScenario({ name: 'X', center, units: [both] });
    expect(result.violations).toEqual([{ path: 'units[0].placement', message: 'cannot be combined with position' }]);
  });

  it('keeps longitudes in [-180, 180)', () => {
    expect(pathsOf({ name: 'X', units: [destroyer({ position: { lat: 0, lon: 180 } })] })).toEqual([
      'units[0].position.lon'
    ]);
    expect(pathsOf({ name: 'X', units: [destroyer({ position: { lat: 0, lon: -180 } })] })).toEqual([]);
  });

  it('rejects duplicate ids, including generated ones', () => {
    const result = validateScenario({
      name: 'X',
      units: [destroyer(), destroyer({ id: 'unit-1' })]
    });
    expect(result.violations).toEqual([{ path: 'units[1].id', message: 'duplicate id "unit-1" (also units[0])' }]);
  });

  it('checks module names and repeats', () => {
    expect(pathsOf({ name: 'X', units: [destroyer({ modules: ['movement', 'sonar', 'movement'] })] })).toEqual([
      'units[0].modules[1]',
      'units[0].modules[2]'
    ]);
  });

  it('checks weapon and fuel overrides', () => {
    expect(
      pathsOf({
        name: 'X',
        units: [destroyer({ weapon: { range: 5, damage: 10, hitChance: 1.5 }, fuel: { max: 10, current: 20 } })]
      })
    ).toEqual(['units[0].weapon.hitChance', 'units[0].fuel.current']);
  });

  it('allows an explicitly unarmed unit', () => {
    const result = validateScenario({ name: 'X', units: [destroyer({ weapon: null })] });
    expect(result.valid).toBe(true);
    expect(result.scenario?.units[0].weapon).toBeNull();
  });

  it('checks speed against an overridden maximum', () => {
    expect(pathsOf({ name: 'X', units: [destroyer({ maxSpeed: 10, speed: 12 })] })).toEqual(['units[0].speed']);
    expect(pathsOf({ name: 'X', units: [destroyer({ maxSpeed: 40, speed: 38 })] })).toEqual([]);
  });
});
