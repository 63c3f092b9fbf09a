import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { planarDistanceNm } from '../../lib/math';
import { setLogLevel } from '../../lib/logger';
import { SimulationOrchestrator } from '../../services/SimulationOrchestrator';
import type { SimulationEvent } from '../../store/types';
import { equator, makeUnit } from '../fixtures';

const record = (sim: SimulationOrchestrator): SimulationEvent[] => {
  const events: SimulationEvent[] = [];
  sim.onEvents((batch) => events.push(...batch));
  return events;
};

const mentions = (event: SimulationEvent, id: string): boolean => {
  switch (event.type) {
    case 'DETECTION':
      return event.observerId === id || event.detectedIds.includes(id);
    case 'ATTACK':
      return event.attackerId === id || event.targetId === id;
    case 'ENGAGING':
      return event.unitId === id || event.targetIds.includes(id);
    default:
      return event.unitId === id;
  }
};

describe('Regression: engagements', () => {
  beforeEach(() => setLogLevel('silent'));
  afterEach(() => setLogLevel('warn'));

  it('a direct transit arrives after ceil(distance / step) ticks and goes IDLE', () => {
    // 12 kt for 60 s is 0.2 NM per tick: 10 NM takes 50 ticks
    const sim = new SimulationOrchestrator({ timeRateSeconds: 60 });
    const ship = makeUnit({ id: 'ship', destination: equator(10), speed: 12, weapon: null });
    sim.addUnit(ship);
    sim.start();

    for (let i = 0; i < 49; i++) sim.tick();
    expect(ship.state).toBe('MOVING');

    sim.tick();
    expect(ship.state).toBe('IDLE');
    expect(ship.speed).toBe(0);
    expect(planarDistanceNm(ship.position, equator(10))).toBeLessThan(0.01);
  });

  it('a diagonal transit far from the equator still arrives on schedule', () => {
    // 30 kt for 60 s is 0.5 NM per tick
    const start = { lat: 70, lon: 0 };
    const destination = { lat: 60, lon: -20 };
    const sim = new SimulationOrchestrator({ timeRateSeconds: 60 });
    const ship = makeUnit({ id: 'ship', position: start, destination, speed: 30, weapon: null });
    sim.addUnit(ship);
    sim.start();

    const expected = Math.ceil(planarDistanceNm(start, destination) / 0.5);
    let ticks = 0;
    while (ship.state === 'MOVING' && ticks < expected + 10) {
      sim.tick();
      ticks++;
    }

    expect(ticks).toBe(expected);
    expect(ship.state).toBe('IDLE');
    expect(ship.position).toEqual(destination);
  });

  it('closing units detect each other once separation drops inside range', () => {
    // Each closes 1 NM per tick: separation is 20 - 2n after tick n
    const sim = new SimulationOrchestrator({ timeRateSeconds: 360 });
    const west = makeUnit({ id: 'west', position: equator(-10), destination: equator(30), speed: 10, detectionRange: 9, weapon: null });
    const east = makeUnit({ id: 'east', faction: 'RED', position: equator(10), destination: equator(-30), speed: 10, detectionRange: 9, weapon: null });
    sim.addUnit(west);
    sim.addUnit(east);
    const events = record(sim);
    sim.start();

    for (let i = 0; i < 5; i++) sim.tick();
    expect(events.filter((e) => e.type === 'DETECTION')).toEqual([]);
    expect(planarDistanceNm(west.position, east.position)).toBeCloseTo(10, 9);

    sim.tick();
    expect(events).toEqual([
      { type: 'DETECTION', tick: 6, observerId: 'west', detectedIds: ['east'] },
      { type: 'DETECTION', tick: 6, observerId: 'east', detectedIds: ['west'] }
    ]);
    expect(sim.units.detectionsOf('west').has('east')).toBe(true);
  });

  it('no damage outside weapon range; armor and resistance apply inside it', () => {
    const sim = new SimulationOrchestrator();
    const gunner = makeUnit({ id: 'gunner', weapon: { range: 5, damage: 25, hitChance: 1 } });
    const target = makeUnit({ id: 'target', faction: 'RED', position: equator(6), weapon: null, armor: 5, resistance: 0.2 });
    sim.addUnit(gunner);
    sim.addUnit(target);
    const events = record(sim);
    sim.start();

    sim.tick();
    expect(target.health).toBe(100);
    expect(events.some((e) => e.type === 'ATTACK')).toBe(false);

    target.position = equator(4);
    sim.tick();
    // (25 - 5) * (1 - 0.2)
    expect(target.health).toBeCloseTo(84, 9);
    expect(gunner.state).toBe('ENGAGING');
  });

  it('a unit destroyed mid-tick is sinking by the end of that tick and stays silent', () => {
    const sim = new SimulationOrchestrator({ sinkingGraceTicks: 2 });
    const gunner = makeUnit({ id: 'gunner', weapon: { range: 5, damage: 25, hitChance: 1 } });
    const victim = makeUnit({
      id: 'victim',
      faction: 'RED',
      position: equator(3),
      destination: equator(30),
      speed: 10,
      health: 20,
      weapon: null
    });
    sim.addUnit(gunner);
    sim.addUnit(victim);
    const events = record(sim);
    sim.start();

    sim.tick();
    expect(victim.health).toBe(0);
    expect(victim.state).toBe('SINKING');
    expect(victim.speed).toBe(0);
    expect(victim.destination).toBeNull();
    expect(events[events.length - 1]).toEqual({ type: 'SINKING', tick: 1, unitId: 'victim' });

    const sunkAt = { ...victim.position };
    const before = events.length;
    for (let i = 0; i < 4; i++) sim.tick();

    expect(events.slice(before).filter((e) => mentions(e, 'victim'))).toEqual([
      { type: 'REMOVED', tick: 3, unitId: 'victim' }
    ]);
    expect(victim.position).toEqual(sunkAt);
    expect(victim.state).toBe('REMOVED');
    expect(sim.units.get('victim')).toBeUndefined();
  });
});
