import { describe, it, expect } from 'vitest';
import { InvalidOperationError } from '../lib/errors';
import { deploy, equator, makeHarness, makeUnit } from '../tests/fixtures';
import { MovementModule } from './modules/MovementModule';

describe('Unit', () => {
  describe('state machine', () => {
    it('starts IDLE without orders', () => {
      const unit = makeUnit({ id: 'a' });
      expect(unit.state).toBe('IDLE');
      expect(unit.speed).toBe(0);
      expect(unit.destination).toBeNull();
    });

    it('goes MOVING once it has both a destination and speed', () => {
      const unit = makeUnit({ id: 'a' });
      unit.setDestination(equator(10));
      expect(unit.state).toBe('IDLE');
      unit.setSpeed(12);
      expect(unit.state).toBe('MOVING');
      unit.setSpeed(0);
      expect(unit.state).toBe('IDLE');
    });

    it('takes initial orders from its init', () => {
      const unit = makeUnit({ id: 'a', destination: equator(10), speed: 12 });
      expect(unit.state).toBe('MOVING');
    });

    it('stays ENGAGING through order changes and leaves it to its resting state', () => {
      const unit = makeUnit({ id: 'a', destination: equator(10), speed: 12 });
      expect(unit.setEngaging(true)).toBe(true);
      expect(unit.state).toBe('ENGAGING');

      unit.stop();
      expect(unit.state).toBe('ENGAGING');

      expect(unit.setEngaging(false)).toBe(true);
      expect(unit.state).toBe('IDLE');
      expect(unit.setEngaging(false)).toBe(false);
    });

    it('clears orders on sinking and refuses new ones', () => {
      const unit = makeUnit({ id: 'a', destination: equator(10), speed: 12 });
      unit.beginSinking(4);

      expect(unit.state).toBe('SINKING');
      expect(unit.speed).toBe(0);
      expect(unit.destination).toBeNull();
      expect(unit.sinkingSince).toBe(4);
      expect(unit.isOperational).toBe(false);
      expect(() => unit.setSpeed(5)).toThrow(InvalidOperationError);
      expect(() => unit.setDestination(equator(1))).toThrow(InvalidOperationError);
      expect(unit.setEngaging(true)).toBe(false);
    });
  });

  describe('orders', () => {
    it('rejects negative speed and speed above maximum', () => {
      const unit = makeUnit({ id: 'a', maxSpeed: 30 });
      expect(() => unit.setSpeed(-1)).toThrow(InvalidOperationError);
      expect(() => unit.setSpeed(31)).toThrow(InvalidOperationError);
      expect(unit.speed).toBe(0);
    });

    it('validates task force names', () => {
      const unit = makeUnit({ id: 'a' });
      unit.assignToTaskForce('TF-16');
      expect(unit.taskForce).toBe('TF-16');
      expect(() => unit.assignToTaskForce('  ')).toThrow(InvalidOperationError);
      unit.assignToTaskForce(null);
      expect(unit.taskForce).toBeNull();
    });
  });

  describe('positions', () => {
    it('wraps longitudes into [-180, 180)', () => {
      const unit = makeUnit({ id: 'a', position: { lat: 10, lon: 180 }, destination: { lat: 10, lon: 190 } });
      expect(unit.position).toEqual({ lat: 10, lon: -180 });
      expect(unit.destination).toEqual({ lat: 10, lon: -170 });
    });
  });

  describe('read-only view', () => {
    it('tracks the unit without exposing orders or damage', () => {
      const unit = makeUnit({ id: 'a', destination: equator(10), speed: 12 });
      const view = unit.view();

      expect(view).toBe(unit.view());
      expect(view.state).toBe('MOVING');
      expect('setSpeed' in view).toBe(false);
      expect('applyDamage' in view).toBe(false);
      expect('markRemoved' in view).toBe(false);

      unit.applyDamage(100);
      unit.beginSinking(4);
      expect(view.health).toBe(0);
      expect(view.state).toBe('SINKING');
      expect(view.isOperational).toBe(false);
      expect(view.summary()).toEqual(unit.summary());
    });
  });

  describe('damage', () => {
    it('clamps health at zero', () => {
      const unit = makeUnit({ id: 'a', maxHealth: 100 });
      expect(unit.applyDamage(30)).toBe(70);
      expect(unit.applyDamage(500)).toBe(0);
      expect(unit.health).toBe(0);
      expect(unit.isOperational).toBe(false);
    });

    it('ignores negative damage', () => {
      const unit = makeUnit({ id: 'a', maxHealth: 100 });
      expect(unit.applyDamage(-10)).toBe(100);
    });

    it('clamps initial health into [0, maxHealth]', () => {
      expect(makeUnit({ id: 'a', maxHealth: 100, health: 150 }).health).toBe(100);
      expect(makeUnit({ id: 'b', maxHealth: 100, health: -5 }).health).toBe(0);
    });
  });

  describe('modules', () => {
    it('creates a module lazily and reuses it afterwards', () => {
      const harness = makeHarness();
      const unit = makeUnit({ id: 'a' });
      let created = 0;
      const create = () => {
        created += 1;
        return new MovementModule(unit, harness.manager.context);
      };

      const first = unit.ensureModule('movement', create);
      const second = unit.ensureModule('movement', create);
      expect(first).toBe(second);
      expect(created).toBe(1);
      expect(unit.getModule('movement')).toBe(first);
    });

    it('refuses a second module in the same slot or a module bound to another unit', () => {
      const harness = makeHarness();
      const unit = makeUnit({ id: 'a' });
      const other = makeUnit({ id: 'b' });
      unit.attachModule(new MovementModule(unit, harness.manager.context));

      expect(() => unit.attachModule(new MovementModule(unit, harness.manager.context))).toThrow(InvalidOperationError);
      expect(() => unit.attachModule(new MovementModule(other, harness.manager.context))).toThrow(InvalidOperationError);
    });

    it('disposes every module when removed', () => {
      const harness = makeHarness();
      const unit = makeUnit({ id: 'a' });
      deploy(harness, unit);
      const movement = unit.getModule('movement');
      const attack = unit.getModule('attack');

      unit.markRemoved();

      expect(unit.state).toBe('REMOVED');
      expect(movement?.disposed).toBe(true);
      expect(attack?.disposed).toBe(true);
      expect(unit.hasModule('movement')).toBe(false);
      expect(unit.hasModule('detection')).toBe(false);
    });
  });

  it('summarizes itself without sharing mutable state', () => {
    const unit = makeUnit({ id: 'a', name: 'USS Test', faction: 'USN', destination: equator(5), speed: 10 });
    const summary = unit.summary();

    expect(summary).toEqual({
      id: 'a',
      name: 'USS Test',
      faction: 'USN',
      unitClass: 'DESTROYER',
      position: { lat: 0, lon: 0 },
      heading: 0,
      speed: 10,
      health: 100,
      maxHealth: 100,
      state: 'MOVING',
      destination: equator(5)
    });

    summary.position.lat = 45;
    expect(unit.position.lat).toBe(0);
  });
});
