import { describe, it, expect } from 'vitest';
import { formatEvent, formatPosition, formatTick } from './formatEvent';

const names: Record<string, string> = { dd: 'USS Fletcher', ijn: 'IJN Yukikaze' };
const nameOf = (id: string) => names[id] ?? id;

describe('formatEvent', () => {
  it('pads tick numbers', () => {
    expect(formatTick(5)).toBe('T+0005');
    expect(formatTick(12345)).toBe('T+12345');
  });

  it('writes hemispheres instead of signs', () => {
    expect(formatPosition({ lat: 19.29, lon: 166.4 })).toBe('19.2900N 166.4000E');
    expect(formatPosition({ lat: -0.5, lon: -1.25 })).toBe('0.5000S 1.2500W');
  });

  it('formats hits and misses', () => {
    expect(
      formatEvent(
        { type: 'ATTACK', tick: 12, attackerId: 'dd', targetId: 'ijn', hit: true, damage: 20, remainingHealth: 80 },
        nameOf
      )
    ).toBe('[T+0012] USS Fletcher fires on IJN Yukikaze: hit for 20.0 (80.0 left)');
    expect(
      formatEvent(
        { type: 'ATTACK', tick: 13, attackerId: 'dd', targetId: 'ijn', hit: false, damage: 0, remainingHealth: 80 },
        nameOf
      )
    ).toBe('[T+0013] USS Fletcher fires on IJN Yukikaze: miss');
  });

  it('lists every detected unit', () => {
    expect(
      formatEvent({ type: 'DETECTION', tick: 1, observerId: 'dd', detectedIds: ['ijn', 'ap-1'] }, nameOf)
    ).toBe('[T+0001] USS Fletcher detects IJN Yukikaze, ap-1');
  });

  it('uses raw ids without a lookup', () => {
    expect(formatEvent({ type: 'SINKING', tick: 40, unitId: 'ijn' })).toBe('[T+0040] ijn is sinking');
    expect(formatEvent({ type: 'REMOVED', tick: 43, unitId: 'ijn' })).toBe('[T+0043] ijn removed');
  });

  it('formats movement and failure events', () => {
    expect(formatEvent({ type: 'ARRIVED', tick: 2, unitId: 'dd', position: { lat: 1, lon: 2 } }, nameOf)).toBe(
      '[T+0002] USS Fletcher arrived at 1.0000N 2.0000E'
    );
    expect(
      formatEvent({ type: 'FUEL_EXHAUSTED', tick: 3, unitId: 'dd', position: { lat: 0, lon: 0 } }, nameOf)
    ).toBe('[T+0003] USS Fletcher out of fuel at 0.0000N 0.0000E');
    expect(
      formatEvent({ type: 'MODULE_FAILURE', tick: 4, unitId: 'dd', module: 'movement', message: 'rudder jammed' }, nameOf)
    ).toBe('[T+0004] USS Fletcher movement module failed: rudder jammed');
    expect(formatEvent({ type: 'ENGAGING', tick: 5, unitId: 'dd', targetIds: ['ijn'] }, nameOf)).toBe(
      '[T+0005] USS Fletcher engaging IJN Yukikaze'
    );
    expect(formatEvent({ type: 'DISENGAGED', tick: 6, unitId: 'dd' }, nameOf)).toBe('[T+0006] USS Fletcher disengaged');
  });
});
