import type { Position, SimulationEvent } from '../store/types';

export type NameLookup = (id: string) => string;

const identity: NameLookup = (id) => id;

export const formatTick = (tick: number): string => `T+${String(tick).padStart(4, '0')}`;

export const formatPosition = ({ lat, lon }: Position): string =>
  `${Math.abs(lat).toFixed(4)}${lat < 0 ? 'S' : 'N'} ${Math.abs(lon).toFixed(4)}${lon < 0 ? 'W' : 'E'}`;

/**
 * One log line per event, e.g. "[T+0012] USS Fletcher fires on IJN Yukikaze: hit for 20.0 (80.0 left)"
 */
export const formatEvent = (event: SimulationEvent, nameOf: NameLookup = identity): string => {
  const prefix = `[${formatTick(event.tick)}]`;

  switch (event.type) {
    case 'DETECTION':
      return `${prefix} ${nameOf(event.observerId)} detects ${event.detectedIds.map(nameOf).join(', ')}`;
    case 'ATTACK':
      return event.hit
        ? `${prefix} ${nameOf(event.attackerId)} fires on ${nameOf(event.targetId)}: hit for ${event.damage.toFixed(1)} (${event.remainingHealth.toFixed(1)} left)`
        : `${prefix} ${nameOf(event.attackerId)} fires on ${nameOf(event.targetId)}: miss`;
    case 'ENGAGING':
      return `${prefix} ${nameOf(event.unitId)} engaging ${event.targetIds.map(nameOf).join(', ')}`;
    case 'DISENGAGED':
      return `${prefix} ${nameOf(event.unitId)} disengaged`;
    case 'ARRIVED':
      return `${prefix} ${nameOf(event.unitId)} arrived at ${formatPosition(event.position)}`;
    case 'FUEL_EXHAUSTED':
      return `${prefix} ${nameOf(event.unitId)} out of fuel at ${formatPosition(event.position)}`;
    case 'SINKING':
      return `${prefix} ${nameOf(event.unitId)} is sinking`;
    case 'REMOVED':
      return `${prefix} ${nameOf(event.unitId)} removed`;
    case 'MODULE_FAILURE':
      return `${prefix} ${nameOf(event.unitId)} ${event.module} module failed: ${event.message}`;
  }
};
