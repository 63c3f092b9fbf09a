import { createStore, type StoreApi } from 'zustand/vanilla';
import type { GameState, SimulationEvent, SimulationSnapshot, UnitSummary } from './types';

export * from './types';

interface SimulationStoreState {
  snapshot: SimulationSnapshot;
  recentEvents: readonly SimulationEvent[];
  // Actions
  publish: (snapshot: SimulationSnapshot, events?: readonly SimulationEvent[]) => void;
}

export type SimulationStore = StoreApi<SimulationStoreState>;

export interface SnapshotSource {
  tick: number;
  gameTime: number;
  timeRateSeconds: number;
  gameState: GameState;
  units: readonly UnitSummary[];
}

export const buildSnapshot = (source: SnapshotSource): SimulationSnapshot =>
  Object.freeze({
    tick: source.tick,
    gameTime: new Date(source.gameTime).toISOString(),
    timeRateSeconds: source.timeRateSeconds,
    gameState: source.gameState,
    units: Object.freeze(source.units.map((unit) => Object.freeze({ ...unit })))
  });

/**
 * Holds the last published snapshot. Readers only ever see a whole snapshot:
 * it is built off to the side and swapped in with a single set().
 */
export const createSimulationStore = (
  initial: SimulationSnapshot,
  maxEventHistory: number
): SimulationStore =>
  createStore<SimulationStoreState>()((set) => ({
    snapshot: initial,
    recentEvents: [],

    publish: (snapshot, events = []) =>
      set((state) => ({
        snapshot,
        recentEvents:
          maxEventHistory === 0 ? [] : [...state.recentEvents, ...events].slice(-maxEventHistory)
      }))
  }));
