import type { SimulationConfig } from '../../config/SimulationConfig';
import type { ClockView } from '../../lib/GameClock';
import type { RNG } from '../../lib/rng';
import type { ModuleSlot } from '../../store/types';
import type { ReadonlyUnit, Unit } from '../Unit';

/**
 * What a module may see of the rest of the simulation. Nothing here can add
 * or remove units, change them, or move the clock.
 */
export interface UnitRegistryView {
  get(id: string): ReadonlyUnit | undefined;
  list(): readonly ReadonlyUnit[];
  /** Ids the unit detected during the current tick */
  detectionsOf(id: string): ReadonlySet<string>;
}

export interface SimulationContext {
  readonly clock: ClockView;
  readonly units: UnitRegistryView;
  readonly config: Readonly<SimulationConfig>;
  readonly rng: RNG;
}

export abstract class UnitModule<S extends ModuleSlot> {
  abstract readonly slot: S;
  private _disposed = false;

  constructor(
    readonly unit: Unit,
    protected readonly context: SimulationContext
  ) {}

  get disposed(): boolean {
    return this._disposed;
  }

  /** Disposed modules never act again */
  dispose(): void {
    this._disposed = true;
  }

  protected get active(): boolean {
    return !this._disposed && this.unit.isOperational;
  }
}
