import { InvalidOperationError } from '../lib/errors';
import { logger } from '../lib/logger';
import { normalizeAngle, normalizeLongitude } from '../lib/math';
import type {
  FuelState,
  ModuleSlot,
  Position,
  UnitClass,
  UnitState,
  UnitSummary,
  WeaponSpec
} from '../store/types';
import type { AttackModule } from './modules/AttackModule';
import type { DetectionModule } from './modules/DetectionModule';
import type { MovementModule } from './modules/MovementModule';

export interface ModuleMap {
  movement: MovementModule;
  detection: DetectionModule;
  attack: AttackModule;
}

export type AnyUnitModule = ModuleMap[ModuleSlot];

export interface UnitInit {
  id: string;
  name: string;
  hullNumber?: string;
  unitClass: UnitClass;
  shipClass?: string;
  faction: string;
  taskForce?: string | null;

  position: Position;
  destination?: Position | null;
  speed?: number;
  maxSpeed: number;
  heading?: number;

  health?: number;
  maxHealth: number;
  armor?: number;
  resistance?: number;

  detectionRange: number;
  detectionProbability?: number;
  weapon?: WeaponSpec | null;
  fuel?: FuelState | null;
}

/**
 * What the rest of the simulation may see of a unit. Orders, damage and
 * module wiring stay on Unit, reachable only through the unit manager.
 */
export interface ReadonlyUnit {
  readonly id: string;
  readonly name: string;
  readonly hullNumber: string;
  readonly unitClass: UnitClass;
  readonly shipClass: string;
  readonly faction: string;
  readonly taskForce: string | null;

  readonly position: Readonly<Position>;
  readonly destination: Readonly<Position> | null;
  readonly heading: number;
  readonly speed: number;
  readonly maxSpeed: number;
  readonly fuel: Readonly<FuelState> | null;

  readonly state: UnitState;
  readonly health: number;
  readonly maxHealth: number;
  readonly armor: number;
  readonly resistance: number;
  readonly sinkingSince: number | null;
  readonly isTerminal: boolean;
  readonly isOperational: boolean;

  readonly detectionRange: number;
  readonly detectionProbability: number;
  readonly weapon: Readonly<WeaponSpec> | null;

  hasModule(slot: ModuleSlot): boolean;
  summary(): UnitSummary;
}

// Longitudes are kept in [-180, 180)
const normalizePosition = ({ lat, lon }: Position): Position => ({
  lat,
  lon: lon >= -180 && lon < 180 ? lon : normalizeLongitude(lon)
});

export const MODULE_SLOTS: readonly ModuleSlot[] = ['movement', 'detection', 'attack'];

const TERMINAL_STATES: ReadonlySet<UnitState> = new Set(['SINKING', 'REMOVED']);

export class Unit implements ReadonlyUnit {
  readonly id: string;
  readonly name: string;
  readonly hullNumber: string;
  readonly unitClass: UnitClass;
  readonly shipClass: string;
  readonly faction: string;
  readonly maxSpeed: number;
  readonly maxHealth: number;
  readonly armor: number;
  readonly resistance: number;
  readonly detectionRange: number;
  readonly detectionProbability: number;
  readonly weapon: WeaponSpec | null;

  position: Position;
  heading: number;
  fuel: FuelState | null;

  private _taskForce: string | null;
  private _speed: number;
  private _destination: Position | null;
  private _health: number;
  private _state: UnitState = 'IDLE';
  private _sinkingSince: number | null = null;
  private readonly modules: Partial<ModuleMap> = {};
  private readonly _view: ReadonlyUnit;

  constructor(init: UnitInit) {
    this.id = init.id;
    this.name = init.name;
    this.hullNumber = init.hullNumber ?? '';
    this.unitClass = init.unitClass;
    this.shipClass = init.shipClass ?? '';
    this.faction = init.faction;
    this._taskForce = init.taskForce ?? null;

    this.position = normalizePosition(init.position);
    this.heading = normalizeAngle(init.heading ?? 0);
    this.maxSpeed = init.maxSpeed;
    this._speed = 0;
    this._destination = null;

    this.maxHealth = init.maxHealth;
    this._health = Math.max(0, Math.min(init.health ?? init.maxHealth, init.maxHealth));
    this.armor = init.armor ?? 0;
    this.resistance = init.resistance ?? 0;

    this.detectionRange = init.detectionRange;
    this.detectionProbability = init.detectionProbability ?? 1;
    this.weapon = init.weapon ?? null;
    this.fuel = init.fuel ? { ...init.fuel } : null;

    if (init.destination) this.setDestination(init.destination);
    if (init.speed !== undefined) this.setSpeed(init.speed);

    const unit = this;
    this._view = Object.freeze({
      id: this.id,
      name: this.name,
      hullNumber: this.hullNumber,
      unitClass: this.unitClass,
      shipClass: this.shipClass,
      faction: this.faction,
      maxSpeed: this.maxSpeed,
      maxHealth: this.maxHealth,
      armor: this.armor,
      resistance: this.resistance,
      detectionRange: this.detectionRange,
      detectionProbability: this.detectionProbability,
      weapon: this.weapon,
      get taskForce() { return unit.taskForce; },
      get position() { return unit.position; },
      get destination() { return unit.destination; },
      get heading() { return unit.heading; },
      get speed() { return unit.speed; },
      get fuel() { return unit.fuel; },
      get state() { return unit.state; },
      get health() { return unit.health; },
      get sinkingSince() { return unit.sinkingSince; },
      get isTerminal() { return unit.isTerminal; },
      get isOperational() { return unit.isOperational; },
      hasModule: (slot: ModuleSlot) => unit.hasModule(slot),
      summary: () => unit.summary()
    });
  }

  /** Read-only face of this unit, handed to everything outside the unit manager */
  view(): ReadonlyUnit {
    return this._view;
  }

  // ==========================================================================
  // STATE
  // ==========================================================================

  get state(): UnitState {
    return this._state;
  }

  get health(): number {
    return this._health;
  }

  get speed(): number {
    return this._speed;
  }

  get destination(): Position | null {
    return this._destination;
  }

  get taskForce(): string | null {
    return this._taskForce;
  }

  get sinkingSince(): number | null {
    return this._sinkingSince;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this._state);
  }

  /** Eligible to move, detect, attack or be targeted */
  get isOperational(): boolean {
    return !this.isTerminal && this._health > 0;
  }

  private restingState(): UnitState {
    return this._destination !== null && this._speed > 0 ? 'MOVING' : 'IDLE';
  }

  private refreshState(): void {
    if (this._state !== 'ENGAGING') {
      this._state = this.restingState();
    }
  }

  private assertOrderable(action: string): void {
    if (this.isTerminal) {
      throw new InvalidOperationError(`Cannot ${action} ${this.id}: unit is ${this._state}`);
    }
  }

  // ==========================================================================
  // ORDERS
  // ==========================================================================

  setDestination(destination: Position | null): void {
    this.assertOrderable('set destination for');
    this._destination = destination ? normalizePosition(destination) : null;
    this.refreshState();
  }

  setSpeed(knots: number): void {
    this.assertOrderable('set speed for');
    if (!Number.isFinite(knots) || knots < 0) {
      throw new InvalidOperationError(`Speed cannot be negative, got ${knots}`);
    }
    if (knots > this.maxSpeed) {
      throw new InvalidOperationError(`Speed cannot exceed maximum speed of ${this.maxSpeed} kts`);
    }
    this._speed = knots;
    this.refreshState();
  }

  /** All stop: speed 0 and no destination */
  stop(): void {
    this._speed = 0;
    this._destination = null;
    this.refreshState();
  }

  assignToTaskForce(taskForce: string | null): void {
    if (taskForce !== null && taskForce.trim() === '') {
      throw new InvalidOperationError('Task force name cannot be blank');
    }
    this._taskForce = taskForce;
  }

  // ==========================================================================
  // COMBAT
  // ==========================================================================

  /**
   * Subtracts damage, clamped at zero. Returns the remaining health.
   */
  applyDamage(amount: number): number {
    if (amount > 0) {
      this._health = Math.max(0, this._health - amount);
    }
    return this._health;
  }

  /**
   * Enters or leaves ENGAGING. Returns true when the state changed.
   */
  setEngaging(engaging: boolean): boolean {
    if (!this.isOperational) return false;
    const next = engaging ? 'ENGAGING' : this.restingState();
    if (next === this._state) return false;
    this._state = next;
    return true;
  }

  beginSinking(tick: number): void {
    if (this.isTerminal) return;
    this._speed = 0;
    this._destination = null;
    this._state = 'SINKING';
    this._sinkingSince = tick;
    logger.debug(`[Unit] ${this.id} SINKING at tick ${tick}`);
  }

  markRemoved(): void {
    if (this._state === 'REMOVED') return;
    this._speed = 0;
    this._destination = null;
    this._state = 'REMOVED';
    MODULE_SLOTS.forEach((slot) => this.detachModule(slot));
  }

  // ==========================================================================
  // MODULES
  // ==========================================================================

  attachModule(module: AnyUnitModule): void {
    if (module.unit !== this) {
      throw new InvalidOperationError(`Module ${module.slot} belongs to ${module.unit.id}, not ${this.id}`);
    }
    if (this.hasModule(module.slot)) {
      throw new InvalidOperationError(`Unit ${this.id} already has a ${module.slot} module`);
    }
    switch (module.slot) {
      case 'movement':
        this.modules.movement = module;
        break;
      case 'detection':
        this.modules.detection = module;
        break;
      case 'attack':
        this.modules.attack = module;
        break;
    }
  }

  getModule<K extends ModuleSlot>(slot: K): ModuleMap[K] | undefined {
    return this.modules[slot];
  }

  hasModule(slot: ModuleSlot): boolean {
    return this.modules[slot] !== undefined;
  }

  /**
   * Returns the module in a slot, creating and attaching it on first use.
   */
  ensureModule<K extends ModuleSlot>(slot: K, create: (unit: Unit) => ModuleMap[K]): ModuleMap[K] {
    const existing = this.getModule(slot);
    if (existing) return existing;
    const module = create(this);
    this.attachModule(module);
    return module;
  }

  detachModule(slot: ModuleSlot): void {
    const module = this.modules[slot];
    if (!module) return;
    module.dispose();
    delete this.modules[slot];
  }

  // ==========================================================================
  // VIEWS
  // ==========================================================================

  /** Called by the movement module once the destination is reached */
  arrive(): void {
    if (this._destination) {
      this.position = { ...this._destination };
    }
    this.stop();
  }

  summary(): UnitSummary {
    return {
      id: this.id,
      name: this.name,
      faction: this.faction,
      unitClass: this.unitClass,
      position: { ...this.position },
      heading: this.heading,
      speed: this._speed,
      health: this._health,
      maxHealth: this.maxHealth,
      state: this._state,
      destination: this._destination ? { ...this._destination } : null
    };
  }
}
