/**
 * UnitManager - Owns the unit registry and runs the per-tick module passes
 * - Movement, detection and attack passes over every non-terminal unit
 * - The tick's detection table, shared with target selection
 * - Health/sinking/removal transitions
 *
 * A unit whose module throws is logged, reported as MODULE_FAILURE and
 * skipped; the pass continues with the next unit.
 */

import type { SimulationConfig } from '../config/SimulationConfig';
import { DuplicateUnitError, InvalidOperationError, UnitNotFoundError } from '../lib/errors';
import type { ClockView } from '../lib/GameClock';
import { logger } from '../lib/logger';
import type { RNG } from '../lib/rng';
import type { ModuleSlot, SimulationEvent } from '../store/types';
import { AttackModule } from '../units/modules/AttackModule';
import { DetectionModule } from '../units/modules/DetectionModule';
import { MovementModule } from '../units/modules/MovementModule';
import type { SimulationContext, UnitRegistryView } from '../units/modules/UnitModule';
import { MODULE_SLOTS, type Unit } from '../units/Unit';

const NO_DETECTIONS: ReadonlySet<string> = new Set();

export interface UnitManagerOptions {
  clock: ClockView;
  config: Readonly<SimulationConfig>;
  rng: RNG;
}

export class UnitManager {
  private readonly units = new Map<string, Unit>();
  private detections = new Map<string, ReadonlySet<string>>();
  private pendingEvents: SimulationEvent[] = [];

  readonly context: SimulationContext;

  constructor(options: UnitManagerOptions) {
    const registry: UnitRegistryView = Object.freeze({
      get: (id: string) => this.get(id)?.view(),
      list: () => this.list().map((unit) => unit.view()),
      detectionsOf: (id: string) => this.detectionsOf(id)
    });
    this.context = Object.freeze({
      clock: options.clock,
      units: registry,
      config: options.config,
      rng: options.rng
    });
  }

  // ==========================================================================
  // REGISTRY
  // ==========================================================================

  add(unit: Unit): void {
    if (this.units.has(unit.id)) {
      throw new DuplicateUnitError(unit.id);
    }
    if (unit.isTerminal) {
      throw new InvalidOperationError(`Cannot add ${unit.id}: unit is ${unit.state}`);
    }
    this.units.set(unit.id, unit);
    logger.debug(`[UnitManager] Added ${unit.id} (${unit.name})`);
  }

  /**
   * Removes a unit and disposes its modules. Returns false when the id is unknown.
   */
  remove(id: string): boolean {
    const unit = this.units.get(id);
    if (!unit) return false;
    unit.markRemoved();
    this.units.delete(id);
    this.detections.delete(id);
    logger.debug(`[UnitManager] Removed ${id}`);
    return true;
  }

  has(id: string): boolean {
    return this.units.has(id);
  }

  get(id: string): Unit | undefined {
    return this.units.get(id);
  }

  require(id: string): Unit {
    const unit = this.units.get(id);
    if (!unit) throw new UnitNotFoundError(id);
    return unit;
  }

  /** Registration order */
  list(): Unit[] {
    return Array.from(this.units.values());
  }

  get size(): number {
    return this.units.size;
  }

  detectionsOf(id: string): ReadonlySet<string> {
    return this.detections.get(id) ?? NO_DETECTIONS;
  }

  /**
   * Attaches the given capability modules, bound to this manager's context.
   * Slots the unit already fills are left alone.
   */
  equip(unit: Unit, slots: readonly ModuleSlot[] = MODULE_SLOTS): Unit {
    for (const slot of slots) {
      switch (slot) {
        case 'movement':
          unit.ensureModule('movement', (owner) => new MovementModule(owner, this.context));
          break;
        case 'detection':
          unit.ensureModule('detection', (owner) => new DetectionModule(owner, this.context));
          break;
        case 'attack':
          unit.ensureModule('attack', (owner) => new AttackModule(owner, this.context));
          break;
      }
    }
    return unit;
  }

  // ==========================================================================
  // EVENTS
  // ==========================================================================

  /** Hands over the events recorded since the last drain */
  drainEvents(): SimulationEvent[] {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    return events;
  }

  private emit(event: SimulationEvent): void {
    this.pendingEvents.push(event);
  }

  private runGuarded(unit: Unit, slot: ModuleSlot, action: () => void): void {
    try {
      action();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[UnitManager] ${slot} failed for ${unit.id}: ${message}`);
      this.emit({ type: 'MODULE_FAILURE', tick: this.context.clock.tick, unitId: unit.id, module: slot, message });
    }
  }

  // ==========================================================================
  // TICK PASSES
  // ==========================================================================

  updateMovement(elapsedTicks: number): void {
    const tick = this.context.clock.tick;
    for (const unit of this.list()) {
      const movement = unit.getModule('movement');
      if (!movement || unit.isTerminal) continue;

      this.runGuarded(unit, 'movement', () => {
        const outcome = movement.update(elapsedTicks);
        if (!outcome) return;
        if (outcome.arrived) {
          this.emit({ type: 'ARRIVED', tick, unitId: unit.id, position: outcome.position });
        }
        if (outcome.fuelExhausted) {
          this.emit({ type: 'FUEL_EXHAUSTED', tick, unitId: unit.id, position: outcome.position });
        }
      });
    }
  }

  /**
   * Runs every detection module and records the results as this tick's
   * detection table. Units without a detection module detect nothing.
   */
  updateDetection(): void {
    const tick = this.context.clock.tick;
    const everyone = this.list();
    const table = new Map<string, ReadonlySet<string>>();

    for (const unit of everyone) {
      const detection = unit.getModule('detection');
      if (!detection || unit.isTerminal) continue;

      this.runGuarded(unit, 'detection', () => {
        const detected = detection.detect(everyone);
        table.set(unit.id, detected);
        if (detected.size > 0) {
          this.emit({ type: 'DETECTION', tick, observerId: unit.id, detectedIds: Array.from(detected) });
        }
      });
    }

    this.detections = table;
  }

  /**
   * Each armed unit fires once at its nearest legitimate target. Units are
   * processed in registration order, so a unit sunk earlier in the pass no
   * longer fires or draws fire.
   */
  resolveAttacks(): void {
    const tick = this.context.clock.tick;

    for (const unit of this.list()) {
      const attack = unit.getModule('attack');
      if (!attack || !unit.isOperational) continue;

      this.runGuarded(unit, 'attack', () => {
        const targets = attack.legitimateTargets();

        if (targets.length === 0) {
          if (unit.state === 'ENGAGING' && unit.setEngaging(false)) {
            this.emit({ type: 'DISENGAGED', tick, unitId: unit.id });
          }
          return;
        }

        if (unit.setEngaging(true)) {
          this.emit({ type: 'ENGAGING', tick, unitId: unit.id, targetIds: targets.map((t) => t.id) });
        }

        const target = attack.selectTarget(targets);
        if (!target) return;
        const outcome = attack.resolve(this.require(target.id));
        this.emit({ type: 'ATTACK', tick, ...outcome });
      });
    }
  }

  /**
   * Health <= 0 becomes SINKING; SINKING becomes REMOVED once the grace
   * period has run out (in the same pass when it is zero).
   */
  applyStateTransitions(tick: number): void {
    const grace = this.context.config.sinkingGraceTicks;

    for (const unit of this.list()) {
      if (unit.state !== 'SINKING' && unit.health <= 0) {
        unit.beginSinking(tick);
        this.emit({ type: 'SINKING', tick, unitId: unit.id });
      }

      const since = unit.sinkingSince;
      if (unit.state === 'SINKING' && since !== null && tick - since >= grace) {
        this.remove(unit.id);
        this.emit({ type: 'REMOVED', tick, unitId: unit.id });
      }
    }
  }
}
