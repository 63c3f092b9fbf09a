/**
 * SimulationOrchestrator - Drives the tick loop
 *
 * Each tick runs, in order: advance clock, movement, detection, attacks,
 * state transitions, publish snapshot, dispatch events. The clock and the
 * unit registry are only ever mutated from here.
 */

import { resolveConfig, type SimulationConfig } from '../config/SimulationConfig';
import { DuplicateUnitError, InvalidOperationError, TimeLimitReachedError } from '../lib/errors';
import { GameClock, type ClockView } from '../lib/GameClock';
import { GameStateMachine } from '../lib/GameStateMachine';
import { logger } from '../lib/logger';
import { RNG } from '../lib/rng';
import {
  buildSnapshot,
  createSimulationStore,
  type SimulationStore
} from '../store/simulationStore';
import type {
  GameState,
  ModuleSlot,
  Position,
  SimulationEvent,
  SimulationSnapshot
} from '../store/types';
import type { UnitRegistryView } from '../units/modules/UnitModule';
import { MODULE_SLOTS, type Unit } from '../units/Unit';
import { UnitManager } from './UnitManager';

export type SnapshotListener = (snapshot: SimulationSnapshot, previous: SimulationSnapshot) => void;
export type SimulationEventListener = (events: readonly SimulationEvent[]) => void;

export class SimulationOrchestrator {
  readonly config: Readonly<SimulationConfig>;

  private readonly clock: GameClock;
  private readonly stateMachine = new GameStateMachine();
  private readonly unitManager: UnitManager;
  private readonly store: SimulationStore;
  private readonly eventListeners = new Set<SimulationEventListener>();

  private ticking = false;
  private pauseRequested = false;

  constructor(overrides: Partial<SimulationConfig> = {}) {
    this.config = Object.freeze(resolveConfig(overrides));
    this.clock = new GameClock({
      startTime: this.config.startTime,
      timeRateSeconds: this.config.timeRateSeconds,
      endTime: this.config.endTime
    });
    this.unitManager = new UnitManager({
      clock: this.clock.view(),
      config: this.config,
      rng: new RNG(this.config.seed)
    });
    this.store = createSimulationStore(this.captureSnapshot(), this.config.maxEventHistory);
  }

  // ==========================================================================
  // READ-ONLY VIEWS
  // ==========================================================================

  get gameState(): GameState {
    return this.stateMachine.current;
  }

  get isTicking(): boolean {
    return this.ticking;
  }

  get time(): ClockView {
    return this.clock.view();
  }

  get units(): UnitRegistryView {
    return this.unitManager.context.units;
  }

  getSnapshot(): SimulationSnapshot {
    return this.store.getState().snapshot;
  }

  getRecentEvents(): readonly SimulationEvent[] {
    return this.store.getState().recentEvents;
  }

  /** Called with every newly published snapshot. Returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void {
    return this.store.subscribe((state, previous) => {
      if (state.snapshot !== previous.snapshot) {
        listener(state.snapshot, previous.snapshot);
      }
    });
  }

  /** Called once per tick with that tick's events, when there are any */
  onEvents(listener: SimulationEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  start(): void {
    this.stateMachine.start();
    logger.info(`[Orchestrator] Started at ${this.getSnapshot().gameTime}`);
    this.publish();
  }

  /**
   * Blocks further ticks. A pause requested while a tick is running takes
   * effect once that tick completes.
   */
  pause(): void {
    if (this.ticking) {
      this.pauseRequested = true;
      return;
    }
    if (this.stateMachine.canProcessTick) {
      this.stateMachine.pause();
      logger.info('[Orchestrator] Paused');
      this.publish();
    }
  }

  unpause(): void {
    if (this.pauseRequested) {
      this.pauseRequested = false;
      return;
    }
    this.stateMachine.unpause();
    logger.info('[Orchestrator] Resumed');
    this.publish();
  }

  stop(): void {
    if (this.ticking) {
      throw new InvalidOperationError('Cannot stop the game while a tick is in progress');
    }
    this.stateMachine.complete();
    logger.info('[Orchestrator] Completed');
    this.publish();
  }

  // ==========================================================================
  // TICK
  // ==========================================================================

  tick(): SimulationSnapshot {
    if (this.ticking) {
      throw new InvalidOperationError('tick() called while a tick is already in progress');
    }
    if (!this.stateMachine.canProcessTick) {
      throw new InvalidOperationError(`Cannot tick while game is ${this.stateMachine.current}`);
    }

    this.ticking = true;
    try {
      try {
        this.clock.advance();
      } catch (error) {
        if (error instanceof TimeLimitReachedError) {
          logger.info(`[Orchestrator] ${error.message}`);
          this.stateMachine.complete();
          this.publish();
        }
        throw error;
      }

      const tick = this.clock.tick;
      this.unitManager.updateMovement(1);
      this.unitManager.updateDetection();
      this.unitManager.resolveAttacks();
      this.unitManager.applyStateTransitions(tick);

      const events = this.unitManager.drainEvents();
      const snapshot = this.publish(events);
      logger.debug(`[Orchestrator] Tick ${tick} complete (${events.length} events)`);

      if (events.length > 0) {
        this.dispatch(events);
      }
      return snapshot;
    } finally {
      this.ticking = false;
      if (this.pauseRequested) {
        this.pauseRequested = false;
        this.pause();
      }
    }
  }

  // ==========================================================================
  // ORDERS
  // ==========================================================================

  /**
   * Registers a unit and attaches the requested modules (all three by default).
   */
  addUnit(unit: Unit, modules: readonly ModuleSlot[] = MODULE_SLOTS): void {
    this.assertNotTicking('add units');
    this.unitManager.add(unit);
    this.unitManager.equip(unit, modules);
    this.publish();
  }

  /**
   * Registers several units at once. Nothing is registered if any id is
   * already taken or repeated within the batch, or any unit is sinking or removed.
   */
  addUnits(entries: ReadonlyArray<{ unit: Unit; modules?: readonly ModuleSlot[] }>): void {
    this.assertNotTicking('add units');
    const seen = new Set<string>();
    for (const { unit } of entries) {
      if (this.unitManager.has(unit.id) || seen.has(unit.id)) {
        throw new DuplicateUnitError(unit.id);
      }
      if (unit.isTerminal) {
        throw new InvalidOperationError(`Cannot add ${unit.id}: unit is ${unit.state}`);
      }
      seen.add(unit.id);
    }
    for (const { unit, modules } of entries) {
      this.unitManager.add(unit);
      this.unitManager.equip(unit, modules ?? MODULE_SLOTS);
    }
    this.publish();
  }

  removeUnit(id: string): boolean {
    this.assertNotTicking('remove units');
    const removed = this.unitManager.remove(id);
    if (removed) this.publish();
    return removed;
  }

  /**
   * Orders a unit toward a destination. A null destination keeps the unit
   * where it is at the given speed.
   */
  setUnitMovement(id: string, destination: Position | null, speed: number): void {
    this.assertNotTicking('order units');
    const unit = this.unitManager.require(id);
    // Speed is validated first so a rejected order leaves the unit untouched
    unit.setSpeed(speed);
    unit.setDestination(destination);
    this.publish();
  }

  stopUnit(id: string): void {
    this.assertNotTicking('order units');
    const unit = this.unitManager.require(id);
    if (unit.isTerminal) {
      throw new InvalidOperationError(`Cannot stop ${id}: unit is ${unit.state}`);
    }
    unit.stop();
    this.publish();
  }

  setTimeRate(seconds: number): void {
    this.assertNotTicking('change the time rate');
    this.clock.setTimeRate(seconds);
    logger.info(`[Orchestrator] Time rate set to ${seconds}s per tick`);
    this.publish();
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private assertNotTicking(action: string): void {
    if (this.ticking) {
      throw new InvalidOperationError(`Cannot ${action} while a tick is in progress`);
    }
  }

  private captureSnapshot(): SimulationSnapshot {
    return buildSnapshot({
      tick: this.clock.tick,
      gameTime: this.clock.gameTime,
      timeRateSeconds: this.clock.timeRateSeconds,
      gameState: this.stateMachine.current,
      units: this.unitManager.list().map((unit) => unit.summary())
    });
  }

  private publish(events: readonly SimulationEvent[] = []): SimulationSnapshot {
    const snapshot = this.captureSnapshot();
    this.store.getState().publish(snapshot, events);
    return snapshot;
  }

  private dispatch(events: readonly SimulationEvent[]): void {
    for (const listener of Array.from(this.eventListeners)) {
      try {
        listener(events);
      } catch (error) {
        logger.error('[Orchestrator] Event listener failed:', error);
      }
    }
  }
}
